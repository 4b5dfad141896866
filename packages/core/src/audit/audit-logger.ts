import type { AuditEventKind } from "@phi-shield/shared";
import { AAD_AUDIT_DETAIL, HKDF_INFO_AUDIT, HKDF_SALT_AUDIT } from "@phi-shield/shared";
import { seal } from "../crypto/aes-gcm.js";
import { deriveSubkey } from "../crypto/hkdf.js";
import type { SqliteStore } from "../storage/sqlite-store.js";

/** Metadata attached to an audit event. Never carries plaintext field values. */
export type AuditMetadata = { [key: string]: string | number | boolean | null };

/** Where the codec, engine and key vault report security-relevant events. */
export interface AuditSink {
  log(eventKind: AuditEventKind, actor: string, metadata?: AuditMetadata): void;
}

export function deriveAuditKey(masterKey: Uint8Array): Promise<Uint8Array> {
  return deriveSubkey(masterKey, { salt: HKDF_SALT_AUDIT, info: HKDF_INFO_AUDIT });
}

/**
 * Writes audit events to the `audit_log` table. `entityKind` and `fieldName`
 * metadata become columns; the remaining metadata is encrypted with the audit
 * key, or dropped when there is none (documentation mode).
 */
export class AuditLogger implements AuditSink {
  constructor(
    private readonly store: SqliteStore,
    private readonly auditKey: Uint8Array | null,
  ) {}

  log(eventKind: AuditEventKind, actor: string, metadata: AuditMetadata = {}): number {
    const { entityKind, fieldName, ...detail } = metadata;

    let detailEncrypted: Uint8Array | null = null;
    let detailIv: Uint8Array | null = null;
    let detailTag: Uint8Array | null = null;

    if (Object.keys(detail).length > 0 && this.auditKey) {
      const plaintext = new Uint8Array(Buffer.from(JSON.stringify(detail), "utf8"));
      const encrypted = seal(this.auditKey, plaintext, AAD_AUDIT_DETAIL);
      detailEncrypted = encrypted.ciphertext;
      detailIv = encrypted.iv;
      detailTag = encrypted.tag;
    }

    return this.store.insertAuditEvent({
      timestamp: Date.now(),
      event_kind: eventKind,
      actor,
      entity_kind: typeof entityKind === "string" ? entityKind : null,
      field_name: typeof fieldName === "string" ? fieldName : null,
      detail_encrypted: detailEncrypted,
      detail_iv: detailIv,
      detail_tag: detailTag,
    });
  }
}
