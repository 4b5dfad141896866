import { z } from "zod";
import type { AuditEvent, AuditEventKind } from "@phi-shield/shared";
import { AAD_AUDIT_DETAIL } from "@phi-shield/shared";
import { open } from "../crypto/aes-gcm.js";
import type { AuditFilter, SqliteStore } from "../storage/sqlite-store.js";
import type { AuditMetadata } from "./audit-logger.js";

const detailSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/** Audit event with decrypted detail. */
export interface DecryptedAuditEvent
  extends Omit<AuditEvent, "detail_encrypted" | "detail_iv" | "detail_tag"> {
  detail: AuditMetadata | null;
}

export interface AuditQueryOptions {
  eventKind?: AuditEventKind;
  entityKind?: string;
  since?: number;
  until?: number;
  limit?: number;
}

/**
 * Queries audit log entries and decrypts their detail fields.
 */
export class AuditQuery {
  constructor(
    private readonly store: SqliteStore,
    private readonly auditKey: Uint8Array | null,
  ) {}

  query(options?: AuditQueryOptions): DecryptedAuditEvent[] {
    const filter: AuditFilter = { ...options };
    return this.store.queryAuditLog(filter).map((event) => this.decryptEvent(event));
  }

  private decryptEvent(event: AuditEvent): DecryptedAuditEvent {
    const { detail_encrypted, detail_iv, detail_tag, ...rest } = event;
    let detail: AuditMetadata | null = null;

    if (detail_encrypted && detail_iv && detail_tag && this.auditKey) {
      try {
        const sealed = { iv: detail_iv, tag: detail_tag, ciphertext: detail_encrypted };
        const plaintext = open(this.auditKey, sealed, AAD_AUDIT_DETAIL);
        detail = detailSchema.parse(JSON.parse(Buffer.from(plaintext).toString("utf8")));
      } catch {
        // Written under a different master key or tampered with
        detail = null;
      }
    }

    return { ...rest, detail };
  }
}
