import type { FieldType, FieldValue, Result } from "@phi-shield/shared";
import {
  Algorithm,
  AuditEventKind,
  DEFAULT_KEY_ALT_NAME,
  ErrorCode,
  PhiError,
  SYSTEM_ACTOR,
  err,
  isPhiError,
  ok,
} from "@phi-shield/shared";
import type { AuditSink } from "../audit/audit-logger.js";
import { CipherValue } from "../crypto/cipher-value.js";
import { decryptFieldBytes, encryptFieldBytes } from "../crypto/key-hierarchy.js";
import type { KeyVault } from "../keys/key-vault.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { FieldPolicy } from "../policy/field-policy.js";
import { canonicalize } from "./canonical.js";

export interface EncryptionEngineOptions {
  policy: FieldPolicy;
  keyVault: KeyVault;
  keyAltName?: string;
  audit?: AuditSink;
  logger?: Logger;
}

interface EncodedPlaintext {
  valueType: FieldType;
  bytes: Uint8Array;
}

// Matches only unpaired surrogates under the u flag.
const LONE_SURROGATE = /\p{Surrogate}/u;

function utf8(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, "utf8"));
}

// UTF-8 has no encoding for an unpaired surrogate; Buffer would substitute U+FFFD.
function scalarText(text: string): Uint8Array {
  if (LONE_SURROGATE.test(text)) {
    throw PhiError.invalidInput("Cannot encrypt a string containing an unpaired surrogate");
  }
  return utf8(text);
}

function float64(n: number): Uint8Array {
  const buf = Buffer.alloc(8);
  buf.writeDoubleBE(n);
  return new Uint8Array(buf);
}

function encodePlaintext(value: FieldValue): EncodedPlaintext {
  switch (value.kind) {
    case "string":
    case "id":
      return { valueType: value.kind, bytes: scalarText(value.value) };
    case "number":
      return { valueType: value.kind, bytes: float64(value.value) };
    case "boolean":
      return { valueType: value.kind, bytes: new Uint8Array([value.value ? 1 : 0]) };
    case "timestamp": {
      const ms = value.value.getTime();
      if (Number.isNaN(ms)) throw PhiError.invalidInput("Cannot encrypt an invalid date");
      return { valueType: value.kind, bytes: float64(ms) };
    }
    case "list":
    case "map":
      return { valueType: value.kind, bytes: utf8(canonicalize(value)) };
  }
}

function decodePlaintext(valueType: FieldType, bytes: Uint8Array): FieldValue {
  const buf = Buffer.from(bytes);
  switch (valueType) {
    case "string":
    case "id":
      return { kind: valueType, value: buf.toString("utf8") };
    case "number":
    case "timestamp": {
      if (buf.length !== 8) {
        throw PhiError.decryptionFailure(`${valueType} plaintext must be 8 bytes, got ${buf.length}`);
      }
      const n = buf.readDoubleBE(0);
      return valueType === "number" ? { kind: "number", value: n } : { kind: "timestamp", value: new Date(n) };
    }
    case "boolean":
      if (buf.length !== 1) {
        throw PhiError.decryptionFailure(`boolean plaintext must be 1 byte, got ${buf.length}`);
      }
      return { kind: "boolean", value: buf[0] === 1 };
    case "list":
    case "map":
      // Composites come back as their canonical text; the codec decodes them.
      return { kind: "string", value: buf.toString("utf8") };
  }
}

/**
 * Encrypts and decrypts single field values under the field policy. Values of
 * unlisted fields and `null` pass through untouched; in documentation mode
 * every value passes through.
 */
export class EncryptionEngine {
  private readonly policy: FieldPolicy;
  private readonly keyVault: KeyVault;
  private readonly keyAltName: string;
  private readonly audit: AuditSink | undefined;
  private readonly logger: Logger;

  constructor(options: EncryptionEngineOptions) {
    this.policy = options.policy;
    this.keyVault = options.keyVault;
    this.keyAltName = options.keyAltName ?? DEFAULT_KEY_ALT_NAME;
    this.audit = options.audit;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "encryption-engine" });
  }

  async encrypt(
    entityKind: string,
    fieldName: string,
    value: FieldValue | null,
  ): Promise<Result<FieldValue | CipherValue | null>> {
    if (value === null) return ok(null);

    const algorithm = this.policy.algorithmFor(entityKind, fieldName);
    if (algorithm === Algorithm.NONE || this.keyVault.documentationMode) return ok(value);

    try {
      const key = await this.keyVault.getOrCreateDataKey(this.keyAltName);
      const { valueType, bytes } = encodePlaintext(value);
      return ok(encryptFieldBytes(key.id, key.material, algorithm, valueType, bytes));
    } catch (e) {
      const error = isPhiError(e, ErrorCode.KEY_UNAVAILABLE)
        ? e
        : PhiError.encryptionFailure(entityKind, fieldName, e);
      this.logger.error("Field encryption failed", error, { entityKind, fieldName });
      this.audit?.log(AuditEventKind.ENCRYPTION_FAILURE, SYSTEM_ACTOR, {
        entityKind,
        fieldName,
        code: error.code,
      });
      return err(error);
    }
  }

  /**
   * Decrypt a cipher value with the key its header names. Anything else is
   * returned unchanged. List and map plaintexts come back as canonical strings.
   */
  async decrypt(value: FieldValue | CipherValue | null): Promise<Result<FieldValue | null>> {
    if (!(value instanceof CipherValue)) return ok(value);

    try {
      const { keyId } = value.header;
      const key = await this.keyVault.getDataKeyById(keyId);
      const { valueType, plaintext } = decryptFieldBytes(key.material, value);
      return ok(decodePlaintext(valueType, plaintext));
    } catch (e) {
      if (isPhiError(e)) return err(e);
      return err(PhiError.decryptionFailure(e instanceof Error ? e.message : "unknown error", e));
    }
  }
}
