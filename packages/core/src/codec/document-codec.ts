import type { CompositeFieldType, FieldType, FieldValue, Result } from "@phi-shield/shared";
import {
  Algorithm,
  AuditEventKind,
  FieldType as FieldTypes,
  PhiError,
  SYSTEM_ACTOR,
  err,
  ok,
  unwrap,
} from "@phi-shield/shared";
import type { AuditSink } from "../audit/audit-logger.js";
import { CipherValue } from "../crypto/cipher-value.js";
import type { EntityDefinition, FieldMap } from "../entities/entity.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { FieldPolicy } from "../policy/field-policy.js";
import { type DocumentFilter, ID_FIELD, type StorageDocument, type StoredValue } from "../storage/ports.js";
import { decanonicalize, emptyComposite } from "./canonical.js";
import type { EncryptionEngine } from "./encryption-engine.js";
import { classify, fromStored, toStored } from "./storage-value.js";

export interface DocumentCodecOptions {
  engine: EncryptionEngine;
  policy: FieldPolicy;
  audit?: AuditSink;
  logger?: Logger;
}

function isComposite(type: FieldType): type is CompositeFieldType {
  return type === FieldTypes.LIST || type === FieldTypes.MAP;
}

function storedForm(value: FieldValue | CipherValue | null): StoredValue {
  return value === null || value instanceof CipherValue ? value : toStored(value);
}

/** Bring a readable value to the field's declared type, or explain why not. */
function coerceScalar(value: FieldValue, type: FieldType): Result<FieldValue, string> {
  if (value.kind === type) return ok(value);

  switch (type) {
    case FieldTypes.ID:
      if (value.kind === "string") return ok({ kind: "id", value: value.value });
      break;
    case FieldTypes.STRING:
      if (value.kind === "id") return ok({ kind: "string", value: value.value });
      break;
    case FieldTypes.TIMESTAMP:
      // Dates written as text or epoch millis by older writers
      if (value.kind === "string" || value.kind === "number") {
        const date = new Date(value.value);
        if (!Number.isNaN(date.getTime())) return ok({ kind: "timestamp", value: date });
      }
      break;
  }
  return err(`expected ${type}, found ${value.kind}`);
}

/**
 * Maps records to stored documents and back. Writes fail as a whole when any
 * governed field cannot be encrypted; reads never fail on a single field, they
 * default it and report the problem.
 */
export class DocumentCodec {
  private readonly engine: EncryptionEngine;
  private readonly policy: FieldPolicy;
  private readonly audit: AuditSink | undefined;
  private readonly logger: Logger;

  constructor(options: DocumentCodecOptions) {
    this.engine = options.engine;
    this.policy = options.policy;
    this.audit = options.audit;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "document-codec" });
  }

  /**
   * @throws PhiError KEY_UNAVAILABLE or ENCRYPTION_FAILURE; nothing is returned
   * for a partially encrypted record
   */
  async toStorage<R extends { id: string | null }>(
    entity: EntityDefinition<R>,
    record: R,
  ): Promise<StorageDocument> {
    const fields = entity.toFields(record);
    const doc: StorageDocument = {};
    if (record.id !== null) doc[ID_FIELD] = record.id;

    for (const fieldName of Object.keys(entity.fields)) {
      const encrypted = unwrap(await this.engine.encrypt(entity.kind, fieldName, fields[fieldName] ?? null));
      doc[fieldName] = storedForm(encrypted);
    }
    return doc;
  }

  async fromStorage<R extends { id: string | null }>(
    entity: EntityDefinition<R>,
    doc: StorageDocument,
  ): Promise<R> {
    const rawId = doc[ID_FIELD];
    const id = typeof rawId === "string" ? rawId : null;
    const fields: FieldMap = {};

    for (const [fieldName, type] of Object.entries(entity.fields)) {
      fields[fieldName] = await this.readField(entity.kind, fieldName, type, doc[fieldName]);
    }
    return entity.fromFields(id, fields);
  }

  /**
   * Store filter matching records whose `fieldName` equals `value`. Encrypted
   * fields are matched on their deterministic ciphertext.
   *
   * @throws PhiError FIELD_NOT_SEARCHABLE for randomly encrypted fields
   */
  async equalityFilter<R extends { id: string | null }>(
    entity: EntityDefinition<R>,
    fieldName: string,
    value: FieldValue | null,
  ): Promise<DocumentFilter> {
    if (fieldName === ID_FIELD || fieldName === "id") {
      if (value === null || (value.kind !== "string" && value.kind !== "id")) {
        throw PhiError.invalidInput("id filter requires a string value");
      }
      return { [ID_FIELD]: value.value };
    }

    const type = entity.fields[fieldName];
    if (type === undefined) {
      throw PhiError.invalidInput(`${entity.kind} has no field ${fieldName}`);
    }
    if (this.policy.algorithmFor(entity.kind, fieldName) === Algorithm.RANDOM) {
      throw PhiError.fieldNotSearchable(entity.kind, fieldName);
    }

    let normalized = value;
    if (value !== null && !isComposite(type)) {
      const coerced = coerceScalar(value, type);
      if (!coerced.ok) throw PhiError.invalidInput(`${entity.kind}.${fieldName}: ${coerced.error}`);
      normalized = coerced.value;
    }

    const encrypted = unwrap(await this.engine.encrypt(entity.kind, fieldName, normalized));
    return { [fieldName]: storedForm(encrypted) };
  }

  private async readField(
    entityKind: string,
    fieldName: string,
    type: FieldType,
    stored: StoredValue | undefined,
  ): Promise<FieldValue | null> {
    const fallback = isComposite(type) ? emptyComposite(type) : null;
    const classified = classify(stored);

    let value: FieldValue | null;
    switch (classified.kind) {
      case "absent":
        return fallback;
      case "plain":
      case "legacy-composite":
        value = fromStored(classified.value) ?? null;
        if (value === null) {
          return this.drift(entityKind, fieldName, "contains values that are neither plaintext nor a cipher", fallback);
        }
        break;
      case "cipher": {
        const decrypted = await this.engine.decrypt(classified.value);
        if (!decrypted.ok) {
          if (!decrypted.error.recoverable) throw decrypted.error;
          return this.decryptionFailed(entityKind, fieldName, decrypted.error, fallback);
        }
        value = decrypted.value;
        if (value === null) return fallback;
        break;
      }
    }

    const converted = isComposite(type) ? decanonicalize(value, type) : coerceScalar(value, type);
    if (!converted.ok) return this.drift(entityKind, fieldName, converted.error, fallback);
    return converted.value;
  }

  private decryptionFailed(
    entityKind: string,
    fieldName: string,
    error: PhiError,
    fallback: FieldValue | null,
  ): FieldValue | null {
    this.logger.warn("Field could not be decrypted; using default", { entityKind, fieldName, code: error.code });
    this.audit?.log(AuditEventKind.DECRYPTION_FAILURE, SYSTEM_ACTOR, {
      entityKind,
      fieldName,
      code: error.code,
    });
    return fallback;
  }

  private drift(
    entityKind: string,
    fieldName: string,
    detail: string,
    fallback: FieldValue | null,
  ): FieldValue | null {
    const error = PhiError.schemaDrift(entityKind, fieldName, detail);
    this.logger.warn("Unreadable stored value; using default", { entityKind, fieldName, detail });
    this.audit?.log(AuditEventKind.SCHEMA_DRIFT, SYSTEM_ACTOR, {
      entityKind,
      fieldName,
      code: error.code,
      detail,
    });
    return fallback;
  }
}
