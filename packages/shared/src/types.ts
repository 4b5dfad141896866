// ---------------------------------------------------------------------------
// Domain enums (as const objects — idiomatic with Zod, works with verbatimModuleSyntax)
// ---------------------------------------------------------------------------

export const Algorithm = {
  NONE: "none",
  DETERMINISTIC: "deterministic",
  RANDOM: "random",
} as const;
export type Algorithm = (typeof Algorithm)[keyof typeof Algorithm];

/** Algorithms a policy entry may name; `none` is expressed by absence. */
export type EncryptingAlgorithm = Exclude<Algorithm, "none">;

export const EncryptionMode = {
  ENFORCED: "enforced",
  DOCUMENTATION: "documentation",
} as const;
export type EncryptionMode = (typeof EncryptionMode)[keyof typeof EncryptionMode];

export const FieldType = {
  STRING: "string",
  NUMBER: "number",
  BOOLEAN: "boolean",
  TIMESTAMP: "timestamp",
  ID: "id",
  LIST: "list",
  MAP: "map",
} as const;
export type FieldType = (typeof FieldType)[keyof typeof FieldType];

export type CompositeFieldType = typeof FieldType.LIST | typeof FieldType.MAP;

export const Role = {
  DOCTOR: "ROLE_DOCTOR",
  NURSE: "ROLE_NURSE",
  RECEPTIONIST: "ROLE_RECEPTIONIST",
  PATIENT: "ROLE_PATIENT",
  ADMIN: "ROLE_ADMIN",
} as const;
export type Role = (typeof Role)[keyof typeof Role];

export const AuditEventKind = {
  KEY_CREATE: "key.create",
  ENCRYPTION_FAILURE: "encryption.failure",
  ENCRYPTION_DISABLED: "encryption.disabled",
  DECRYPTION_FAILURE: "decryption.failure",
  SCHEMA_DRIFT: "schema.drift",
} as const;
export type AuditEventKind = (typeof AuditEventKind)[keyof typeof AuditEventKind];

export const EntityKind = {
  PATIENT: "patient",
  MESSAGE: "message",
  CONVERSATION: "conversation",
} as const;
export type EntityKind = (typeof EntityKind)[keyof typeof EntityKind];

// ---------------------------------------------------------------------------
// Field values
// ---------------------------------------------------------------------------

export type ScalarValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "timestamp"; value: Date }
  | { kind: "id"; value: string };

export type CompositeValue =
  | { kind: "list"; items: FieldValue[] }
  | { kind: "map"; entries: { [key: string]: FieldValue } };

/** Closed union of every value a governed record field can hold. */
export type FieldValue = ScalarValue | CompositeValue;

// ---------------------------------------------------------------------------
// Configuration tables
// ---------------------------------------------------------------------------

/** `{ entityKind: { fieldName: { algorithm } } }` */
export interface FieldPolicyTable {
  [entityKind: string]: { [fieldName: string]: { algorithm: EncryptingAlgorithm } };
}

export interface RoleAllowList {
  baseFields: readonly string[];
  roles: { readonly [role: string]: readonly string[] };
}

/** Role allow-lists keyed by entity kind. */
export interface RoleAccessTable {
  [entityKind: string]: RoleAllowList;
}

// ---------------------------------------------------------------------------
// Domain interfaces
// ---------------------------------------------------------------------------

/** Unwrapped data-encryption key, held in memory only. */
export interface DataKey {
  id: string;
  altName: string;
  material: Uint8Array;
  createdAt: number;
}

/** Data key as persisted — maps to the `key_vault` SQLite table. */
export interface StoredDataKey {
  id: string;
  alt_name: string;
  wrapped_material: Uint8Array;
  material_iv: Uint8Array;
  material_tag: Uint8Array;
  created_at: number;
}

/** Audit log entry — maps to the `audit_log` SQLite table. */
export interface AuditEvent {
  id: number;
  timestamp: number;
  event_kind: AuditEventKind;
  actor: string;
  entity_kind: string | null;
  field_name: string | null;
  detail_encrypted: Uint8Array | null;
  detail_iv: Uint8Array | null;
  detail_tag: Uint8Array | null;
}

/** Plain JSON-compatible value an outward-facing view is built from. */
export type ViewValue = string | number | boolean | null | ViewValue[] | { [key: string]: ViewValue };

/** Role-scoped projection of a record. */
export type ViewMap = { [fieldName: string]: ViewValue };
