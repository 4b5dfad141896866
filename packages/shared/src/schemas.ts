import { z } from "zod";

import { Algorithm, AuditEventKind, EncryptionMode } from "./types.js";

// ---------------------------------------------------------------------------
// Enum schemas (derived from const objects in types.ts)
// ---------------------------------------------------------------------------

export const encryptingAlgorithmSchema = z.enum([Algorithm.DETERMINISTIC, Algorithm.RANDOM]);

const encryptionModeValues = Object.values(EncryptionMode) as [
  EncryptionMode,
  ...EncryptionMode[],
];
export const encryptionModeSchema = z.enum(encryptionModeValues);

const auditEventKindValues = Object.values(AuditEventKind) as [
  AuditEventKind,
  ...AuditEventKind[],
];
export const auditEventKindSchema = z.enum(auditEventKindValues);

export const logLevelSchema = z.enum(["debug", "info", "warn", "error", "fatal"]);

// ---------------------------------------------------------------------------
// Configuration tables
// ---------------------------------------------------------------------------

const identifierPattern = z.string().regex(/^[a-zA-Z][a-zA-Z0-9_]*$/, "Invalid identifier");

export const fieldPolicyEntrySchema = z
  .object({ algorithm: encryptingAlgorithmSchema })
  .strict();

export const fieldPolicyTableSchema = z.record(
  identifierPattern,
  z.record(identifierPattern, fieldPolicyEntrySchema),
);

export const roleAllowListSchema = z
  .object({
    baseFields: z.array(identifierPattern),
    roles: z.record(z.string().min(1), z.array(identifierPattern)),
  })
  .strict();

export const roleAccessTableSchema = z.record(identifierPattern, roleAllowListSchema);

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

// Empty strings (e.g. `VAR=` in a .env file) count as unset.
const optionalPath = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

export const envSchema = z.object({
  PHI_DB_PATH: z.string().min(1).optional(),
  PHI_MASTER_KEY_PATH: optionalPath,
  PHI_MASTER_KEY_PASSPHRASE: z.string().min(12, "Passphrase must be at least 12 characters").optional(),
  PHI_KEY_ALT_NAME: z.string().min(1).optional(),
  PHI_ENCRYPTION_MODE: encryptionModeSchema.optional(),
  PHI_FIELD_POLICY_PATH: optionalPath,
  PHI_ROLE_ACCESS_PATH: optionalPath,
  LOG_LEVEL: logLevelSchema.optional(),
});

