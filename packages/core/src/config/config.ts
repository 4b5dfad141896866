import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { EncryptionMode } from "@phi-shield/shared";
import {
  DEFAULT_DB_PATH,
  DEFAULT_KEY_ALT_NAME,
  EncryptionMode as Modes,
  PhiError,
  envSchema,
} from "@phi-shield/shared";
import { RoleProjector } from "../access/role-projection.js";
import type { LogLevel } from "../logging/logger.js";
import type { MasterKeySource } from "../keys/master-key.js";
import { FieldPolicy } from "../policy/field-policy.js";

export const BUNDLED_FIELD_POLICY_PATH = fileURLToPath(new URL("../../config/field-policy.json", import.meta.url));
export const BUNDLED_ROLE_ACCESS_PATH = fileURLToPath(new URL("../../config/role-access.json", import.meta.url));

export interface PhiConfig {
  dbPath: string;
  keyAltName: string;
  mode: EncryptionMode;
  /** `null` only in documentation mode. */
  masterKey: MasterKeySource | null;
  fieldPolicy: FieldPolicy;
  roleProjector: RoleProjector;
  logLevel: LogLevel;
}

export function readJsonFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (err) {
    throw PhiError.fileIoError(`Cannot read ${path}: ${err instanceof Error ? err.message : "unknown"}`, err);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw PhiError.configInvalid(`${path} is not valid JSON`);
  }
}

/**
 * Build the runtime configuration from environment variables and the policy
 * tables they point at (or the bundled ones).
 *
 * @throws PhiError CONFIG_INVALID listing every offending variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PhiConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw PhiError.configInvalid(
      "Invalid environment variables",
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const vars = result.data;
  const mode = vars.PHI_ENCRYPTION_MODE ?? Modes.ENFORCED;

  const keyPath = vars.PHI_MASTER_KEY_PATH;
  const passphrase = vars.PHI_MASTER_KEY_PASSPHRASE;
  if (keyPath && passphrase) {
    throw PhiError.configInvalid("Invalid environment variables", [
      "PHI_MASTER_KEY_PATH: set either a key file or a passphrase, not both",
    ]);
  }

  let masterKey: MasterKeySource | null = null;
  if (keyPath) masterKey = { kind: "file", path: keyPath };
  else if (passphrase) masterKey = { kind: "passphrase", passphrase };

  if (!masterKey && mode === Modes.ENFORCED) {
    throw PhiError.configInvalid("Invalid environment variables", [
      "PHI_MASTER_KEY_PATH: a master key file or PHI_MASTER_KEY_PASSPHRASE is required in enforced mode",
    ]);
  }

  return {
    dbPath: vars.PHI_DB_PATH ?? DEFAULT_DB_PATH,
    keyAltName: vars.PHI_KEY_ALT_NAME ?? DEFAULT_KEY_ALT_NAME,
    mode,
    masterKey: mode === Modes.DOCUMENTATION ? null : masterKey,
    fieldPolicy: FieldPolicy.fromTable(readJsonFile(vars.PHI_FIELD_POLICY_PATH ?? BUNDLED_FIELD_POLICY_PATH)),
    roleProjector: RoleProjector.fromTable(readJsonFile(vars.PHI_ROLE_ACCESS_PATH ?? BUNDLED_ROLE_ACCESS_PATH)),
    logLevel: vars.LOG_LEVEL ?? "info",
  };
}
