// ---------------------------------------------------------------------------
// Configuration constants
// ---------------------------------------------------------------------------

// -- Defaults ----------------------------------------------------------------

export const DEFAULT_DB_PATH = "phi-shield.db";
export const DEFAULT_KEY_ALT_NAME = "hipaa_encryption_key";
export const DEFAULT_SERVICE_NAME = "phi-shield";
export const SYSTEM_ACTOR = "system";

// -- Crypto: Argon2id (passphrase-derived master key) -------------------------

export const ARGON2_MEMORY_COST = 65_536; // 64 MB
export const ARGON2_TIME_COST = 3;
export const ARGON2_PARALLELISM = 4;
export const ARGON2_HASH_LENGTH = 32; // 256 bits
export const ARGON2_VERSION = 0x13; // v1.3
export const ARGON2_SALT_LENGTH = 16;

// -- Crypto: AES-256-GCM ----------------------------------------------------

export const AES_KEY_LENGTH = 32; // 256 bits
export const AES_IV_LENGTH = 12; // 96 bits
export const AES_TAG_LENGTH = 16; // 128 bits

// -- Keys --------------------------------------------------------------------

export const MASTER_KEY_LENGTH = AES_KEY_LENGTH;
export const DATA_KEY_MATERIAL_LENGTH = 64; // 32 encryption + 32 MAC
export const KEY_ID_LENGTH = 16; // UUID bytes

// Handed out by the key vault in documentation mode only.
export const DOCUMENTATION_KEY_ID = "00000000-0000-7000-8000-000000000000";

// -- Cipher value layout -----------------------------------------------------
// [algorithm:1][keyId:16][typeTag:1][iv:12][tag:16][ciphertext:n]

export const CIPHER_HEADER_LENGTH = 1 + KEY_ID_LENGTH + 1;
export const CIPHER_MIN_LENGTH = CIPHER_HEADER_LENGTH + AES_IV_LENGTH + AES_TAG_LENGTH;
export const CIPHER_BINARY_SUBTYPE = "06";

// -- HKDF info strings -------------------------------------------------------

export const HKDF_INFO_AUDIT = "audit-key-v1";
export const HKDF_SALT_AUDIT = "phi-shield-audit";

// -- AAD (Additional Authenticated Data) strings -----------------------------

export const AAD_AUDIT_DETAIL = "audit-detail";
export const AAD_MASTER_KEY_CHECK = "master-key-check";

export function AAD_DATA_KEY(keyId: string): string {
  return `data-key:${keyId}`;
}

// -- SQLite pragmas ----------------------------------------------------------

export const SQLITE_PRAGMAS = {
  journal_mode: "WAL",
  busy_timeout: 5_000,
  foreign_keys: "ON",
  synchronous: "FULL",
} as const;

// -- Store defaults ----------------------------------------------------------

export const STORE_SCHEMA_VERSION = 1;
