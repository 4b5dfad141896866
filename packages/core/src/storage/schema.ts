/** DDL constants for the v1 store schema. */

export const CREATE_STORE_META = `
CREATE TABLE IF NOT EXISTS store_meta (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
) STRICT;
`;

// alt_name is the key vault's only synchronization point: concurrent creators
// race on this constraint and all but one get SQLITE_CONSTRAINT_UNIQUE.
export const CREATE_KEY_VAULT = `
CREATE TABLE IF NOT EXISTS key_vault (
  id               TEXT PRIMARY KEY,
  alt_name         TEXT NOT NULL UNIQUE,
  wrapped_material BLOB NOT NULL,
  material_iv      BLOB NOT NULL,
  material_tag     BLOB NOT NULL,
  created_at       INTEGER NOT NULL
) STRICT;
`;

export const CREATE_DOCUMENTS = `
CREATE TABLE IF NOT EXISTS documents (
  collection TEXT NOT NULL,
  id         TEXT NOT NULL,
  body       TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  PRIMARY KEY (collection, id)
) STRICT;
`;

export const CREATE_DOCUMENTS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_documents_collection_created ON documents (collection, created_at);
`;

export const CREATE_AUDIT_LOG = `
CREATE TABLE IF NOT EXISTS audit_log (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp        INTEGER NOT NULL,
  event_kind       TEXT NOT NULL,
  actor            TEXT NOT NULL,
  entity_kind      TEXT,
  field_name       TEXT,
  detail_encrypted BLOB,
  detail_iv        BLOB,
  detail_tag       BLOB
) STRICT;
`;

export const CREATE_AUDIT_LOG_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log (timestamp);
CREATE INDEX IF NOT EXISTS idx_audit_event_kind ON audit_log (event_kind);
`;
