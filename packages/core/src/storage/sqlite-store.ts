import Database from "better-sqlite3";
import type { AuditEvent, AuditEventKind, StoredDataKey } from "@phi-shield/shared";
import { auditEventKindSchema, PhiError, SQLITE_PRAGMAS, STORE_SCHEMA_VERSION } from "@phi-shield/shared";
import { CipherValue } from "../crypto/cipher-value.js";
import { generateUUIDv7 } from "../crypto/random.js";
import { fromExtendedJson, toExtendedJson } from "./document-json.js";
import { migration001 } from "./migrations/001-initial.js";
import {
  type DocumentFilter,
  type DocumentStore,
  ID_FIELD,
  type KeyVaultStore,
  type StorageDocument,
  type StoredValue,
} from "./ports.js";

/** Filters for querying audit log. */
export interface AuditFilter {
  eventKind?: AuditEventKind;
  entityKind?: string;
  since?: number;
  until?: number;
  limit?: number;
}

interface KeyVaultRow {
  id: string;
  alt_name: string;
  wrapped_material: Buffer;
  material_iv: Buffer;
  material_tag: Buffer;
  created_at: number;
}

interface DocumentRow {
  id: string;
  body: string;
}

interface AuditRow {
  id: number;
  timestamp: number;
  event_kind: string;
  actor: string;
  entity_kind: string | null;
  field_name: string | null;
  detail_encrypted: Buffer | null;
  detail_iv: Buffer | null;
  detail_tag: Buffer | null;
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : "unknown";
}

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}

function optionalBuffer(bytes: Uint8Array | null): Buffer | null {
  return bytes ? Buffer.from(bytes) : null;
}

function optionalBytes(buf: Buffer | null): Uint8Array | null {
  return buf ? new Uint8Array(buf) : null;
}

/**
 * SQLite-backed key vault, document store and audit log. Documents are kept
 * as extended JSON in a single table keyed by (collection, id).
 */
export class SqliteStore implements KeyVaultStore, DocumentStore {
  readonly db: Database.Database;

  constructor(path: string) {
    try {
      this.db = new Database(path);
    } catch (err) {
      throw PhiError.databaseError(`Failed to open database: ${message(err)}`, err);
    }

    this.setPragmas();
    this.runMigrations();
  }

  private setPragmas(): void {
    for (const [key, value] of Object.entries(SQLITE_PRAGMAS)) {
      this.db.pragma(`${key} = ${value}`);
    }
  }

  private runMigrations(): void {
    if (this.getMigrationVersion() < STORE_SCHEMA_VERSION) {
      this.db.exec(migration001.up);
      this.setMeta("schema_version", String(migration001.version));
    }
  }

  private getMigrationVersion(): number {
    const row = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name='store_meta'",
      )
      .get();
    if (!row) return 0;

    const version = this.getMeta("schema_version");
    return version ? parseInt(version, 10) : 0;
  }

  // ---------------------------------------------------------------------------
  // store_meta
  // ---------------------------------------------------------------------------

  getMeta(key: string): string | undefined {
    return this.db
      .prepare<[string], { value: string }>("SELECT value FROM store_meta WHERE key = ?")
      .get(key)?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare<[string, string]>("INSERT OR REPLACE INTO store_meta (key, value) VALUES (?, ?)")
      .run(key, value);
  }

  // ---------------------------------------------------------------------------
  // key_vault
  // ---------------------------------------------------------------------------

  findDataKeyByAltName(altName: string): StoredDataKey | undefined {
    const row = this.db
      .prepare<[string], KeyVaultRow>("SELECT * FROM key_vault WHERE alt_name = ?")
      .get(altName);
    return row ? this.rowToDataKey(row) : undefined;
  }

  findDataKeyById(id: string): StoredDataKey | undefined {
    const row = this.db
      .prepare<[string], KeyVaultRow>("SELECT * FROM key_vault WHERE id = ?")
      .get(id);
    return row ? this.rowToDataKey(row) : undefined;
  }

  insertDataKey(key: StoredDataKey): "ok" | "conflict" {
    try {
      this.db
        .prepare<[string, string, Buffer, Buffer, Buffer, number]>(
          `INSERT INTO key_vault (
            id, alt_name, wrapped_material, material_iv, material_tag, created_at
          ) VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          key.id,
          key.alt_name,
          Buffer.from(key.wrapped_material),
          Buffer.from(key.material_iv),
          Buffer.from(key.material_tag),
          key.created_at,
        );
      return "ok";
    } catch (err) {
      if (isUniqueViolation(err)) return "conflict";
      throw PhiError.databaseError(`Failed to insert data key: ${message(err)}`, err);
    }
  }

  // ---------------------------------------------------------------------------
  // documents
  // ---------------------------------------------------------------------------

  getDocument(collection: string, id: string): StorageDocument | undefined {
    const row = this.db
      .prepare<[string, string], DocumentRow>(
        "SELECT id, body FROM documents WHERE collection = ? AND id = ?",
      )
      .get(collection, id);
    return row ? this.rowToDocument(row) : undefined;
  }

  /** Equality match on top-level fields, compared by their extended JSON form. */
  findDocuments(collection: string, filter: DocumentFilter): StorageDocument[] {
    const wanted = Object.entries(filter).map(
      ([field, value]): [string, string] => [field, JSON.stringify(toExtendedJson(value))],
    );

    const rows = this.db
      .prepare<[string], DocumentRow>(
        "SELECT id, body FROM documents WHERE collection = ? ORDER BY created_at, id",
      )
      .all(collection);

    return rows
      .map((row) => this.rowToDocument(row))
      .filter((doc) =>
        wanted.every(([field, expected]) => {
          const actual = doc[field];
          return actual !== undefined && JSON.stringify(toExtendedJson(actual)) === expected;
        }),
      );
  }

  putDocument(collection: string, doc: StorageDocument): string {
    const existingId = doc[ID_FIELD];
    if (existingId !== undefined && typeof existingId !== "string") {
      throw PhiError.invalidInput(`${ID_FIELD} must be a string`);
    }
    const id = existingId ?? generateUUIDv7();
    const body = JSON.stringify(toExtendedJson({ ...doc, [ID_FIELD]: id }));
    const now = Date.now();

    try {
      this.db
        .prepare<[string, string, string, number, number]>(
          `INSERT INTO documents (collection, id, body, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT (collection, id) DO UPDATE SET body = excluded.body, updated_at = excluded.updated_at`,
        )
        .run(collection, id, body, now, now);
    } catch (err) {
      throw PhiError.databaseError(`Failed to write ${collection}/${id}: ${message(err)}`, err);
    }
    return id;
  }

  // ---------------------------------------------------------------------------
  // audit_log
  // ---------------------------------------------------------------------------

  insertAuditEvent(event: Omit<AuditEvent, "id">): number {
    const result = this.db
      .prepare<
        [number, string, string, string | null, string | null, Buffer | null, Buffer | null, Buffer | null]
      >(
        `INSERT INTO audit_log (
          timestamp, event_kind, actor, entity_kind, field_name,
          detail_encrypted, detail_iv, detail_tag
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.timestamp,
        event.event_kind,
        event.actor,
        event.entity_kind,
        event.field_name,
        optionalBuffer(event.detail_encrypted),
        optionalBuffer(event.detail_iv),
        optionalBuffer(event.detail_tag),
      );
    return Number(result.lastInsertRowid);
  }

  queryAuditLog(filter?: AuditFilter): AuditEvent[] {
    let sql = "SELECT * FROM audit_log WHERE 1=1";
    const params: (string | number)[] = [];

    if (filter?.eventKind) {
      sql += " AND event_kind = ?";
      params.push(filter.eventKind);
    }
    if (filter?.entityKind) {
      sql += " AND entity_kind = ?";
      params.push(filter.entityKind);
    }
    if (filter?.since !== undefined) {
      sql += " AND timestamp >= ?";
      params.push(filter.since);
    }
    if (filter?.until !== undefined) {
      sql += " AND timestamp <= ?";
      params.push(filter.until);
    }

    sql += " ORDER BY timestamp DESC, id DESC";

    if (filter?.limit) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }

    const rows = this.db.prepare<(string | number)[], AuditRow>(sql).all(...params);
    return rows.map((row) => this.rowToAuditEvent(row));
  }

  // ---------------------------------------------------------------------------
  // Transaction helper
  // ---------------------------------------------------------------------------

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  // ---------------------------------------------------------------------------
  // Row mappers
  // ---------------------------------------------------------------------------

  private rowToDataKey(row: KeyVaultRow): StoredDataKey {
    return {
      id: row.id,
      alt_name: row.alt_name,
      wrapped_material: new Uint8Array(row.wrapped_material),
      material_iv: new Uint8Array(row.material_iv),
      material_tag: new Uint8Array(row.material_tag),
      created_at: row.created_at,
    };
  }

  private rowToDocument(row: DocumentRow): StorageDocument {
    let parsed: StoredValue;
    try {
      parsed = fromExtendedJson(JSON.parse(row.body));
    } catch (err) {
      throw PhiError.databaseError(`Corrupt document ${row.id}: ${message(err)}`, err);
    }
    if (
      parsed === null ||
      typeof parsed !== "object" ||
      Array.isArray(parsed) ||
      parsed instanceof Date ||
      parsed instanceof CipherValue
    ) {
      throw PhiError.databaseError(`Corrupt document ${row.id}: body is not an object`);
    }
    return parsed;
  }

  private rowToAuditEvent(row: AuditRow): AuditEvent {
    return {
      id: row.id,
      timestamp: row.timestamp,
      event_kind: auditEventKindSchema.parse(row.event_kind),
      actor: row.actor,
      entity_kind: row.entity_kind,
      field_name: row.field_name,
      detail_encrypted: optionalBytes(row.detail_encrypted),
      detail_iv: optionalBytes(row.detail_iv),
      detail_tag: optionalBytes(row.detail_tag),
    };
  }
}
