import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { StoredDataKey } from "@phi-shield/shared";
import { AuditEventKind } from "@phi-shield/shared";
import { CipherValue } from "../crypto/cipher-value.js";
import { SqliteStore } from "./sqlite-store.js";

let store: SqliteStore;

function makeKey(overrides: Partial<StoredDataKey> = {}): StoredDataKey {
  return {
    id: "01900000-0000-7000-8000-000000000001",
    alt_name: "test-key",
    wrapped_material: new Uint8Array([1, 2, 3]),
    material_iv: new Uint8Array(12),
    material_tag: new Uint8Array(16),
    created_at: 1_700_000_000_000,
    ...overrides,
  };
}

beforeEach(() => {
  store = new SqliteStore(":memory:");
});

afterEach(() => {
  store.close();
});

describe("schema creation", () => {
  it("creates all four tables", () => {
    const names = store.db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((t) => t.name);

    expect(names).toContain("store_meta");
    expect(names).toContain("key_vault");
    expect(names).toContain("documents");
    expect(names).toContain("audit_log");
  });

  it("sets schema_version to 1", () => {
    expect(store.getMeta("schema_version")).toBe("1");
  });
});

describe("store_meta", () => {
  it("returns undefined for a missing key", () => {
    expect(store.getMeta("missing")).toBeUndefined();
  });

  it("overwrites an existing value", () => {
    store.setMeta("salt", "a");
    store.setMeta("salt", "b");
    expect(store.getMeta("salt")).toBe("b");
  });
});

describe("key_vault", () => {
  it("round-trips a data key by alt name and by id", () => {
    const key = makeKey();
    expect(store.insertDataKey(key)).toBe("ok");

    expect(store.findDataKeyByAltName("test-key")).toEqual(key);
    expect(store.findDataKeyById(key.id)).toEqual(key);
  });

  it("reports a conflict on a duplicate alt name", () => {
    store.insertDataKey(makeKey());
    const second = makeKey({ id: "01900000-0000-7000-8000-000000000002" });

    expect(store.insertDataKey(second)).toBe("conflict");
    expect(store.findDataKeyById(second.id)).toBeUndefined();
  });

  it("returns undefined for unknown keys", () => {
    expect(store.findDataKeyByAltName("nope")).toBeUndefined();
    expect(store.findDataKeyById("01900000-0000-7000-8000-00000000ffff")).toBeUndefined();
  });
});

describe("documents", () => {
  const cipher = new CipherValue(new Uint8Array(46).fill(7));

  it("assigns an id when none is given", () => {
    const id = store.putDocument("patients", { lastName: "Doe" });
    expect(store.getDocument("patients", id)).toEqual({ lastName: "Doe", _id: id });
  });

  it("preserves dates, cipher values and nested composites", () => {
    const createdAt = new Date("2024-03-01T10:00:00.000Z");
    store.putDocument("patients", {
      _id: "p1",
      createdAt,
      ssn: cipher,
      tags: ["a", 1, true, null],
      meta: { $date: "not a marker", nested: { ok: true } },
    });

    const doc = store.getDocument("patients", "p1");
    expect(doc?.createdAt).toEqual(createdAt);
    expect(doc?.ssn).toBeInstanceOf(CipherValue);
    expect(doc?.ssn instanceof CipherValue && doc.ssn.equals(cipher)).toBe(true);
    expect(doc?.tags).toEqual(["a", 1, true, null]);
    expect(doc?.meta).toEqual({ $date: "not a marker", nested: { ok: true } });
  });

  it("replaces a document with the same id", () => {
    store.putDocument("patients", { _id: "p1", lastName: "Doe" });
    store.putDocument("patients", { _id: "p1", lastName: "Roe" });

    expect(store.getDocument("patients", "p1")).toEqual({ _id: "p1", lastName: "Roe" });
  });

  it("keeps collections apart", () => {
    store.putDocument("patients", { _id: "x", kind: "patient" });
    expect(store.getDocument("messages", "x")).toBeUndefined();
  });

  it("finds documents by exact field values", () => {
    store.putDocument("patients", { _id: "p1", lastName: cipher, active: true });
    store.putDocument("patients", { _id: "p2", lastName: "Roe", active: true });
    store.putDocument("patients", { _id: "p3", lastName: cipher, active: false });

    const found = store.findDocuments("patients", { lastName: cipher, active: true });
    expect(found.map((d) => d._id)).toEqual(["p1"]);
  });

  it("does not match a document missing the filtered field", () => {
    store.putDocument("patients", { _id: "p1" });
    expect(store.findDocuments("patients", { lastName: null })).toEqual([]);
  });

  it("rejects a non-string _id", () => {
    expect(() => store.putDocument("patients", { _id: 5 })).toThrow("_id must be a string");
  });
});

describe("audit_log", () => {
  it("inserts and queries events newest first", () => {
    store.insertAuditEvent({
      timestamp: 1000,
      event_kind: AuditEventKind.KEY_CREATE,
      actor: "system",
      entity_kind: null,
      field_name: null,
      detail_encrypted: null,
      detail_iv: null,
      detail_tag: null,
    });
    store.insertAuditEvent({
      timestamp: 2000,
      event_kind: AuditEventKind.SCHEMA_DRIFT,
      actor: "system",
      entity_kind: "patient",
      field_name: "ssn",
      detail_encrypted: new Uint8Array([9]),
      detail_iv: new Uint8Array(12),
      detail_tag: new Uint8Array(16),
    });

    const all = store.queryAuditLog();
    expect(all.map((e) => e.event_kind)).toEqual([
      AuditEventKind.SCHEMA_DRIFT,
      AuditEventKind.KEY_CREATE,
    ]);
    expect(all[0]?.detail_encrypted).toEqual(new Uint8Array([9]));

    expect(store.queryAuditLog({ entityKind: "patient" })).toHaveLength(1);
    expect(store.queryAuditLog({ since: 1500 })).toHaveLength(1);
    expect(store.queryAuditLog({ limit: 1 })[0]?.timestamp).toBe(2000);
  });
});

describe("transaction", () => {
  it("rolls back on error", () => {
    expect(() =>
      store.transaction(() => {
        store.setMeta("k", "v");
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(store.getMeta("k")).toBeUndefined();
  });
});
