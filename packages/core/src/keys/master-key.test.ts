import { mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode, PhiError } from "@phi-shield/shared";
import type { Argon2Params } from "../crypto/argon2.js";
import { SqliteStore } from "../storage/sqlite-store.js";
import { createMasterKeyFile, loadMasterKey } from "./master-key.js";

const FAST_ARGON2: Argon2Params = { memoryCost: 1024, timeCost: 2, parallelism: 1 };

let tempDir: string;
let store: SqliteStore;

beforeEach(() => {
  tempDir = join(tmpdir(), `phi-mk-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(tempDir, { recursive: true });
  store = new SqliteStore(":memory:");
});

afterEach(() => {
  store.close();
  rmSync(tempDir, { recursive: true, force: true });
});

async function expectKeyUnavailable(promise: Promise<unknown>, message: string): Promise<void> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(error).toBeInstanceOf(PhiError);
  expect(error).toMatchObject({ code: ErrorCode.KEY_UNAVAILABLE });
  expect(error instanceof Error ? error.message : "").toContain(message);
}

describe("createMasterKeyFile", () => {
  it("writes 32 bytes readable only by the owner", () => {
    const path = join(tempDir, "master.key");
    createMasterKeyFile(path);

    expect(readFileSync(path)).toHaveLength(32);
    if (process.platform !== "win32") {
      expect(statSync(path).mode & 0o777).toBe(0o600);
    }
  });

  it("refuses to overwrite an existing file", () => {
    const path = join(tempDir, "master.key");
    writeFileSync(path, "keep me");

    expect(() => createMasterKeyFile(path)).toThrow("refusing to overwrite existing file");
    expect(readFileSync(path, "utf8")).toBe("keep me");
  });
});

describe("loadMasterKey from file", () => {
  it("returns the file contents", async () => {
    const path = join(tempDir, "master.key");
    createMasterKeyFile(path);

    const key = await loadMasterKey({ kind: "file", path }, store);
    expect(key).toEqual(new Uint8Array(readFileSync(path)));
  });

  it("fails closed when the file is missing", async () => {
    await expectKeyUnavailable(
      loadMasterKey({ kind: "file", path: join(tempDir, "absent.key") }, store),
      "master key file not found",
    );
  });

  it("rejects a file of the wrong length", async () => {
    const path = join(tempDir, "short.key");
    writeFileSync(path, Buffer.alloc(16));

    await expectKeyUnavailable(
      loadMasterKey({ kind: "file", path }, store),
      "must contain 32 bytes, got 16",
    );
  });

  it("rejects a different key once the store has seen one", async () => {
    const first = join(tempDir, "first.key");
    const second = join(tempDir, "second.key");
    createMasterKeyFile(first);
    createMasterKeyFile(second);

    await loadMasterKey({ kind: "file", path: first }, store);
    await expectKeyUnavailable(
      loadMasterKey({ kind: "file", path: second }, store),
      "does not match this store",
    );
  });
});

describe("loadMasterKey from passphrase", () => {
  it("derives the same key on reopen and persists the salt", async () => {
    const source = { kind: "passphrase", passphrase: "test-passphrase", argon2: FAST_ARGON2 } as const;
    const k1 = await loadMasterKey(source, store);
    const k2 = await loadMasterKey(source, store);

    expect(k1).toHaveLength(32);
    expect(k2).toEqual(k1);
    expect(store.getMeta("kdf_salt")).toBeDefined();
  });

  it("detects a wrong passphrase", async () => {
    await loadMasterKey({ kind: "passphrase", passphrase: "test-passphrase", argon2: FAST_ARGON2 }, store);

    await expectKeyUnavailable(
      loadMasterKey({ kind: "passphrase", passphrase: "wrong-passphrase", argon2: FAST_ARGON2 }, store),
      "does not match this store",
    );
  });
});
