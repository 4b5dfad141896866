import { closeSync, fsyncSync, linkSync, openSync, unlinkSync, writeFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { MASTER_KEY_LENGTH, PhiError } from "@phi-shield/shared";
import { type Argon2Params, DEFAULT_ARGON2_PARAMS, deriveKey, generateSalt } from "../crypto/argon2.js";
import { createMasterKeyCheck, verifyMasterKeyCheck } from "../crypto/key-hierarchy.js";
import { generateRandomBytes } from "../crypto/random.js";

export type MasterKeySource =
  | { kind: "file"; path: string }
  | { kind: "passphrase"; passphrase: string; argon2?: Argon2Params };

/** The slice of the store's meta table the master key needs. */
export interface MetaStore {
  getMeta(key: string): string | undefined;
  setMeta(key: string, value: string): void;
}

const META_KDF_SALT = "kdf_salt";
const META_KEY_CHECK = "master_key_check";
const META_KEY_CHECK_IV = "master_key_check_iv";
const META_KEY_CHECK_TAG = "master_key_check_tag";

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function loadBase64Meta(meta: MetaStore, key: string): Uint8Array | undefined {
  const value = meta.getMeta(key);
  return value ? new Uint8Array(Buffer.from(value, "base64")) : undefined;
}

function saveBase64Meta(meta: MetaStore, key: string, value: Uint8Array): void {
  meta.setMeta(key, Buffer.from(value).toString("base64"));
}

async function readKeyFile(path: string): Promise<Uint8Array> {
  let raw: Buffer;
  try {
    raw = await readFile(path);
  } catch (err) {
    const reason = errorCode(err) === "ENOENT" ? "not found" : "unreadable";
    throw PhiError.keyUnavailable(`master key file ${reason}: ${path}`, err);
  }
  if (raw.length !== MASTER_KEY_LENGTH) {
    throw PhiError.keyUnavailable(
      `master key file must contain ${MASTER_KEY_LENGTH} bytes, got ${raw.length}`,
    );
  }
  return new Uint8Array(raw);
}

async function deriveFromPassphrase(
  passphrase: string,
  params: Argon2Params,
  meta: MetaStore,
): Promise<Uint8Array> {
  let salt = loadBase64Meta(meta, META_KDF_SALT);
  if (!salt) {
    salt = generateSalt();
    saveBase64Meta(meta, META_KDF_SALT, salt);
  }
  return deriveKey(passphrase, salt, params);
}

// The first key to open a store is recorded; any other key is refused.
function checkAgainstStore(masterKey: Uint8Array, meta: MetaStore): void {
  const ciphertext = loadBase64Meta(meta, META_KEY_CHECK);
  const iv = loadBase64Meta(meta, META_KEY_CHECK_IV);
  const tag = loadBase64Meta(meta, META_KEY_CHECK_TAG);

  if (ciphertext && iv && tag) {
    if (!verifyMasterKeyCheck(masterKey, { ciphertext, iv, tag })) {
      throw PhiError.keyUnavailable("master key does not match this store");
    }
    return;
  }

  const check = createMasterKeyCheck(masterKey);
  saveBase64Meta(meta, META_KEY_CHECK, check.ciphertext);
  saveBase64Meta(meta, META_KEY_CHECK_IV, check.iv);
  saveBase64Meta(meta, META_KEY_CHECK_TAG, check.tag);
}

/**
 * Resolve the master key from its configured source and verify it against the
 * store. Fails closed with KEY_UNAVAILABLE.
 */
export async function loadMasterKey(source: MasterKeySource, meta: MetaStore): Promise<Uint8Array> {
  const masterKey =
    source.kind === "file"
      ? await readKeyFile(source.path)
      : await deriveFromPassphrase(source.passphrase, source.argon2 ?? DEFAULT_ARGON2_PARAMS, meta);

  checkAgainstStore(masterKey, meta);
  return masterKey;
}

/**
 * Write 32 random bytes to `path` with mode 0600. The file appears whole or
 * not at all, and an existing file is never replaced.
 */
export function createMasterKeyFile(path: string): void {
  const tmpPath = join(dirname(path), `.${basename(path)}.tmp.${process.pid}`);
  const key = generateRandomBytes(MASTER_KEY_LENGTH);

  try {
    writeFileSync(tmpPath, key, { mode: 0o600, flag: "wx" });
    const fd = openSync(tmpPath, "r+");
    try {
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    // link(2) fails with EEXIST instead of replacing the target
    linkSync(tmpPath, path);
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      throw PhiError.fileIoError(`refusing to overwrite existing file: ${path}`, err);
    }
    throw PhiError.fileIoError(
      `failed to write master key file: ${err instanceof Error ? err.message : "unknown"}`,
      err,
    );
  } finally {
    try {
      unlinkSync(tmpPath);
    } catch {
      // Already gone
    }
  }
}
