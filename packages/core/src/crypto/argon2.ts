import { argon2id, hash } from "argon2";
import {
  ARGON2_HASH_LENGTH,
  ARGON2_MEMORY_COST,
  ARGON2_PARALLELISM,
  ARGON2_SALT_LENGTH,
  ARGON2_TIME_COST,
  ARGON2_VERSION,
  PhiError,
} from "@phi-shield/shared";
import { generateRandomBytes } from "./random.js";

/** Cost settings persisted beside the salt so a passphrase re-derives the same key. */
export interface Argon2Params {
  memoryCost: number;
  timeCost: number;
  parallelism: number;
}

export const DEFAULT_ARGON2_PARAMS: Readonly<Argon2Params> = Object.freeze({
  memoryCost: ARGON2_MEMORY_COST,
  timeCost: ARGON2_TIME_COST,
  parallelism: ARGON2_PARALLELISM,
});

export function generateSalt(): Uint8Array {
  return generateRandomBytes(ARGON2_SALT_LENGTH);
}

/** Stretch a passphrase into the 256-bit master key. */
export async function deriveKey(
  passphrase: string,
  salt: Uint8Array,
  params: Argon2Params = DEFAULT_ARGON2_PARAMS,
): Promise<Uint8Array> {
  let raw: Buffer;
  try {
    raw = await hash(passphrase, {
      ...params,
      type: argon2id,
      salt: Buffer.from(salt),
      hashLength: ARGON2_HASH_LENGTH,
      version: ARGON2_VERSION,
      raw: true,
    });
  } catch (err) {
    throw PhiError.keyUnavailable(
      `master key derivation failed: ${err instanceof Error ? err.message : "unknown error"}`,
      err,
    );
  }
  return new Uint8Array(raw);
}
