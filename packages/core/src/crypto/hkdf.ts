import { hkdf } from "node:crypto";
import { promisify } from "node:util";
import { AES_KEY_LENGTH, PhiError } from "@phi-shield/shared";

const hkdfAsync = promisify(hkdf);

/** Domain separation for a key derived from the master key. */
export interface SubkeyContext {
  salt: string;
  info: string;
  /** Output size in bytes; an AES-256 key unless set. */
  length?: number;
}

/** HKDF-SHA256 subkey, e.g. the audit-detail key, from the master key. */
export async function deriveSubkey(ikm: Uint8Array, context: SubkeyContext): Promise<Uint8Array> {
  const { salt, info, length = AES_KEY_LENGTH } = context;
  try {
    return new Uint8Array(await hkdfAsync("sha256", ikm, salt, info, length));
  } catch (err) {
    throw PhiError.keyUnavailable(
      `subkey derivation failed: ${err instanceof Error ? err.message : "unknown error"}`,
      err,
    );
  }
}
