import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { AES_IV_LENGTH, AES_KEY_LENGTH, AES_TAG_LENGTH, PhiError } from "@phi-shield/shared";

const CIPHER = "aes-256-gcm";

/** AES-256-GCM output. The three parts travel together; any one alone is useless. */
export interface Sealed {
  iv: Uint8Array;
  tag: Uint8Array;
  ciphertext: Uint8Array;
}

/** Associated data is either a label (UTF-8) or raw bytes such as a cipher header. */
export type AssociatedData = string | Uint8Array;

function toAadBuffer(aad: AssociatedData): Buffer {
  return Buffer.from(typeof aad === "string" ? new TextEncoder().encode(aad) : aad);
}

function checkKey(key: Uint8Array): void {
  if (key.length === AES_KEY_LENGTH) return;
  throw PhiError.internalError(`AES key must be ${AES_KEY_LENGTH} bytes, got ${key.length}`);
}

/**
 * Seal bytes under a 256-bit key. A fresh IV is drawn when none is given;
 * a caller passing `iv` must derive it from the plaintext, since reusing an
 * IV across different plaintexts breaks GCM.
 */
export function seal(
  key: Uint8Array,
  plaintext: Uint8Array,
  aad: AssociatedData,
  iv?: Uint8Array,
): Sealed {
  checkKey(key);
  const nonce = iv ?? new Uint8Array(randomBytes(AES_IV_LENGTH));
  if (nonce.length !== AES_IV_LENGTH) {
    throw PhiError.internalError(`IV must be ${AES_IV_LENGTH} bytes, got ${nonce.length}`);
  }

  const cipher = createCipheriv(CIPHER, key, nonce);
  cipher.setAAD(toAadBuffer(aad));
  const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return {
    iv: Uint8Array.from(nonce),
    tag: new Uint8Array(cipher.getAuthTag()),
    ciphertext: new Uint8Array(body),
  };
}

/**
 * Open a sealed value. Any mismatch of key, associated data, tag or body
 * surfaces as a recoverable `DECRYPTION_FAILURE`.
 */
export function open(key: Uint8Array, sealed: Sealed, aad: AssociatedData): Uint8Array {
  checkKey(key);
  const { iv, tag, ciphertext } = sealed;
  if (iv.length !== AES_IV_LENGTH) {
    throw PhiError.decryptionFailure(`IV must be ${AES_IV_LENGTH} bytes, got ${iv.length}`);
  }
  if (tag.length !== AES_TAG_LENGTH) {
    throw PhiError.decryptionFailure(`Auth tag must be ${AES_TAG_LENGTH} bytes, got ${tag.length}`);
  }

  const decipher = createDecipheriv(CIPHER, key, iv);
  decipher.setAuthTag(tag);
  decipher.setAAD(toAadBuffer(aad));
  try {
    return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
  } catch (cause) {
    throw PhiError.decryptionFailure("AES-GCM decryption failed (auth tag mismatch or corrupted)", cause);
  }
}
