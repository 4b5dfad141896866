import { createHmac } from "node:crypto";
import {
  AAD_DATA_KEY,
  AAD_MASTER_KEY_CHECK,
  AES_IV_LENGTH,
  AES_KEY_LENGTH,
  Algorithm,
  DATA_KEY_MATERIAL_LENGTH,
  type EncryptingAlgorithm,
  type FieldType,
  PhiError,
} from "@phi-shield/shared";
import { open, type Sealed, seal } from "./aes-gcm.js";
import { CipherValue, encodeHeader } from "./cipher-value.js";
import { generateRandomBytes } from "./random.js";

/** Wrapped data-key material. */
export interface WrappedMaterial {
  wrappedMaterial: Uint8Array;
  materialIv: Uint8Array;
  materialTag: Uint8Array;
}

/** Encrypted value result. */
export type EncryptedValue = Sealed;

/** Plaintext bytes recovered from a cipher value, with the type they were encoded from. */
export interface DecryptedField {
  valueType: FieldType;
  plaintext: Uint8Array;
}

const MASTER_KEY_CHECK_PLAINTEXT = "phi-shield master key check";

/**
 * Generate fresh data-key material: 32 bytes of AES key followed by 32 bytes of MAC key.
 */
export function generateDataKeyMaterial(): Uint8Array {
  return generateRandomBytes(DATA_KEY_MATERIAL_LENGTH);
}

function splitMaterial(material: Uint8Array): { encKey: Uint8Array; macKey: Uint8Array } {
  if (material.length !== DATA_KEY_MATERIAL_LENGTH) {
    throw PhiError.internalError(
      `Data key material must be ${DATA_KEY_MATERIAL_LENGTH} bytes, got ${material.length}`,
    );
  }
  return {
    encKey: material.subarray(0, AES_KEY_LENGTH),
    macKey: material.subarray(AES_KEY_LENGTH),
  };
}

/**
 * Wrap data-key material with the master key.
 */
export function wrapDataKey(
  masterKey: Uint8Array,
  material: Uint8Array,
  keyId: string,
): WrappedMaterial {
  const { ciphertext, iv, tag } = seal(masterKey, material, AAD_DATA_KEY(keyId));
  return { wrappedMaterial: ciphertext, materialIv: iv, materialTag: tag };
}

/**
 * Unwrap data-key material with the master key.
 */
export function unwrapDataKey(
  masterKey: Uint8Array,
  wrapped: WrappedMaterial,
  keyId: string,
): Uint8Array {
  const sealed = {
    iv: wrapped.materialIv,
    tag: wrapped.materialTag,
    ciphertext: wrapped.wrappedMaterial,
  };
  return open(masterKey, sealed, AAD_DATA_KEY(keyId));
}

/**
 * SIV-style IV: a keyed hash of header and plaintext, so identical inputs under
 * the same key always select the same IV.
 */
function syntheticIv(macKey: Uint8Array, header: Uint8Array, plaintext: Uint8Array): Uint8Array {
  const mac = createHmac("sha256", macKey).update(header).update(plaintext).digest();
  return new Uint8Array(mac.subarray(0, AES_IV_LENGTH));
}

/**
 * Encrypt an encoded field value under a data key.
 */
export function encryptFieldBytes(
  keyId: string,
  material: Uint8Array,
  algorithm: EncryptingAlgorithm,
  valueType: FieldType,
  plaintext: Uint8Array,
): CipherValue {
  const { encKey, macKey } = splitMaterial(material);
  const header = encodeHeader({ algorithm, keyId, valueType });
  const iv =
    algorithm === Algorithm.DETERMINISTIC
      ? syntheticIv(macKey, header, plaintext)
      : generateRandomBytes(AES_IV_LENGTH);

  const { ciphertext, tag } = seal(encKey, plaintext, header, iv);
  return CipherValue.assemble({ header, iv, tag, ciphertext });
}

/**
 * Decrypt a cipher value with the material of the data key its header names.
 */
export function decryptFieldBytes(material: Uint8Array, value: CipherValue): DecryptedField {
  const { encKey } = splitMaterial(material);
  const { valueType } = value.header;
  const { header, iv, tag, ciphertext } = value.parts;
  return { valueType, plaintext: open(encKey, { iv, tag, ciphertext }, header) };
}

/**
 * Encrypt a fixed marker under the master key so a later load can tell a wrong
 * key (e.g. a mistyped passphrase) from a right one.
 */
export function createMasterKeyCheck(masterKey: Uint8Array): EncryptedValue {
  const plaintext = new Uint8Array(Buffer.from(MASTER_KEY_CHECK_PLAINTEXT, "utf8"));
  return seal(masterKey, plaintext, AAD_MASTER_KEY_CHECK);
}

export function verifyMasterKeyCheck(masterKey: Uint8Array, check: EncryptedValue): boolean {
  try {
    const plaintext = open(masterKey, check, AAD_MASTER_KEY_CHECK);
    return Buffer.from(plaintext).toString("utf8") === MASTER_KEY_CHECK_PLAINTEXT;
  } catch {
    return false; // Wrong key
  }
}
