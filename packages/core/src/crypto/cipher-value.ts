import {
  AES_IV_LENGTH,
  AES_TAG_LENGTH,
  Algorithm,
  CIPHER_HEADER_LENGTH,
  CIPHER_MIN_LENGTH,
  type EncryptingAlgorithm,
  FieldType,
  KEY_ID_LENGTH,
  PhiError,
} from "@phi-shield/shared";
import { uuidToBytes, uuidToString } from "./random.js";

const ALGORITHM_TAGS: Record<EncryptingAlgorithm, number> = {
  [Algorithm.DETERMINISTIC]: 1,
  [Algorithm.RANDOM]: 2,
};

const TYPE_TAGS: Record<FieldType, number> = {
  [FieldType.STRING]: 0x02,
  [FieldType.NUMBER]: 0x01,
  [FieldType.BOOLEAN]: 0x08,
  [FieldType.TIMESTAMP]: 0x09,
  [FieldType.ID]: 0x07,
  [FieldType.LIST]: 0x04,
  [FieldType.MAP]: 0x03,
};

function reverse<K extends string>(keys: readonly K[], tags: Record<K, number>): Map<number, K> {
  return new Map(keys.map((key): [number, K] => [tags[key], key]));
}

const ALGORITHMS_BY_TAG = reverse([Algorithm.DETERMINISTIC, Algorithm.RANDOM], ALGORITHM_TAGS);
const TYPES_BY_TAG = reverse(Object.values(FieldType), TYPE_TAGS);

export interface CipherHeader {
  algorithm: EncryptingAlgorithm;
  keyId: string;
  valueType: FieldType;
}

export interface CipherParts {
  header: Uint8Array;
  iv: Uint8Array;
  tag: Uint8Array;
  ciphertext: Uint8Array;
}

/** Serialize the 18-byte header; it doubles as the AEAD additional data. */
export function encodeHeader(header: CipherHeader): Uint8Array {
  const out = new Uint8Array(CIPHER_HEADER_LENGTH);
  out[0] = ALGORITHM_TAGS[header.algorithm];
  out.set(uuidToBytes(header.keyId), 1);
  out[1 + KEY_ID_LENGTH] = TYPE_TAGS[header.valueType];
  return out;
}

function parseHeader(bytes: Uint8Array): CipherHeader {
  if (bytes.length < CIPHER_MIN_LENGTH) {
    throw PhiError.decryptionFailure(
      `cipher value must be at least ${CIPHER_MIN_LENGTH} bytes, got ${bytes.length}`,
    );
  }
  const algorithmTag = bytes[0] ?? -1;
  const algorithm = ALGORITHMS_BY_TAG.get(algorithmTag);
  if (!algorithm) {
    throw PhiError.decryptionFailure(`unknown algorithm tag ${algorithmTag}`);
  }
  const typeTag = bytes[1 + KEY_ID_LENGTH] ?? -1;
  const valueType = TYPES_BY_TAG.get(typeTag);
  if (!valueType) {
    throw PhiError.decryptionFailure(`unknown value type tag ${typeTag}`);
  }
  const keyId = uuidToString(bytes.subarray(1, 1 + KEY_ID_LENGTH));
  return { algorithm, keyId, valueType };
}

/**
 * Self-describing encrypted blob. Instances are only ever produced by the
 * encryption engine or by decoding a stored binary of the cipher subtype;
 * the bytes are not validated until {@link CipherValue.header} or
 * {@link CipherValue.parts} is read.
 */
export class CipherValue {
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes);
  }

  static assemble(parts: CipherParts): CipherValue {
    const total =
      parts.header.length + parts.iv.length + parts.tag.length + parts.ciphertext.length;
    const bytes = new Uint8Array(total);
    let offset = 0;
    for (const chunk of [parts.header, parts.iv, parts.tag, parts.ciphertext]) {
      bytes.set(chunk, offset);
      offset += chunk.length;
    }
    return new CipherValue(bytes);
  }

  static fromBase64(encoded: string): CipherValue {
    return new CipherValue(new Uint8Array(Buffer.from(encoded, "base64")));
  }

  toBase64(): string {
    return Buffer.from(this.bytes).toString("base64");
  }

  /** @throws PhiError DECRYPTION_FAILURE when the blob is malformed */
  get header(): CipherHeader {
    return parseHeader(this.bytes);
  }

  /** @throws PhiError DECRYPTION_FAILURE when the blob is malformed */
  get parts(): CipherParts {
    parseHeader(this.bytes);
    const ivStart = CIPHER_HEADER_LENGTH;
    const tagStart = ivStart + AES_IV_LENGTH;
    const ctStart = tagStart + AES_TAG_LENGTH;
    return {
      header: this.bytes.slice(0, CIPHER_HEADER_LENGTH),
      iv: this.bytes.slice(ivStart, tagStart),
      tag: this.bytes.slice(tagStart, ctStart),
      ciphertext: this.bytes.slice(ctStart),
    };
  }

  equals(other: CipherValue): boolean {
    return Buffer.from(this.bytes).equals(Buffer.from(other.bytes));
  }
}

export function isCipherValue(value: unknown): value is CipherValue {
  return value instanceof CipherValue;
}
