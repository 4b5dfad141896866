import { describe, expect, it } from "vitest";
import { Algorithm, ErrorCode, FieldType } from "@phi-shield/shared";
import { CipherValue } from "./cipher-value.js";
import {
  createMasterKeyCheck,
  decryptFieldBytes,
  encryptFieldBytes,
  generateDataKeyMaterial,
  unwrapDataKey,
  verifyMasterKeyCheck,
  wrapDataKey,
} from "./key-hierarchy.js";
import { generateRandomBytes, generateUUIDv7 } from "./random.js";

const text = (s: string) => new Uint8Array(Buffer.from(s, "utf8"));

describe("data key wrapping", () => {
  it("generates 64 bytes of material", () => {
    expect(generateDataKeyMaterial()).toHaveLength(64);
  });

  it("round-trips material under the master key", () => {
    const master = generateRandomBytes(32);
    const material = generateDataKeyMaterial();
    const keyId = generateUUIDv7();

    const wrapped = wrapDataKey(master, material, keyId);
    expect(unwrapDataKey(master, wrapped, keyId)).toEqual(material);
  });

  it("binds the wrapped material to its key id", () => {
    const master = generateRandomBytes(32);
    const wrapped = wrapDataKey(master, generateDataKeyMaterial(), generateUUIDv7());

    expect(() => unwrapDataKey(master, wrapped, generateUUIDv7())).toThrow(
      expect.objectContaining({ code: ErrorCode.DECRYPTION_FAILURE }),
    );
  });

  it("fails under a different master key", () => {
    const keyId = generateUUIDv7();
    const wrapped = wrapDataKey(generateRandomBytes(32), generateDataKeyMaterial(), keyId);

    expect(() => unwrapDataKey(generateRandomBytes(32), wrapped, keyId)).toThrow("decryption failed");
  });
});

describe("field encryption", () => {
  const keyId = generateUUIDv7();
  const material = generateDataKeyMaterial();

  it("is byte-identical for deterministic encryption of equal input", () => {
    const a = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.STRING, text("a@b.com"));
    const b = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.STRING, text("a@b.com"));
    expect(a.equals(b)).toBe(true);
  });

  it("differs for deterministic encryption of different input", () => {
    const a = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.STRING, text("a@b.com"));
    const b = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.STRING, text("c@d.com"));
    expect(a.equals(b)).toBe(false);
  });

  it("separates equal plaintexts of different value types", () => {
    const a = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.STRING, text("x"));
    const b = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.ID, text("x"));
    expect(a.equals(b)).toBe(false);
  });

  it("never repeats for random encryption", () => {
    const a = encryptFieldBytes(keyId, material, Algorithm.RANDOM, FieldType.STRING, text("free text"));
    const b = encryptFieldBytes(keyId, material, Algorithm.RANDOM, FieldType.STRING, text("free text"));
    expect(a.equals(b)).toBe(false);
  });

  it("records algorithm, key id and value type in the header", () => {
    const value = encryptFieldBytes(keyId, material, Algorithm.RANDOM, FieldType.LIST, text("[]"));
    expect(value.header).toEqual({ algorithm: Algorithm.RANDOM, keyId, valueType: FieldType.LIST });
  });

  it("decrypts back to the plaintext and type", () => {
    const value = encryptFieldBytes(keyId, material, Algorithm.RANDOM, FieldType.STRING, text("free text"));
    const { valueType, plaintext } = decryptFieldBytes(material, value);
    expect(valueType).toBe(FieldType.STRING);
    expect(Buffer.from(plaintext).toString("utf8")).toBe("free text");
  });

  it("rejects a tampered header", () => {
    const value = encryptFieldBytes(keyId, material, Algorithm.DETERMINISTIC, FieldType.STRING, text("x"));
    const bytes = new Uint8Array(value.bytes);
    bytes[17] = 0x07; // string -> id type tag
    expect(() => decryptFieldBytes(material, new CipherValue(bytes))).toThrow("decryption failed");
  });

  it("rejects material of the wrong size", () => {
    expect(() =>
      encryptFieldBytes(keyId, new Uint8Array(32), Algorithm.RANDOM, FieldType.STRING, text("x")),
    ).toThrow("Data key material must be 64 bytes, got 32");
  });
});

describe("master key check", () => {
  it("verifies with the same key only", () => {
    const master = generateRandomBytes(32);
    const check = createMasterKeyCheck(master);

    expect(verifyMasterKeyCheck(master, check)).toBe(true);
    expect(verifyMasterKeyCheck(generateRandomBytes(32), check)).toBe(false);
  });
});
