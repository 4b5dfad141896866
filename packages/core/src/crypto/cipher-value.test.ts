import { describe, expect, it } from "vitest";
import { Algorithm, ErrorCode, FieldType } from "@phi-shield/shared";
import { CipherValue, encodeHeader, isCipherValue } from "./cipher-value.js";

const KEY_ID = "01900000-0000-7000-8000-0000000000aa";

function sample(): CipherValue {
  return CipherValue.assemble({
    header: encodeHeader({ algorithm: Algorithm.DETERMINISTIC, keyId: KEY_ID, valueType: FieldType.MAP }),
    iv: new Uint8Array(12).fill(1),
    tag: new Uint8Array(16).fill(2),
    ciphertext: new Uint8Array([9, 9, 9]),
  });
}

describe("encodeHeader", () => {
  it("lays out algorithm tag, key id and type tag", () => {
    const header = encodeHeader({ algorithm: Algorithm.RANDOM, keyId: KEY_ID, valueType: FieldType.TIMESTAMP });
    expect(header).toHaveLength(18);
    expect(header[0]).toBe(2);
    expect(header[17]).toBe(0x09);
    expect(Buffer.from(header.subarray(1, 17)).toString("hex")).toBe("019000000000700080000000000000aa");
  });
});

describe("CipherValue", () => {
  it("splits back into its parts", () => {
    const value = sample();
    expect(value.bytes).toHaveLength(18 + 12 + 16 + 3);
    expect(value.parts.iv).toEqual(new Uint8Array(12).fill(1));
    expect(value.parts.tag).toEqual(new Uint8Array(16).fill(2));
    expect(value.parts.ciphertext).toEqual(new Uint8Array([9, 9, 9]));
    expect(value.header).toEqual({
      algorithm: Algorithm.DETERMINISTIC,
      keyId: KEY_ID,
      valueType: FieldType.MAP,
    });
  });

  it("survives base64", () => {
    const value = sample();
    expect(CipherValue.fromBase64(value.toBase64()).equals(value)).toBe(true);
  });

  it("copies its input bytes", () => {
    const bytes = new Uint8Array(sample().bytes);
    const value = new CipherValue(bytes);
    bytes[0] = 0;
    expect(value.bytes[0]).toBe(1);
  });

  it("rejects blobs shorter than header, IV and tag", () => {
    expect(() => new CipherValue(new Uint8Array(45)).header).toThrow(
      "cipher value must be at least 46 bytes, got 45",
    );
  });

  it("rejects unknown tags", () => {
    const bytes = new Uint8Array(sample().bytes);
    bytes[0] = 7;
    expect(() => new CipherValue(bytes).header).toThrow(
      expect.objectContaining({ code: ErrorCode.DECRYPTION_FAILURE, message: "Decryption failed: unknown algorithm tag 7" }),
    );

    const typed = new Uint8Array(sample().bytes);
    typed[17] = 0x42;
    expect(() => new CipherValue(typed).parts).toThrow("unknown value type tag 66");
  });

  it("is recognized by isCipherValue only", () => {
    expect(isCipherValue(sample())).toBe(true);
    expect(isCipherValue(sample().bytes)).toBe(false);
    expect(isCipherValue("AQID")).toBe(false);
  });
});
