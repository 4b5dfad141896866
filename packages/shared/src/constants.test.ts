import { describe, expect, it } from "vitest";

import {
  AAD_DATA_KEY,
  AES_IV_LENGTH,
  AES_KEY_LENGTH,
  AES_TAG_LENGTH,
  CIPHER_HEADER_LENGTH,
  CIPHER_MIN_LENGTH,
  DATA_KEY_MATERIAL_LENGTH,
  DEFAULT_KEY_ALT_NAME,
  DOCUMENTATION_KEY_ID,
  KEY_ID_LENGTH,
  MASTER_KEY_LENGTH,
} from "./constants.js";

describe("crypto constants", () => {
  it("uses AES-256-GCM sizes", () => {
    expect(AES_KEY_LENGTH).toBe(32);
    expect(AES_IV_LENGTH).toBe(12);
    expect(AES_TAG_LENGTH).toBe(16);
  });

  it("master key is an AES key", () => {
    expect(MASTER_KEY_LENGTH).toBe(AES_KEY_LENGTH);
  });

  it("data key material holds an encryption key and a MAC key", () => {
    expect(DATA_KEY_MATERIAL_LENGTH).toBe(AES_KEY_LENGTH * 2);
  });
});

describe("cipher layout", () => {
  it("header is algorithm + key id + type tag", () => {
    expect(CIPHER_HEADER_LENGTH).toBe(18);
    expect(KEY_ID_LENGTH).toBe(16);
  });

  it("minimum length covers header, iv and tag", () => {
    expect(CIPHER_MIN_LENGTH).toBe(46);
  });
});

describe("key names", () => {
  it("default alt name", () => {
    expect(DEFAULT_KEY_ALT_NAME).toBe("hipaa_encryption_key");
  });

  it("AAD_DATA_KEY binds the key id", () => {
    expect(AAD_DATA_KEY("k1")).toBe("data-key:k1");
  });

  it("documentation key id is a well-formed uuid", () => {
    expect(DOCUMENTATION_KEY_ID).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});
