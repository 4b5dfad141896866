import { randomBytes, randomFillSync } from "node:crypto";
import { KEY_ID_LENGTH, PhiError } from "@phi-shield/shared";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
// Hex offsets where a hyphen goes: 8-4-4-4-12.
const GROUP_ENDS = [8, 12, 16, 20, 32] as const;

export function generateRandomBytes(length: number): Uint8Array {
  return new Uint8Array(randomBytes(length));
}

/**
 * Time-ordered identifier (RFC 9562 version 7). Record ids and data-key ids
 * use it so rows sort roughly by creation time.
 */
export function generateUUIDv7(now: number = Date.now()): string {
  const bytes = Buffer.alloc(KEY_ID_LENGTH);
  bytes.writeUIntBE(now, 0, 6);
  randomFillSync(bytes, 6);
  bytes.writeUInt8((bytes.readUInt8(6) & 0x0f) | 0x70, 6);
  bytes.writeUInt8((bytes.readUInt8(8) & 0x3f) | 0x80, 8);
  return uuidToString(bytes);
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/** 16 bytes as the lowercase hyphenated form used for key ids in cipher headers. */
export function uuidToString(bytes: Uint8Array): string {
  if (bytes.length !== KEY_ID_LENGTH) {
    throw PhiError.invalidInput(`UUID must be ${KEY_ID_LENGTH} bytes, got ${bytes.length}`);
  }
  const hex = Buffer.from(bytes).toString("hex");
  let start = 0;
  const groups: string[] = [];
  for (const end of GROUP_ENDS) {
    groups.push(hex.slice(start, end));
    start = end;
  }
  return groups.join("-");
}

export function uuidToBytes(uuid: string): Uint8Array {
  const lower = uuid.toLowerCase();
  if (!isUuid(lower)) {
    throw PhiError.invalidInput(`Invalid UUID: ${uuid}`);
  }
  return new Uint8Array(Buffer.from(lower.replaceAll("-", ""), "hex"));
}

/** Overwrite key material in place once it is no longer needed. */
export function wipeBuffer(buf: Uint8Array): void {
  randomFillSync(buf);
}
