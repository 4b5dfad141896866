import { CIPHER_BINARY_SUBTYPE, PhiError } from "@phi-shield/shared";
import { CipherValue } from "../crypto/cipher-value.js";
import type { StoredValue } from "./ports.js";

/** JSON value as written to the `documents.body` column. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Plain objects whose keys could be mistaken for a marker are wrapped in $map.
function needsEscape(obj: Record<string, unknown>): boolean {
  return Object.keys(obj).some((key) => key.startsWith("$"));
}

/**
 * Convert a stored value to extended JSON: cipher blobs become
 * `{"$binary":{"base64","subType":"06"}}` and dates `{"$date": iso}`.
 */
export function toExtendedJson(value: StoredValue): JsonValue {
  if (value instanceof CipherValue) {
    return { $binary: { base64: value.toBase64(), subType: CIPHER_BINARY_SUBTYPE } };
  }
  if (value instanceof Date) {
    return { $date: value.toISOString() };
  }
  if (Array.isArray(value)) {
    return value.map(toExtendedJson);
  }
  if (value === null || typeof value !== "object") {
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw PhiError.invalidInput(`Cannot store non-finite number ${value}`);
    }
    return value;
  }

  const out: { [key: string]: JsonValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = toExtendedJson(entry);
  }
  return needsEscape(value) ? { $map: out } : out;
}

// A marker that does not parse is read back as the plain map it is, so the
// codec reports that one field as drift instead of the document failing.
function decodeMarker(obj: Record<string, unknown>): StoredValue | undefined {
  const keys = Object.keys(obj);
  if (keys.length !== 1) return undefined;

  if ("$date" in obj) {
    const raw = obj.$date;
    const date = typeof raw === "string" ? new Date(raw) : undefined;
    return date && !Number.isNaN(date.getTime()) ? date : undefined;
  }

  if ("$binary" in obj) {
    const bin = obj.$binary;
    if (!isRecord(bin) || typeof bin.base64 !== "string" || bin.subType !== CIPHER_BINARY_SUBTYPE) {
      return undefined;
    }
    return CipherValue.fromBase64(bin.base64);
  }

  if ("$map" in obj) {
    const inner = obj.$map;
    return isRecord(inner) ? decodeEntries(inner) : undefined;
  }

  return undefined;
}

function decodeEntries(obj: Record<string, unknown>): { [key: string]: StoredValue } {
  const out: { [key: string]: StoredValue } = {};
  for (const [key, entry] of Object.entries(obj)) {
    out[key] = fromExtendedJson(entry);
  }
  return out;
}

/** Inverse of {@link toExtendedJson} over the output of `JSON.parse`. */
export function fromExtendedJson(json: unknown): StoredValue {
  if (json === null || typeof json === "string" || typeof json === "boolean") return json;
  if (typeof json === "number") return json;
  if (Array.isArray(json)) return json.map(fromExtendedJson);
  if (isRecord(json)) {
    return decodeMarker(json) ?? decodeEntries(json);
  }
  throw PhiError.databaseError(`Unsupported ${typeof json} value in stored document`);
}
