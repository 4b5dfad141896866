import type { CompositeFieldType, CompositeValue, FieldValue, Result } from "@phi-shield/shared";
import { PhiError, err, ok } from "@phi-shield/shared";
import type { JsonValue } from "../storage/document-json.js";

const MARKER_KEYS: ReadonlySet<string> = new Set(["$date", "$oid", "$map"]);

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function encode(value: FieldValue): JsonValue {
  switch (value.kind) {
    case "string":
    case "boolean":
      return value.value;
    case "number":
      if (!Number.isFinite(value.value)) {
        throw PhiError.invalidInput(`Cannot canonicalize non-finite number ${value.value}`);
      }
      return value.value;
    case "timestamp":
      if (Number.isNaN(value.value.getTime())) {
        throw PhiError.invalidInput("Cannot canonicalize an invalid date");
      }
      return { $date: value.value.toISOString() };
    case "id":
      return { $oid: value.value };
    case "list":
      return value.items.map(encode);
    case "map": {
      const out: { [key: string]: JsonValue } = {};
      const entries = Object.entries(value.entries).sort(byKey);
      for (const [key, entry] of entries) {
        out[key] = encode(entry);
      }
      return entries.some(([key]) => MARKER_KEYS.has(key)) ? { $map: out } : out;
    }
  }
}

/**
 * Stable string form of a composite: JSON with map keys sorted, timestamps as
 * `{"$date"}`, ids as `{"$oid"}`. Equal values always encode to equal strings.
 *
 * @throws PhiError INVALID_INPUT for non-finite numbers or invalid dates
 */
export function canonicalize(value: CompositeValue): string {
  return JSON.stringify(encode(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeEntries(obj: Record<string, unknown>): { [key: string]: FieldValue } {
  const entries: { [key: string]: FieldValue } = {};
  for (const [key, entry] of Object.entries(obj)) {
    entries[key] = decode(entry);
  }
  return entries;
}

function decode(json: unknown): FieldValue {
  if (typeof json === "string") return { kind: "string", value: json };
  if (typeof json === "number") return { kind: "number", value: json };
  if (typeof json === "boolean") return { kind: "boolean", value: json };
  if (Array.isArray(json)) return { kind: "list", items: json.map(decode) };
  if (!isRecord(json)) {
    throw new SyntaxError(`unexpected ${json === null ? "null" : typeof json}`);
  }

  if (Object.keys(json).length === 1) {
    if (typeof json.$date === "string") {
      const date = new Date(json.$date);
      if (Number.isNaN(date.getTime())) throw new SyntaxError("invalid $date");
      return { kind: "timestamp", value: date };
    }
    if (typeof json.$oid === "string") return { kind: "id", value: json.$oid };
    if (isRecord(json.$map)) return { kind: "map", entries: decodeEntries(json.$map) };
  }
  return { kind: "map", entries: decodeEntries(json) };
}

export function emptyComposite(shape: CompositeFieldType): CompositeValue {
  return shape === "list" ? { kind: "list", items: [] } : { kind: "map", entries: {} };
}

/**
 * Recover a composite of the expected shape from whatever a stored field held:
 * a native composite (never-encrypted records) is returned as is, a string is
 * parsed as the canonical encoding, and anything else is reported as drift.
 */
export function decanonicalize(
  input: FieldValue,
  shape: CompositeFieldType,
): Result<CompositeValue, string> {
  if (input.kind === "list" || input.kind === "map") {
    return input.kind === shape ? ok(input) : err(`expected ${shape}, found ${input.kind}`);
  }
  if (input.kind !== "string") {
    return err(`expected ${shape}, found ${input.kind}`);
  }

  let decoded: FieldValue;
  try {
    decoded = decode(JSON.parse(input.value));
  } catch {
    // Parser messages can quote the plaintext; report the shape only.
    return err(`not a canonical ${shape}`);
  }
  if (decoded.kind !== shape || (decoded.kind !== "list" && decoded.kind !== "map")) {
    return err(`expected ${shape}, found ${decoded.kind}`);
  }
  return ok(decoded);
}
