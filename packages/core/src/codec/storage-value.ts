import type { FieldValue } from "@phi-shield/shared";
import { CipherValue } from "../crypto/cipher-value.js";
import type { StoredScalar, StoredValue } from "../storage/ports.js";

type StoredComposite = StoredValue[] | { [key: string]: StoredValue };

/**
 * What a stored field turned out to be, decided once when a document is read.
 * `legacy-composite` is a list or map written before the field was encrypted.
 */
export type StorageValue =
  | { kind: "plain"; value: Exclude<StoredScalar, null> }
  | { kind: "cipher"; value: CipherValue }
  | { kind: "legacy-composite"; value: StoredComposite }
  | { kind: "absent" };

export function classify(value: StoredValue | undefined): StorageValue {
  if (value === undefined || value === null) return { kind: "absent" };
  if (value instanceof CipherValue) return { kind: "cipher", value };
  if (value instanceof Date || typeof value !== "object") return { kind: "plain", value };
  return { kind: "legacy-composite", value };
}

/**
 * Read a plaintext stored value as a field value. Nulls inside composites are
 * dropped; a nested cipher blob is not plaintext and yields undefined.
 */
export function fromStored(value: StoredValue): FieldValue | undefined {
  if (value === null || value instanceof CipherValue) return undefined;
  if (typeof value === "string") return { kind: "string", value };
  if (typeof value === "number") return { kind: "number", value };
  if (typeof value === "boolean") return { kind: "boolean", value };
  if (value instanceof Date) return { kind: "timestamp", value };

  if (Array.isArray(value)) {
    const items: FieldValue[] = [];
    for (const item of value) {
      if (item === null) continue;
      const decoded = fromStored(item);
      if (!decoded) return undefined;
      items.push(decoded);
    }
    return { kind: "list", items };
  }

  const entries: { [key: string]: FieldValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry === null) continue;
    const decoded = fromStored(entry);
    if (!decoded) return undefined;
    entries[key] = decoded;
  }
  return { kind: "map", entries };
}

/** Plaintext stored form of a field value. Ids are stored as their string. */
export function toStored(value: FieldValue): StoredValue {
  switch (value.kind) {
    case "string":
    case "number":
    case "boolean":
    case "timestamp":
    case "id":
      return value.value;
    case "list":
      return value.items.map(toStored);
    case "map": {
      const out: { [key: string]: StoredValue } = {};
      for (const [key, entry] of Object.entries(value.entries)) {
        out[key] = toStored(entry);
      }
      return out;
    }
  }
}
