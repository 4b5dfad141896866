import type { EntityKind, FieldType, FieldValue, ViewMap, ViewValue } from "@phi-shield/shared";

/** Field values of one record, keyed by field name; `null` means unset. */
export type FieldMap = { [field: string]: FieldValue | null };

/**
 * How one kind of record maps to governed fields and to its outward view.
 * The codec only ever touches the fields declared here.
 */
export interface EntityDefinition<R extends { id: string | null }> {
  readonly kind: EntityKind;
  readonly collection: string;
  /** Declared fields other than the id, with their value types. */
  readonly fields: Readonly<Record<string, FieldType>>;
  toFields(record: R): FieldMap;
  /** Missing or unreadable fields arrive as `null` (scalars) or empty composites. */
  fromFields(id: string | null, fields: FieldMap): R;
  /** Every field rendered for display; role projection picks from this. */
  toView(record: R): ViewMap;
  /** Fill in bookkeeping timestamps before a save. */
  stamp(record: R, now: Date): R;
}

// ---------------------------------------------------------------------------
// Writers
// ---------------------------------------------------------------------------

export function stringField(value: string | null): FieldValue | null {
  return value === null ? null : { kind: "string", value };
}

export function idField(value: string | null): FieldValue | null {
  return value === null ? null : { kind: "id", value };
}

export function timestampField(value: Date | null): FieldValue | null {
  return value === null ? null : { kind: "timestamp", value };
}

export function numberField(value: number): FieldValue {
  return { kind: "number", value };
}

export function booleanField(value: boolean): FieldValue {
  return { kind: "boolean", value };
}

export function stringListField(values: readonly string[]): FieldValue {
  return { kind: "list", items: values.map((value) => ({ kind: "string", value })) };
}

export function stringMapField(values: Readonly<Record<string, string>>): FieldValue {
  const entries: { [key: string]: FieldValue } = {};
  for (const [key, value] of Object.entries(values)) {
    entries[key] = { kind: "string", value };
  }
  return { kind: "map", entries };
}

// ---------------------------------------------------------------------------
// Readers
// ---------------------------------------------------------------------------

type Maybe = FieldValue | null | undefined;

export function readString(value: Maybe): string | null {
  return value && (value.kind === "string" || value.kind === "id") ? value.value : null;
}

export function readDate(value: Maybe): Date | null {
  return value?.kind === "timestamp" ? value.value : null;
}

export function readNumber(value: Maybe, fallback: number): number {
  return value?.kind === "number" ? value.value : fallback;
}

export function readBoolean(value: Maybe, fallback: boolean): boolean {
  return value?.kind === "boolean" ? value.value : fallback;
}

/** Scalar items rendered as strings; nested composites are skipped. */
export function readStringList(value: Maybe): string[] {
  if (value?.kind !== "list") return [];
  const out: string[] = [];
  for (const item of value.items) {
    const text = scalarText(item);
    if (text !== null) out.push(text);
  }
  return out;
}

export function readStringMap(value: Maybe): Record<string, string> {
  if (value?.kind !== "map") return {};
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value.entries)) {
    const text = scalarText(entry);
    if (text !== null) out[key] = text;
  }
  return out;
}

export function readMapList(value: Maybe): { [key: string]: FieldValue }[] {
  if (value?.kind !== "list") return [];
  return value.items.flatMap((item) => (item.kind === "map" ? [item.entries] : []));
}

function scalarText(value: FieldValue): string | null {
  switch (value.kind) {
    case "string":
    case "id":
      return value.value;
    case "number":
    case "boolean":
      return String(value.value);
    case "timestamp":
      return value.value.toISOString();
    case "list":
    case "map":
      return null;
  }
}

// ---------------------------------------------------------------------------
// View formatting
// ---------------------------------------------------------------------------

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function dateText(value: Date): string {
  return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

/** `YYYY-MM-DD` in UTC. */
export function formatDate(value: Date | null): ViewValue {
  return value ? dateText(value) : null;
}

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export function formatTimestamp(value: Date | null): ViewValue {
  if (!value) return null;
  return `${dateText(value)} ${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
}
