import type { FieldPolicyTable } from "@phi-shield/shared";
import { Algorithm, PhiError, fieldPolicyTableSchema } from "@phi-shield/shared";

/**
 * Immutable (entityKind, fieldName) → algorithm table. Lookups are total:
 * anything not listed is `none` and never reaches the cipher.
 */
export class FieldPolicy {
  private readonly table: ReadonlyMap<string, ReadonlyMap<string, Algorithm>>;

  private constructor(table: FieldPolicyTable) {
    const entities = new Map<string, ReadonlyMap<string, Algorithm>>();
    for (const [entityKind, fields] of Object.entries(table)) {
      const byField = new Map<string, Algorithm>();
      for (const [fieldName, entry] of Object.entries(fields)) {
        byField.set(fieldName, entry.algorithm);
      }
      entities.set(entityKind, byField);
    }
    this.table = entities;
    Object.freeze(this);
  }

  /** Validate an untrusted table (e.g. parsed JSON) and build a policy. */
  static fromTable(raw: unknown): FieldPolicy {
    const parsed = fieldPolicyTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw PhiError.configInvalid(
        "Invalid field policy table",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }
    return new FieldPolicy(parsed.data);
  }

  algorithmFor(entityKind: string, fieldName: string): Algorithm {
    return this.table.get(entityKind)?.get(fieldName) ?? Algorithm.NONE;
  }

  /** Fields of `entityKind` that are encrypted, with their algorithm. */
  governedFields(entityKind: string): [string, Algorithm][] {
    return [...(this.table.get(entityKind) ?? new Map<string, Algorithm>())];
  }
}
