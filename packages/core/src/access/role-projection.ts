import type { RoleAccessTable, RoleAllowList, ViewMap } from "@phi-shield/shared";
import { PhiError, roleAccessTableSchema } from "@phi-shield/shared";

/** Base fields plus each held role's list. Unknown roles add nothing. */
export function allowedFields(allowList: RoleAllowList, roles: readonly string[]): Set<string> {
  const allowed = new Set(allowList.baseFields);
  for (const role of roles) {
    if (!Object.hasOwn(allowList.roles, role)) continue;
    for (const field of allowList.roles[role] ?? []) {
      allowed.add(field);
    }
  }
  return allowed;
}

/**
 * Copy out only the allow-listed fields of `view`. Fields are pulled in by
 * name; nothing that is not listed can reach the result.
 */
export function project(view: ViewMap, allowList: RoleAllowList, roles: readonly string[]): ViewMap {
  const out: ViewMap = {};
  for (const field of allowedFields(allowList, roles)) {
    const value = Object.hasOwn(view, field) ? view[field] : undefined;
    if (value !== undefined) out[field] = value;
  }
  return out;
}

/** Role allow-lists for every entity kind, validated and frozen at boot. */
export class RoleProjector {
  private readonly table: ReadonlyMap<string, RoleAllowList>;

  private constructor(table: RoleAccessTable) {
    this.table = new Map(
      Object.entries(table).map(([kind, list]): [string, RoleAllowList] => [
        kind,
        Object.freeze({
          baseFields: Object.freeze([...list.baseFields]),
          roles: Object.freeze(
            Object.fromEntries(
              Object.entries(list.roles).map(([role, fields]) => [role, Object.freeze([...fields])]),
            ),
          ),
        }),
      ]),
    );
    Object.freeze(this);
  }

  static fromTable(raw: unknown): RoleProjector {
    const parsed = roleAccessTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw PhiError.configInvalid(
        "Invalid role access table",
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      );
    }
    return new RoleProjector(parsed.data);
  }

  /** An entity kind with no allow-list exposes nothing. */
  project(entityKind: string, view: ViewMap, roles: readonly string[]): ViewMap {
    const allowList = this.table.get(entityKind);
    return allowList ? project(view, allowList, roles) : {};
  }
}
