/**
 * Key of one list entity: a single field, or an ordered set of two or more fields.
 */
export type PrimaryKey =
  | { kind: 'single'; field: string }
  | { kind: 'multiple'; fields: string[] };

/** Entity name -> primary key. Insertion order follows declaration/merge order. */
export type PrimaryKeyMap = Map<string, PrimaryKey>;

/** JSON shape of a key: a string for a single field, an array otherwise. */
export type PrimaryKeyJson = string | string[];

/**
 * Parse the raw text between the quotes of a key clause.
 * Returns undefined when the clause holds no field names at all.
 */
export function parseKeyClause(raw: string): PrimaryKey | undefined {
  const tokens = raw.trim().split(/\s+/).filter((t) => t !== '');
  if (tokens.length === 0) return undefined;
  if (tokens.length === 1) return { kind: 'single', field: tokens[0] };
  return { kind: 'multiple', fields: tokens };
}

export function primaryKeyFields(key: PrimaryKey): string[] {
  return key.kind === 'single' ? [key.field] : [...key.fields];
}

export function primaryKeysEqual(a: PrimaryKey, b: PrimaryKey): boolean {
  const fa = primaryKeyFields(a);
  const fb = primaryKeyFields(b);
  return a.kind === b.kind && fa.length === fb.length && fa.every((f, i) => f === fb[i]);
}

export function primaryKeyToJson(key: PrimaryKey): PrimaryKeyJson {
  return key.kind === 'single' ? key.field : [...key.fields];
}

export function primaryKeyFromJson(value: PrimaryKeyJson): PrimaryKey {
  if (typeof value === 'string') return { kind: 'single', field: value };
  if (value.length === 1) return { kind: 'single', field: value[0] };
  return { kind: 'multiple', fields: [...value] };
}

export function formatPrimaryKey(key: PrimaryKey): string {
  return key.kind === 'single' ? `"${key.field}"` : `[${key.fields.map((f) => `"${f}"`).join(', ')}]`;
}

export type OverwriteEvent = {
  entity: string;
  previous: PrimaryKey;
  next: PrimaryKey;
};

/**
 * Merge `source` into `target` in `source` order. An entity already present is
 * overwritten (last write wins); each overwrite is reported through `onOverwrite`.
 */
export function mergePrimaryKeys(
  target: PrimaryKeyMap,
  source: PrimaryKeyMap,
  onOverwrite?: (ev: OverwriteEvent) => void,
): PrimaryKeyMap {
  for (const [entity, key] of source) {
    const previous = target.get(entity);
    if (previous !== undefined && onOverwrite) onOverwrite({ entity, previous, next: key });
    target.set(entity, key);
  }
  return target;
}
