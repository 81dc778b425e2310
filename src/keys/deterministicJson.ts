/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively (code unit order)
 * - Preserves array order
 */
export function stableStringify(value: unknown, space: number = 2): string {
  const normalized = sortKeysDeep(value);
  return JSON.stringify(normalized, null, space) + '\n';
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortKeysDeep(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (typeof v !== 'object') return v;

  // Null prototype so that an entity literally named `__proto__` stays a plain property.
  const out: Record<string, unknown> = Object.create(null);
  const entries = Object.entries(v).sort(([a], [b]) => compareKeys(a, b));
  for (const [k, child] of entries) {
    out[k] = sortKeysDeep(child);
  }
  return out;
}
