/**
 * Canonical JSON text: object keys sorted by code unit, -0 folded to 0,
 * undefined members dropped. Two structurally equal values always produce
 * the same text, which makes it usable as a set key for enum literals.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return 'null';
    return JSON.stringify(Object.is(value, -0) ? 0 : value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => compareCodeUnits(a, b))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return 'null';
}

/**
 * Locale-independent ordering. localeCompare depends on ICU data and would
 * make operation order vary between hosts.
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order-insensitive equality of two literal lists (duplicates collapse).
 */
export function sameLiteralSet(a: readonly unknown[], b: readonly unknown[]): boolean {
  const left = new Set(a.map((v) => canonicalJson(v)));
  const right = new Set(b.map((v) => canonicalJson(v)));
  if (left.size !== right.size) return false;
  for (const key of left) {
    if (!right.has(key)) return false;
  }
  return true;
}
