function sortValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortValue(item));
  }
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[key] = sortValue(child);
    }
    return out;
  }
  return value;
}

/** JSON with object keys sorted at every level, so equal values encode to equal bytes. */
export function canonicalJson(value: unknown, pretty = false): string {
  const text = JSON.stringify(sortValue(value), null, pretty ? 2 : undefined);
  if (text === undefined) {
    throw new TypeError('value has no JSON representation');
  }
  return text;
}
