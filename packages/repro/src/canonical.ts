function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function normalizeCanonicalValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) =>
      item === undefined ? null : normalizeCanonicalValue(item),
    );
  }

  if (isPlainObject(value)) {
    const normalized: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const item = value[key];
      if (item !== undefined) {
        normalized[key] = normalizeCanonicalValue(item);
      }
    }
    return normalized;
  }

  return value;
}

/**
 * Key-sorted JSON at every depth. Two structurally equal values give the
 * same text whatever order their keys were inserted in; array order is kept.
 * Non-ASCII characters are written as-is.
 */
export function canonicalize(value: unknown): string {
  const json = JSON.stringify(normalizeCanonicalValue(value));
  return json === undefined ? "null" : json;
}
