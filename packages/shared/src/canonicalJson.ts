const byKey = ([left]: [string, unknown], [right]: [string, unknown]) =>
  left < right ? -1 : left > right ? 1 : 0;

// Object members sorted by key at every depth; array order is kept.
const sortValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((entry) => sortValue(entry));
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(byKey)
        .map(([key, entry]) => [key, sortValue(entry)])
    );
  }
  return value;
};

export const canonicalizeJson = (value: unknown) => JSON.stringify(sortValue(value));

/**
 * Structural equality of two JSON values. Member order is ignored, array order
 * and value types are not.
 */
export const canonicalJsonEquals = (left: unknown, right: unknown) =>
  canonicalizeJson(left) === canonicalizeJson(right);
