const normalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(normalize);
  }

  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
        .map(([key, nested]) => [key, normalize(nested)])
    );
  }

  return value;
};

/** JSON with object keys sorted, so equal argument objects compare equal as strings. */
export const stableStringify = (value: unknown): string => JSON.stringify(normalize(value)) ?? 'undefined';
