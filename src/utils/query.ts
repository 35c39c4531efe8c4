// Express parses `?a=1&a=2` into an array; the first value wins.
export const firstQueryValue = (value: unknown, fallback: string): string => {
  if (Array.isArray(value)) {
    return firstQueryValue(value[0], fallback);
  }
  return typeof value === 'string' ? value : fallback;
};

/**
 * Parse an integer query parameter. Anything that is not a plain integer, or
 * falls below `min`, silently becomes `fallback`.
 */
export const integerQueryValue = (value: unknown, fallback: number, min: number): number => {
  const raw = firstQueryValue(value, '');
  if (!/^\s*[+-]?\d+\s*$/.test(raw)) {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isSafeInteger(parsed) && parsed >= min ? parsed : fallback;
};
