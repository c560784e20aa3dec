export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Case-insensitive whole-term pattern. Boundaries are letters and digits
 * rather than \b so that terms such as "c#" or ".net" still match.
 */
export function termPattern(term: string, flags = "iu"): RegExp {
  return new RegExp(
    `(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`,
    flags,
  );
}

/**
 * Order-preserving dedup on trimmed, non-empty values. `keyOf` decides
 * what counts as the same value.
 */
export function uniqueInOrder(
  values: Iterable<string>,
  keyOf: (value: string) => string = (value) => value,
): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (!value) {
      continue;
    }
    const key = keyOf(value);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(value);
    }
  }
  return out;
}

/**
 * Code-unit comparison, independent of the host locale
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
