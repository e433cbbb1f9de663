/**
 * Split a comma-joined field into trimmed, non-empty tokens.
 * Case and order are preserved; duplicates are kept.
 */
export function splitTokens(value: string | null | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

/** Code-unit ordering, stable across locales */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function uniqueTokens(values: Iterable<string>): string[] {
  const set = new Set<string>();
  for (const value of values) {
    for (const token of splitTokens(value)) {
      set.add(token);
    }
  }
  return [...set].sort(compareText);
}

export function countTokens(values: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    for (const token of splitTokens(value)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Order label/count pairs by count descending, then label ascending,
 * and keep the first `limit`.
 */
export function rankByCount(counts: Iterable<[string, number]>, limit?: number): [string, number][] {
  const ranked = [...counts].sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]));
  return limit === undefined ? ranked : ranked.slice(0, limit);
}
