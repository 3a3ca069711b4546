/**
 * String similarity for fuzzy group lookup.
 *
 * Scores are in [0, 1]: the better of normalized Levenshtein similarity and
 * a substring-containment ratio, so "lazarus" still ranks "Lazarus Group"
 * highly even though the edit distance is large.
 */

export function normalizeForMatch(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Classic edit distance (insert, delete, substitute all cost 1).
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost,
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

export function similarity(query: string, candidate: string): number {
  const q = normalizeForMatch(query);
  const c = normalizeForMatch(candidate);
  if (!q || !c) return 0;
  if (q === c) return 1;

  const longest = Math.max(q.length, c.length);
  const editScore = 1 - levenshtein(q, c) / longest;
  const containment =
    c.includes(q) || q.includes(c) ? Math.min(q.length, c.length) / longest : 0;

  return Math.max(editScore, containment);
}
