import { CooccurrencePair } from "../../../core/records";
import { compareStrings } from "../../../common/helpers/text.helper";

/**
 * Most frequent corpus terms: count descending, then term ascending
 */
export function topTerms(
  documents: readonly (readonly string[])[],
  limit: number,
): string[] {
  const counts = new Map<string, number>();
  for (const tokens of documents) {
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort(([termA, a], [termB, b]) => b - a || compareStrings(termA, termB))
    .slice(0, limit)
    .map(([term]) => term);
}

/**
 * Unordered pairs of frequent terms seen within `window` tokens of each
 * other, counted across all documents.
 */
export function cooccurrence(
  documents: readonly (readonly string[])[],
  termLimit: number,
  window: number,
  pairLimit = 50,
): CooccurrencePair[] {
  const vocabulary = new Set(topTerms(documents, termLimit));
  const counts = new Map<string, CooccurrencePair>();

  for (const tokens of documents) {
    for (let i = 0; i < tokens.length; i++) {
      const left = tokens[i];
      if (left === undefined || !vocabulary.has(left)) {
        continue;
      }
      for (let j = i + 1; j <= i + window && j < tokens.length; j++) {
        const right = tokens[j];
        if (right === undefined || right === left || !vocabulary.has(right)) {
          continue;
        }
        const [a, b] = compareStrings(left, right) < 0 ? [left, right] : [right, left];
        const key = `${a}\u0000${b}`;
        const pair = counts.get(key) ?? { a, b, count: 0 };
        pair.count++;
        counts.set(key, pair);
      }
    }
  }

  return [...counts.values()]
    .sort(
      (x, y) =>
        y.count - x.count || compareStrings(x.a, y.a) || compareStrings(x.b, y.b),
    )
    .slice(0, pairLimit);
}
