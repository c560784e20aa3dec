import { RankedKeyword } from "../../../core/records";
import { compareStrings } from "../../../common/helpers/text.helper";

export interface TokenizedDocument {
  id: string;
  tokens: string[];
}

/**
 * Score descending, then term ascending by code unit
 */
export function compareKeywords(a: RankedKeyword, b: RankedKeyword): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return compareStrings(a.term, b.term);
}

export function roundScore(score: number): number {
  return Math.round(score * 1e6) / 1e6;
}

/**
 * Document frequencies over a closed corpus
 */
export function documentFrequencies(
  documents: readonly TokenizedDocument[],
): Map<string, number> {
  const df = new Map<string, number>();
  for (const document of documents) {
    for (const term of new Set(document.tokens)) {
      df.set(term, (df.get(term) ?? 0) + 1);
    }
  }
  return df;
}

/**
 * Smoothed IDF, so a term present in every document still scores
 */
export function inverseDocumentFrequency(
  corpusSize: number,
  documentFrequency: number,
): number {
  return Math.log((1 + corpusSize) / (1 + documentFrequency)) + 1;
}

/**
 * Every term of one document with its rounded TF-IDF score, ranked after
 * rounding so that equal published scores are in term order. `corpusSize`
 * is the closed corpus size, which may exceed the number of tokenised
 * documents when some failed analysis.
 */
export function scoreDocument(
  tokens: readonly string[],
  df: ReadonlyMap<string, number>,
  corpusSize: number,
): RankedKeyword[] {
  if (tokens.length === 0) {
    return [];
  }

  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const scored: RankedKeyword[] = [];
  for (const [term, count] of counts) {
    const tf = count / tokens.length;
    const idf = inverseDocumentFrequency(corpusSize, df.get(term) ?? 0);
    scored.push({ term, score: roundScore(tf * idf) });
  }
  return scored.sort(compareKeywords);
}

/**
 * Top keywords per document, keyed by document id
 */
export function computeTfIdf(
  documents: readonly TokenizedDocument[],
  topK: number,
  corpusSize = documents.length,
): Map<string, RankedKeyword[]> {
  const df = documentFrequencies(documents);
  const ranked = new Map<string, RankedKeyword[]>();

  for (const document of documents) {
    ranked.set(
      document.id,
      scoreDocument(document.tokens, df, corpusSize).slice(0, topK),
    );
  }
  return ranked;
}
