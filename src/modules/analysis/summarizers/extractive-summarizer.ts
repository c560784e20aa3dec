import { compareStrings } from "../../../common/helpers/text.helper";
import { isContentToken, tokenize } from "../services/text-processor";

const MIN_SENTENCE_WORDS = 4;
const FREQUENT_TERMS = 10;

export function splitSentences(text: string): string[] {
  const seen = new Set<string>();
  const sentences: string[] = [];
  for (const line of text.split("\n")) {
    for (const raw of line.split(/(?<=[.!?])\s+/)) {
      const sentence = raw.trim();
      const key = sentence.toLowerCase();
      if (sentence && !seen.has(key)) {
        seen.add(key);
        sentences.push(sentence);
      }
    }
  }
  return sentences;
}

/**
 * The document's own most frequent content terms with their counts
 */
export function frequentTerms(
  text: string,
  limit = FREQUENT_TERMS,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(text).filter((token) => isContentToken(token))) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return new Map(
    [...counts.entries()]
      .sort(([termA, a], [termB, b]) => b - a || compareStrings(termA, termB))
      .slice(0, limit),
  );
}

/**
 * Sentences scored by the summed frequency of the document's top terms
 * they contain; the best `sentenceCount` are returned in text order.
 * Equal scores keep the earlier sentence.
 */
export function extractiveSummary(text: string, sentenceCount: number): string {
  const all = splitSentences(text);
  if (all.length === 0 || sentenceCount <= 0) {
    return "";
  }

  const substantial = all.filter(
    (sentence) => sentence.split(/\s+/).length >= MIN_SENTENCE_WORDS,
  );
  const candidates = substantial.length > 0 ? substantial : all;
  const frequent = frequentTerms(text);

  const scored = candidates.map((sentence, index) => ({
    sentence,
    index,
    score: tokenize(sentence).reduce(
      (sum, token) => sum + (frequent.get(token) ?? 0),
      0,
    ),
  }));

  return [...scored]
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, sentenceCount)
    .sort((a, b) => a.index - b.index)
    .map(({ sentence }) => sentence)
    .join(" ");
}
