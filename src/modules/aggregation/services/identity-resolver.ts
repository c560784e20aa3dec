import { CleanedDocument } from "../../../core/records";
import { UnionFind } from "../../../common/helpers/union-find";
import {
  collapseWhitespace,
  compareStrings,
} from "../../../common/helpers/text.helper";

const LEGAL_SUFFIXES = new Set([
  "sas",
  "sasu",
  "sarl",
  "eurl",
  "sa",
  "sci",
  "inc",
  "ltd",
  "llc",
  "llp",
  "gmbh",
  "corp",
  "corporation",
  "co",
  "plc",
  "bv",
  "ag",
]);

/**
 * Lowercase, accents and punctuation dropped, trailing legal form removed
 */
export function normalizeName(name: string): string {
  const words = collapseWhitespace(
    name
      .normalize("NFKD")
      .replace(/\p{M}/gu, "")
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]+/gu, " "),
  )
    .split(" ")
    .filter(Boolean);

  while (words.length > 1 && LEGAL_SUFFIXES.has(words[words.length - 1] ?? "")) {
    words.pop();
  }
  return words.join(" ");
}

function bigrams(value: string): Map<string, number> {
  const grams = new Map<string, number>();
  const compact = value.replace(/\s+/g, "");
  for (let i = 0; i < compact.length - 1; i++) {
    const gram = compact.slice(i, i + 2);
    grams.set(gram, (grams.get(gram) ?? 0) + 1);
  }
  return grams;
}

/**
 * Sørensen–Dice coefficient over character bigrams
 */
export function diceSimilarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  const gramsA = bigrams(a);
  const gramsB = bigrams(b);
  let sizeA = 0;
  let sizeB = 0;
  let shared = 0;
  for (const count of gramsA.values()) sizeA += count;
  for (const count of gramsB.values()) sizeB += count;
  if (sizeA === 0 || sizeB === 0) {
    return 0;
  }
  for (const [gram, count] of gramsA) {
    shared += Math.min(count, gramsB.get(gram) ?? 0);
  }
  return (2 * shared) / (sizeA + sizeB);
}

/**
 * Identity key per document id. Domain first; documents without one are
 * grouped by name similarity, the key being the smallest name of the
 * group. The result does not depend on input order.
 */
export function resolveIdentities(
  documents: readonly CleanedDocument[],
  nameSimilarity: number,
): Map<string, string> {
  const keys = new Map<string, string>();
  const nameOf = new Map<string, string>();

  for (const document of documents) {
    if (document.entityDomain) {
      keys.set(document.id, `domain:${document.entityDomain}`);
      continue;
    }
    const name = normalizeName(document.name || document.title);
    if (name) {
      nameOf.set(document.id, name);
    } else {
      keys.set(document.id, `document:${document.id}`);
    }
  }

  const names = [...new Set(nameOf.values())].sort(compareStrings);
  const forest = new UnionFind(names.length);
  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      if (diceSimilarity(names[i] ?? "", names[j] ?? "") >= nameSimilarity) {
        forest.union(i, j);
      }
    }
  }

  const indexOf = new Map(names.map((name, index) => [name, index]));
  for (const [documentId, name] of nameOf) {
    const root = forest.find(indexOf.get(name) ?? 0);
    keys.set(documentId, `name:${names[root] ?? name}`);
  }
  return keys;
}
