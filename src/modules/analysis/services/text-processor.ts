import nlp from "compromise";
import { LanguageTag } from "../../../core/records";
import stopwords from "../../../common/data/stopwords.json";
import shortTerms from "../data/short-terms.json";

const STOPWORDS = new Set([...stopwords.en, ...stopwords.fr]);
const TOKEN = /[\p{L}\p{N}]+/gu;
const NUMERIC = /^\p{N}+$/u;
const MIN_TOKEN_LENGTH = 3;

// acronyms that carry meaning despite their length; "ai" is a verb form in French
const SHORT_TERMS: Record<LanguageTag, ReadonlySet<string>> = {
  en: new Set(shortTerms.en),
  fr: new Set(shortTerms.fr),
  und: new Set([...shortTerms.en, ...shortTerms.fr]),
};

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

export function isContentToken(
  token: string,
  language: LanguageTag = "und",
): boolean {
  if (SHORT_TERMS[language].has(token)) {
    return true;
  }
  return (
    token.length >= MIN_TOKEN_LENGTH &&
    !STOPWORDS.has(token) &&
    !NUMERIC.test(token)
  );
}

/**
 * Light French lemmatisation: plural endings only
 */
export function frenchLemma(token: string): string {
  if (token.length <= 4) {
    return token;
  }
  if (token.endsWith("eaux")) {
    return token.slice(0, -1);
  }
  if (/[^s]s$/.test(token)) {
    return token.slice(0, -1);
  }
  return token;
}

/**
 * English root forms: plurals singularised, verbs to infinitive
 */
export function englishRoots(text: string): string {
  const doc = nlp(text);
  doc.compute("root");
  return doc.text("root");
}

/**
 * Lowercased, stop-word free, lemmatised tokens in text order
 */
export function processText(text: string, language: LanguageTag): string[] {
  const keep = (token: string): boolean => isContentToken(token, language);
  if (language === "en") {
    return tokenize(englishRoots(text)).filter(keep);
  }
  const tokens = tokenize(text).filter(keep);
  return language === "fr" ? tokens.map(frenchLemma) : tokens;
}
