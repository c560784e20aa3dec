import { LanguageTag } from "../../../core/records";
import stopwords from "../../../common/data/stopwords.json";

type DetectableLanguage = Exclude<LanguageTag, "und">;

const MIN_TOKENS = 3;
const MIN_HITS = 2;

/**
 * Stop-word profiles with the words both languages share removed, so a
 * hit counts for one language only.
 */
function exclusiveProfiles(): Record<DetectableLanguage, Set<string>> {
  const en = new Set(stopwords.en);
  const fr = new Set(stopwords.fr);
  return {
    en: new Set(stopwords.en.filter((word) => !fr.has(word))),
    fr: new Set(stopwords.fr.filter((word) => !en.has(word))),
  };
}

const PROFILES = exclusiveProfiles();

export function languageTokens(text: string): string[] {
  return text.toLowerCase().match(/\p{L}+/gu) ?? [];
}

/**
 * Stop-word frequency identification: the language whose profile
 * matches the most tokens wins; too little evidence or a tie is "und".
 */
export function detectLanguage(text: string): LanguageTag {
  const tokens = languageTokens(text);
  if (tokens.length < MIN_TOKENS) {
    return "und";
  }

  let en = 0;
  let fr = 0;
  for (const token of tokens) {
    if (PROFILES.en.has(token)) en++;
    if (PROFILES.fr.has(token)) fr++;
  }

  const best = Math.max(en, fr);
  if (best < MIN_HITS || en === fr) {
    return "und";
  }
  return en > fr ? "en" : "fr";
}
