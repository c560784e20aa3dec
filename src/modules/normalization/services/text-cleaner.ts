import {
  collapseWhitespace,
  termPattern,
  uniqueInOrder,
} from "../../../common/helpers/text.helper";

const SUBSTITUTIONS: Record<string, string> = {
  "’": "'",
  "‘": "'",
  "“": '"',
  "”": '"',
  "«": '"',
  "»": '"',
  "–": "-",
  "—": "-",
  "…": "...",
  "•": "-",
  "™": "(TM)",
  "®": "(R)",
  "©": "(C)",
  "€": "EUR",
  "→": "->",
  "\u00a0": " ",
};

export const BOILERPLATE_PHRASES = [
  "en savoir plus",
  "learn more",
  "read more",
  "voir plus",
  "lire la suite",
  "all rights reserved",
  "tous droits réservés",
  "accept cookies",
  "accepter les cookies",
  "we use cookies",
  "nous utilisons des cookies",
  "politique de confidentialité",
  "privacy policy",
  "terms and conditions",
  "mentions légales",
  "back to top",
  "retour en haut",
  "skip to content",
  "aller au contenu",
  "sign in",
  "sign up",
  "log in",
  "subscribe to our newsletter",
];

const BOILERPLATE_PATTERNS = BOILERPLATE_PHRASES.map((phrase) =>
  termPattern(phrase, "giu"),
);
const SUBSTITUTION_PATTERN = new RegExp(
  `[${Object.keys(SUBSTITUTIONS).join("")}]`,
  "g",
);
const URL_PATTERN = /\b(?:https?:\/\/|www\.)\S+/gi;
const TAG_PATTERN = /<\/?[a-z][^>]*>/gi;
const ENTITY_PATTERN = /&(?:[a-z]+|#\d+);/gi;
const TRACKING_TOKEN = /\b(?:utm_[a-z]+|gclid|fbclid)=\S*/gi;
const PUNCTUATION_ONLY = /^[\W_]{1,5}$/u;

/** lines this short are dropped outright when they contain boilerplate */
const SHORT_LINE_WORDS = 8;
const MIN_UNIQUE_RATIO = 0.35;

/**
 * Character-level normalisation of one line
 */
export function cleanLine(line: string): string {
  const substituted = line.replace(
    SUBSTITUTION_PATTERN,
    (char) => SUBSTITUTIONS[char] ?? char,
  );
  return collapseWhitespace(
    substituted
      .normalize("NFKC")
      .replace(TAG_PATTERN, " ")
      .replace(ENTITY_PATTERN, " ")
      .replace(URL_PATTERN, " ")
      .replace(TRACKING_TOKEN, " ")
      .replace(/[\r\t]+/g, " "),
  );
}

/**
 * Short navigation and footer lines are dropped; longer lines only lose
 * the boilerplate phrase itself.
 */
export function stripBoilerplate(line: string): string {
  if (!BOILERPLATE_PATTERNS.some((pattern) => matches(pattern, line))) {
    return line;
  }
  if (line.split(" ").length <= SHORT_LINE_WORDS) {
    return "";
  }
  return collapseWhitespace(
    BOILERPLATE_PATTERNS.reduce(
      (current, pattern) => current.replace(pattern, " "),
      line,
    ),
  );
}

export function isRepetitive(line: string): boolean {
  const words = line.toLowerCase().split(" ").filter(Boolean);
  if (words.length < 4) {
    return false;
  }
  return new Set(words).size / words.length < MIN_UNIQUE_RATIO;
}

function isNoise(line: string): boolean {
  return line.length < 3 || PUNCTUATION_ONLY.test(line);
}

/**
 * Full cleaning pass over multi-line text: per-line normalisation,
 * boilerplate and repetitive lines removed, case-insensitive line dedup.
 */
export function cleanText(text: string): string {
  const lines = text
    .split("\n")
    .map((line) => stripBoilerplate(cleanLine(line)))
    .filter((line) => !isNoise(line) && !isRepetitive(line));

  return uniqueInOrder(lines, (line) => line.toLowerCase()).join("\n");
}

// global patterns keep state between test() calls
function matches(pattern: RegExp, value: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(value);
}
