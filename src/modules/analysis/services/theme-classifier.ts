import { LanguageTag, RankedKeyword } from "../../../core/records";
import themeData from "../data/themes.json";
import { processText } from "./text-processor";

const LEXICON_LANGUAGES: readonly LanguageTag[] = ["en", "fr", "und"];

export interface ThemeDefinition {
  label: string;
  terms: ReadonlySet<string>;
}

export interface ThemeModel {
  /** highest priority first; also the tie-break order */
  themes: ThemeDefinition[];
  fallback: string;
}

/**
 * Lexicon terms go through the same token pipeline as documents, in every
 * language, so that a term matches whatever form a document's keywords take
 */
export function lexiconTerms(term: string): string[] {
  const forms = new Set<string>();
  for (const language of LEXICON_LANGUAGES) {
    for (const token of processText(term, language)) {
      forms.add(token);
    }
  }
  return [...forms];
}

export function loadThemeModel(): ThemeModel {
  const lexicon: Record<string, string[]> = themeData.lexicon;
  return {
    themes: themeData.priority.map((label) => ({
      label,
      terms: new Set((lexicon[label] ?? []).flatMap(lexiconTerms)),
    })),
    fallback: themeData.fallback,
  };
}

export const DEFAULT_THEME_MODEL = loadThemeModel();

/**
 * Keyword-overlap classification: the theme whose lexicon shares the most
 * terms with the document's ranked keywords wins. Ties go to the earlier
 * theme in priority order; no overlap at all yields the fallback label.
 */
export function classifyTheme(
  keywords: readonly RankedKeyword[],
  model: ThemeModel = DEFAULT_THEME_MODEL,
): string {
  let best: { label: string; score: number } | null = null;

  for (const theme of model.themes) {
    const score = keywords.filter((keyword) =>
      theme.terms.has(keyword.term),
    ).length;
    if (score > 0 && (best === null || score > best.score)) {
      best = { label: theme.label, score };
    }
  }

  return best?.label ?? model.fallback;
}
