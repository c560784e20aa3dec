export const STRATEGY_HINTS = ["static", "dynamic", "auto"] as const;
export type StrategyHint = (typeof STRATEGY_HINTS)[number];

export const SOURCE_CATEGORIES = ["company", "freelance", "directory"] as const;
export type SourceCategory = (typeof SOURCE_CATEGORIES)[number];

/**
 * A target to crawl, immutable once loaded
 */
export interface Source {
  id: string;
  url: string;
  domain: string;
  hint: StrategyHint;
  category: SourceCategory;
}
