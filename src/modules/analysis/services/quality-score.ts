import { LanguageTag, SiteQuality } from "../../../core/records";

export const MAX_QUALITY_SCORE = 10;

export interface QualitySignals {
  keywordCount: number;
  distinctTerms: number;
  tokenCount: number;
  hasSummary: boolean;
  language: LanguageTag;
}

export interface ScoredDocument {
  domain: string;
  score: number;
}

/**
 * How much usable material one analysed document carries
 */
export function documentQuality(signals: QualitySignals): number {
  let score = 0;
  if (signals.keywordCount > 3) {
    score += 3;
  }
  if (signals.distinctTerms > 5) {
    score += 2;
  }
  if (signals.hasSummary) {
    score += 2;
  }
  if (signals.language !== "und") {
    score += 1;
  }
  if (signals.tokenCount > 20) {
    score += 2;
  }
  return Math.min(score, MAX_QUALITY_SCORE);
}

/**
 * Mean document score per domain, best sites first, ties by domain
 */
export function siteQuality(documents: readonly ScoredDocument[]): SiteQuality[] {
  const bySite = new Map<string, { total: number; count: number }>();
  for (const { domain, score } of documents) {
    const entry = bySite.get(domain) ?? { total: 0, count: 0 };
    entry.total += score;
    entry.count++;
    bySite.set(domain, entry);
  }

  return [...bySite.entries()]
    .map(([domain, { total, count }]) => ({
      domain,
      documentCount: count,
      score: Math.round((total / count) * 100) / 100,
    }))
    .sort((a, b) =>
      b.score !== a.score
        ? b.score - a.score
        : a.domain < b.domain
          ? -1
          : a.domain > b.domain
            ? 1
            : 0,
    );
}
