import { LanguageTag } from "./cleaned-document";

export interface RankedKeyword {
  term: string;
  score: number;
}

export interface AnalysisError {
  kind: "AnalysisFailed";
  message: string;
}

export interface AnalysisResult {
  documentId: string;
  language: LanguageTag;
  keywords: RankedKeyword[];
  theme: string | null;
  summary: string;
  summarySource: "extractive" | "generative" | "none";
  clusterId: number | null;
  error?: AnalysisError;
}

export interface CooccurrencePair {
  a: string;
  b: string;
  count: number;
}

/**
 * Mean document quality of one site, on a 0 to 10 scale
 */
export interface SiteQuality {
  domain: string;
  documentCount: number;
  score: number;
}

export interface CorpusSummary {
  documentCount: number;
  analyzedCount: number;
  failedCount: number;
  clusterCount: number;
  languages: Record<string, number>;
  themes: Record<string, number>;
  topKeywords: RankedKeyword[];
  siteScores: SiteQuality[];
}

export interface AnalysisReport {
  results: AnalysisResult[];
  cooccurrence: CooccurrencePair[];
  corpus: CorpusSummary;
}
