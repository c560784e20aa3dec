/**
 * Environment variable names read through ConfigService
 */
export const ENV = {
  REQUEST_DELAY_MS: "REQUEST_DELAY_MS",
  FETCH_TIMEOUT_MS: "FETCH_TIMEOUT_MS",
  FETCH_MAX_ATTEMPTS: "FETCH_MAX_ATTEMPTS",
  FETCH_BACKOFF_MS: "FETCH_BACKOFF_MS",
  FETCH_CONCURRENCY: "FETCH_CONCURRENCY",
  STATIC_MIN_TEXT_LENGTH: "STATIC_MIN_TEXT_LENGTH",
  RENDER_SETTLE_MS: "RENDER_SETTLE_MS",
  RENDER_MAX_SCROLLS: "RENDER_MAX_SCROLLS",
  RENDER_SCROLL_PAUSE_MS: "RENDER_SCROLL_PAUSE_MS",
  RENDER_SNAPSHOT_DIR: "RENDER_SNAPSHOT_DIR",
  CHROMIUM_EXECUTABLE_PATH: "CHROMIUM_EXECUTABLE_PATH",
  MAX_SECTION_LINKS: "MAX_SECTION_LINKS",
  MAX_PAGINATION_PAGES: "MAX_PAGINATION_PAGES",
  MIN_CONTENT_LENGTH: "MIN_CONTENT_LENGTH",
  TOP_KEYWORDS: "TOP_KEYWORDS",
  SUMMARY_SENTENCES: "SUMMARY_SENTENCES",
  CLUSTER_TOP_N: "CLUSTER_TOP_N",
  CLUSTER_SIMILARITY: "CLUSTER_SIMILARITY",
  NAME_SIMILARITY: "NAME_SIMILARITY",
  COOCCURRENCE_TERMS: "COOCCURRENCE_TERMS",
  COOCCURRENCE_WINDOW: "COOCCURRENCE_WINDOW",
  SUMMARIZER_ENDPOINT: "SUMMARIZER_ENDPOINT",
  SUMMARIZER_MODEL: "SUMMARIZER_MODEL",
} as const;

export const OUTPUT_FILES = {
  RAW: "raw.json",
  CLEANED: "cleaned.json",
  ANALYSIS: "analysis.json",
  PROFILES: "profiles.json",
  FAILURES: "failures.jsonl",
} as const;

export const PIPELINE_STAGES = {
  INPUT: "input",
  FETCH: "fetch",
  EXTRACT: "extract",
  NORMALIZE: "normalize",
  ANALYSIS: "analysis",
  AGGREGATE: "aggregate",
} as const;

export type PipelineStage =
  (typeof PIPELINE_STAGES)[keyof typeof PIPELINE_STAGES];

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";
