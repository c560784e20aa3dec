import { ConfigService } from "@nestjs/config";
import { ENV } from "../constants/string-const";

export const PIPELINE_SETTINGS = Symbol("PIPELINE_SETTINGS");

/**
 * Tunables shared by every stage. Built once per process from ConfigService.
 */
export interface PipelineSettings {
  requestDelayMs: number;
  fetchTimeoutMs: number;
  fetchMaxAttempts: number;
  fetchBackoffMs: number;
  fetchConcurrency: number;
  staticMinTextLength: number;
  renderSettleMs: number;
  renderMaxScrolls: number;
  renderScrollPauseMs: number;
  renderSnapshotDir: string | null;
  chromiumExecutablePath: string | null;
  maxSectionLinks: number;
  /** extra listing pages followed for directory and freelance sources */
  maxPaginationPages: number;
  minContentLength: number;
  topKeywords: number;
  summarySentences: number;
  clusterTopN: number;
  clusterSimilarity: number;
  nameSimilarity: number;
  cooccurrenceTerms: number;
  cooccurrenceWindow: number;
  summarizerEndpoint: string | null;
  summarizerModel: string;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  requestDelayMs: 500,
  fetchTimeoutMs: 30000,
  fetchMaxAttempts: 3,
  fetchBackoffMs: 2000,
  fetchConcurrency: 4,
  staticMinTextLength: 300,
  renderSettleMs: 5000,
  renderMaxScrolls: 6,
  renderScrollPauseMs: 1000,
  renderSnapshotDir: null,
  chromiumExecutablePath: null,
  maxSectionLinks: 3,
  maxPaginationPages: 10,
  minContentLength: 150,
  topKeywords: 20,
  summarySentences: 3,
  clusterTopN: 10,
  clusterSimilarity: 0.3,
  nameSimilarity: 0.85,
  cooccurrenceTerms: 30,
  cooccurrenceWindow: 2,
  summarizerEndpoint: null,
  summarizerModel: "mistral",
};

export function pipelineSettingsFactory(
  configService: ConfigService,
): PipelineSettings {
  const d = DEFAULT_PIPELINE_SETTINGS;

  return {
    requestDelayMs: configService.get<number>(
      ENV.REQUEST_DELAY_MS,
      d.requestDelayMs,
    ),
    fetchTimeoutMs: configService.get<number>(
      ENV.FETCH_TIMEOUT_MS,
      d.fetchTimeoutMs,
    ),
    fetchMaxAttempts: configService.get<number>(
      ENV.FETCH_MAX_ATTEMPTS,
      d.fetchMaxAttempts,
    ),
    fetchBackoffMs: configService.get<number>(
      ENV.FETCH_BACKOFF_MS,
      d.fetchBackoffMs,
    ),
    fetchConcurrency: configService.get<number>(
      ENV.FETCH_CONCURRENCY,
      d.fetchConcurrency,
    ),
    staticMinTextLength: configService.get<number>(
      ENV.STATIC_MIN_TEXT_LENGTH,
      d.staticMinTextLength,
    ),
    renderSettleMs: configService.get<number>(
      ENV.RENDER_SETTLE_MS,
      d.renderSettleMs,
    ),
    renderMaxScrolls: configService.get<number>(
      ENV.RENDER_MAX_SCROLLS,
      d.renderMaxScrolls,
    ),
    renderScrollPauseMs: configService.get<number>(
      ENV.RENDER_SCROLL_PAUSE_MS,
      d.renderScrollPauseMs,
    ),
    renderSnapshotDir:
      configService.get<string>(ENV.RENDER_SNAPSHOT_DIR) ?? null,
    chromiumExecutablePath:
      configService.get<string>(ENV.CHROMIUM_EXECUTABLE_PATH) ?? null,
    maxSectionLinks: configService.get<number>(
      ENV.MAX_SECTION_LINKS,
      d.maxSectionLinks,
    ),
    maxPaginationPages: configService.get<number>(
      ENV.MAX_PAGINATION_PAGES,
      d.maxPaginationPages,
    ),
    minContentLength: configService.get<number>(
      ENV.MIN_CONTENT_LENGTH,
      d.minContentLength,
    ),
    topKeywords: configService.get<number>(ENV.TOP_KEYWORDS, d.topKeywords),
    summarySentences: configService.get<number>(
      ENV.SUMMARY_SENTENCES,
      d.summarySentences,
    ),
    clusterTopN: configService.get<number>(ENV.CLUSTER_TOP_N, d.clusterTopN),
    clusterSimilarity: configService.get<number>(
      ENV.CLUSTER_SIMILARITY,
      d.clusterSimilarity,
    ),
    nameSimilarity: configService.get<number>(
      ENV.NAME_SIMILARITY,
      d.nameSimilarity,
    ),
    cooccurrenceTerms: configService.get<number>(
      ENV.COOCCURRENCE_TERMS,
      d.cooccurrenceTerms,
    ),
    cooccurrenceWindow: configService.get<number>(
      ENV.COOCCURRENCE_WINDOW,
      d.cooccurrenceWindow,
    ),
    summarizerEndpoint:
      configService.get<string>(ENV.SUMMARIZER_ENDPOINT) ?? null,
    summarizerModel: configService.get<string>(
      ENV.SUMMARIZER_MODEL,
      d.summarizerModel,
    ),
  };
}

export function buildPipelineSettings(
  overrides: Partial<PipelineSettings> = {},
): PipelineSettings {
  return { ...DEFAULT_PIPELINE_SETTINGS, ...overrides };
}
