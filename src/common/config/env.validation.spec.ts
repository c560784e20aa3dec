import { validateEnv } from "./env.validation";
import {
  DEFAULT_PIPELINE_SETTINGS,
  buildPipelineSettings,
} from "./pipeline-settings";

describe("validateEnv", () => {
  it("applies defaults to an empty environment", () => {
    const config = validateEnv({});

    expect(config.REQUEST_DELAY_MS).toBe(500);
    expect(config.FETCH_MAX_ATTEMPTS).toBe(3);
    expect(config.MIN_CONTENT_LENGTH).toBe(150);
    expect(config.SUMMARIZER_ENDPOINT).toBeUndefined();
  });

  it("bounds listing pagination and lazy-content scrolling", () => {
    const config = validateEnv({});

    expect(config.MAX_PAGINATION_PAGES).toBe(10);
    expect(config.RENDER_MAX_SCROLLS).toBe(6);
    expect(() => validateEnv({ MAX_PAGINATION_PAGES: "51" })).toThrow(
      "Invalid configuration",
    );
  });

  it("converts string values", () => {
    const config = validateEnv({
      FETCH_CONCURRENCY: "8",
      CLUSTER_SIMILARITY: "0.5",
    });

    expect(config.FETCH_CONCURRENCY).toBe(8);
    expect(config.CLUSTER_SIMILARITY).toBe(0.5);
  });

  it("rejects out-of-range values", () => {
    expect(() => validateEnv({ FETCH_MAX_ATTEMPTS: "0" })).toThrow(
      "Invalid configuration",
    );
    expect(() => validateEnv({ NAME_SIMILARITY: "1.5" })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects a summarizer endpoint that is not a URL", () => {
    expect(() => validateEnv({ SUMMARIZER_ENDPOINT: "ollama" })).toThrow(
      "Invalid configuration",
    );
  });
});

describe("buildPipelineSettings", () => {
  it("overrides only the given settings", () => {
    const settings = buildPipelineSettings({ topKeywords: 5 });

    expect(settings).toEqual({ ...DEFAULT_PIPELINE_SETTINGS, topKeywords: 5 });
  });
});
