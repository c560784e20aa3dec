import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from "@nestjs/common";
import * as crypto from "crypto";
import { mkdir } from "fs/promises";
import { join } from "path";
import {
  Browser,
  Page,
  chromium,
  errors as playwrightErrors,
} from "playwright-core";
import { PageRetriever, RetrievedPage } from "./page-retriever";
import { ScrollablePage, scrollUntilStable } from "./page-scroll";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import { DEFAULT_USER_AGENT } from "../../../common/constants/string-const";
import {
  FetchFailedError,
  FetchTransientError,
} from "../../../common/errors/pipeline.errors";
import { domainOf } from "../../../common/helpers/url.helper";

/**
 * Full browser rendering for script-generated pages. The browser binary is
 * provisioned outside this project and located through settings.
 */
@Injectable()
export class DynamicPageRetriever implements PageRetriever, OnModuleDestroy {
  readonly strategy = "dynamic" as const;
  private readonly logger = new Logger(DynamicPageRetriever.name);
  private browser: Promise<Browser> | null = null;

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  async retrieve(url: string): Promise<RetrievedPage> {
    const requestId = crypto.randomUUID();
    const browser = await this.getBrowser();
    const context = await browser.newContext({
      userAgent: DEFAULT_USER_AGENT,
      locale: "en-US",
      viewport: { width: 1920, height: 1080 },
    });

    try {
      const page = await context.newPage();
      let status = 200;

      try {
        const response = await page.goto(url, {
          waitUntil: "domcontentloaded",
          timeout: this.settings.fetchTimeoutMs,
        });
        status = response?.status() ?? 200;
      } catch (error) {
        if (error instanceof playwrightErrors.TimeoutError) {
          throw new FetchTransientError("Render timeout");
        }
        throw new FetchTransientError(
          error instanceof Error ? error.message : String(error),
        );
      }

      if (status >= 500 || status === 429) {
        throw new FetchTransientError(`HTTP ${status}`, status);
      }
      if (status >= 400) {
        throw new FetchFailedError(`HTTP ${status}`, status);
      }

      await this.settle(page, url, requestId);
      const html = await page.content();
      await this.saveSnapshot(page, url, requestId);

      this.logger.debug("Page rendered", {
        operation: "retrieve",
        requestId,
        url,
        statusCode: status,
        contentLength: html.length,
        timestamp: new Date().toISOString(),
      });

      return { url: page.url(), status, html };
    } finally {
      await context.close();
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.browser) {
      return;
    }
    const pending = this.browser;
    this.browser = null;

    try {
      const browser = await pending;
      await browser.close();
      this.logger.log("Browser closed");
    } catch (error) {
      this.logger.warn("Browser was not running at shutdown", {
        operation: "onModuleDestroy",
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Wait for network idle, bounded by the configured settle time, then
   * scroll so lazy-loaded listings render. Reaching either bound is not an
   * error: whatever rendered so far is kept.
   */
  private async settle(
    page: Page,
    url: string,
    requestId: string,
  ): Promise<void> {
    try {
      await page.waitForLoadState("networkidle", {
        timeout: this.settings.renderSettleMs,
      });
    } catch (error) {
      this.logger.debug("Settle time elapsed before network idle", {
        operation: "settle",
        requestId,
        url,
        settleMs: this.settings.renderSettleMs,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      const scrolls = await scrollUntilStable(
        scrollable(page),
        this.settings.renderMaxScrolls,
        this.settings.renderScrollPauseMs,
      );
      this.logger.debug("Lazy content scrolled", {
        operation: "settle",
        requestId,
        url,
        scrolls,
      });
    } catch (error) {
      this.logger.debug("Scrolling stopped early", {
        operation: "settle",
        requestId,
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async saveSnapshot(
    page: Page,
    url: string,
    requestId: string,
  ): Promise<void> {
    const dir = this.settings.renderSnapshotDir;
    if (!dir) {
      return;
    }

    try {
      await mkdir(dir, { recursive: true });
      const file = join(
        dir,
        `${domainOf(url).replace(/[^a-z0-9]+/gi, "_")}-${requestId.slice(0, 8)}.png`,
      );
      await page.screenshot({ path: file, fullPage: true });
      this.logger.debug("Snapshot saved", { operation: "saveSnapshot", url, file });
    } catch (error) {
      this.logger.warn("Snapshot failed, capture kept", {
        operation: "saveSnapshot",
        requestId,
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private getBrowser(): Promise<Browser> {
    if (!this.browser) {
      const executablePath = this.settings.chromiumExecutablePath;
      if (!executablePath) {
        return Promise.reject(
          new FetchFailedError(
            "Dynamic rendering unavailable: CHROMIUM_EXECUTABLE_PATH is not set",
          ),
        );
      }

      this.logger.log("Launching headless browser", {
        operation: "getBrowser",
        executablePath,
        timestamp: new Date().toISOString(),
      });

      const launching = chromium.launch({
        executablePath,
        headless: true,
        args: ["--no-sandbox", "--disable-dev-shm-usage", "--disable-gpu"],
      });
      // a failed launch is retried on the next call instead of being cached
      this.browser = launching.catch((error: unknown) => {
        this.browser = null;
        throw new FetchFailedError(
          `Browser launch failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }
    return this.browser;
  }
}

function scrollable(page: Page): ScrollablePage {
  return {
    scrollHeight: async () => {
      const height = await page.evaluate("document.body.scrollHeight");
      return typeof height === "number" ? height : 0;
    },
    scrollToBottom: async () => {
      await page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
    },
    pause: (ms) => page.waitForTimeout(ms),
  };
}
