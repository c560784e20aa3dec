import { Inject, Injectable, Logger } from "@nestjs/common";
import * as crypto from "crypto";
import {
  DYNAMIC_PAGE_RETRIEVER,
  PageRetriever,
  RetrievedPage,
  STATIC_PAGE_RETRIEVER,
} from "../retrievers/page-retriever";
import {
  assessStaticContent,
  isAntiBotChallenge,
  selectInitialStrategy,
  shouldEscalate,
} from "./fetch-strategy";
import {
  PAGINATED_CATEGORIES,
  PaginationParam,
  contentSignature,
  listingCandidates,
} from "./pagination";
import { discoverSectionLinks } from "./section-links";
import { FetchStrategy, PageCapture, Source } from "../../../core/records";
import { RunContext } from "../../../core/run/run-context";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  AntiBotChallengeError,
  FetchFailedError,
  FetchTransientError,
  RunCancelledError,
  errorMessage,
} from "../../../common/errors/pipeline.errors";
import { domainOf, normalizeUrl } from "../../../common/helpers/url.helper";

interface StrategyOutcome {
  page: RetrievedPage;
  strategy: FetchStrategy;
}

/**
 * Turns one Source into zero or more PageCaptures: the entry page, the
 * following pages of a listing, and a few same-domain section pages.
 * Failures end up in the run's failure log; only cancellation escapes.
 */
@Injectable()
export class FetcherService {
  private readonly logger = new Logger(FetcherService.name);

  constructor(
    @Inject(STATIC_PAGE_RETRIEVER)
    private readonly staticRetriever: PageRetriever,
    @Inject(DYNAMIC_PAGE_RETRIEVER)
    private readonly dynamicRetriever: PageRetriever,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  async fetch(source: Source, ctx: RunContext): Promise<PageCapture[]> {
    const requestId = crypto.randomUUID();
    ctx.throwIfCancelled();

    this.logger.log("Fetching source", {
      operation: "fetch",
      requestId,
      sourceId: source.id,
      hint: source.hint,
      category: source.category,
      timestamp: new Date().toISOString(),
    });

    if (!ctx.claimUrl(source.url)) {
      this.logger.debug("Entry URL already visited in this run", {
        operation: "fetch",
        requestId,
        url: source.url,
        timestamp: new Date().toISOString(),
      });
      return [];
    }

    const entry = await this.captureEntry(source, ctx);
    if (!entry) {
      return [];
    }

    const captures = [this.toCapture(source, entry, ctx)];
    const listingPages = await this.followPagination(source, entry, ctx);
    captures.push(...listingPages);

    const links = discoverSectionLinks(
      entry.page.html,
      entry.page.url,
      this.settings.maxSectionLinks,
    );

    for (const link of links) {
      ctx.throwIfCancelled();
      if (!ctx.claimUrl(link)) {
        continue;
      }
      const retriever = this.retrieverFor(entry.strategy);
      try {
        const page = await this.retrieveContent(retriever, link, ctx);
        captures.push(
          this.toCapture(source, { page, strategy: entry.strategy }, ctx),
        );
      } catch (error) {
        this.handleFailure(source, link, error, ctx);
      }
    }

    this.logger.log("Source fetched", {
      operation: "fetch",
      requestId,
      sourceId: source.id,
      strategy: entry.strategy,
      captures: captures.length,
      listingPages: listingPages.length,
      sectionLinks: links.length,
      timestamp: new Date().toISOString(),
    });

    return captures;
  }

  private async captureEntry(
    source: Source,
    ctx: RunContext,
  ): Promise<StrategyOutcome | null> {
    const initial = selectInitialStrategy(source.hint, source.url);

    if (initial === "dynamic") {
      try {
        const page = await this.retrieveContent(
          this.dynamicRetriever,
          source.url,
          ctx,
        );
        return { page, strategy: "dynamic" };
      } catch (error) {
        rethrowCancellation(error);
        this.logger.warn("Rendering failed, falling back to static fetch", {
          operation: "captureEntry",
          sourceId: source.id,
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        });
      }
      return this.tryStatic(source, ctx);
    }

    let staticPage: RetrievedPage;
    try {
      staticPage = await this.retrieveWithRetry(
        this.staticRetriever,
        source.url,
        ctx,
      );
    } catch (error) {
      rethrowCancellation(error);
      // some sites refuse plain HTTP clients but serve a real browser
      if (
        source.hint === "auto" &&
        error instanceof FetchFailedError &&
        error.statusCode === 403
      ) {
        return this.tryDynamic(source, ctx, null);
      }
      this.handleFailure(source, source.url, error, ctx);
      return null;
    }

    const assessment = assessStaticContent(
      staticPage.html,
      this.settings.staticMinTextLength,
    );
    if (!shouldEscalate(source.hint, assessment)) {
      if (assessment.antiBot) {
        this.handleFailure(
          source,
          source.url,
          new AntiBotChallengeError(staticPage.status),
          ctx,
        );
        return null;
      }
      return { page: staticPage, strategy: "static" };
    }

    this.logger.debug("Static result looks empty, escalating to rendering", {
      operation: "captureEntry",
      sourceId: source.id,
      visibleTextLength: assessment.visibleTextLength,
      clientShell: assessment.clientShell,
      antiBot: assessment.antiBot,
      timestamp: new Date().toISOString(),
    });

    // a challenge page is never kept in place of the real one
    const fallback =
      assessment.visibleTextLength > 0 && !assessment.antiBot
        ? { page: staticPage, strategy: "static" as const }
        : null;
    return this.tryDynamic(source, ctx, fallback);
  }

  private async tryStatic(
    source: Source,
    ctx: RunContext,
  ): Promise<StrategyOutcome | null> {
    try {
      const page = await this.retrieveContent(
        this.staticRetriever,
        source.url,
        ctx,
      );
      return { page, strategy: "static" };
    } catch (error) {
      rethrowCancellation(error);
      this.handleFailure(source, source.url, error, ctx);
      return null;
    }
  }

  private async tryDynamic(
    source: Source,
    ctx: RunContext,
    fallback: StrategyOutcome | null,
  ): Promise<StrategyOutcome | null> {
    try {
      const page = await this.retrieveContent(
        this.dynamicRetriever,
        source.url,
        ctx,
      );
      return { page, strategy: "dynamic" };
    } catch (error) {
      rethrowCancellation(error);
      if (fallback) {
        this.logger.warn("Rendering failed, keeping static result", {
          operation: "tryDynamic",
          sourceId: source.id,
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        });
        return fallback;
      }
      this.handleFailure(source, source.url, error, ctx);
      return null;
    }
  }

  /**
   * Following pages of a directory or marketplace listing, through the
   * next link or a pagination parameter. Stops at the first page that
   * brings no new content, or at `maxPaginationPages`.
   */
  private async followPagination(
    source: Source,
    entry: StrategyOutcome,
    ctx: RunContext,
  ): Promise<PageCapture[]> {
    const limit = this.settings.maxPaginationPages;
    if (limit <= 0 || !PAGINATED_CATEGORIES.includes(source.category)) {
      return [];
    }

    const retriever = this.retrieverFor(entry.strategy);
    const signatures = new Set<string>();
    const entrySignature = contentSignature(entry.page.html);
    if (entrySignature) {
      signatures.add(entrySignature);
    }

    const captures: PageCapture[] = [];
    let current = entry.page;
    let knownParam: PaginationParam | null = null;

    for (let pageNumber = 2; captures.length < limit; pageNumber++) {
      const candidates = listingCandidates(
        current.html,
        current.url,
        source.url,
        pageNumber,
        knownParam,
      );

      let advanced: RetrievedPage | null = null;
      for (const candidate of candidates) {
        ctx.throwIfCancelled();
        if (!ctx.claimUrl(candidate.url)) {
          continue;
        }

        let page: RetrievedPage;
        try {
          page = await this.retrieveContent(retriever, candidate.url, ctx);
        } catch (error) {
          rethrowCancellation(error);
          this.logger.debug("Listing page unavailable", {
            operation: "followPagination",
            sourceId: source.id,
            url: candidate.url,
            error: errorMessage(error),
            timestamp: new Date().toISOString(),
          });
          continue;
        }

        const signature = contentSignature(page.html);
        if (!signature || signatures.has(signature)) {
          continue;
        }
        signatures.add(signature);
        advanced = page;
        knownParam = candidate.param ?? knownParam;
        break;
      }

      if (!advanced) {
        break;
      }
      captures.push(
        this.toCapture(source, { page: advanced, strategy: entry.strategy }, ctx),
      );
      current = advanced;
    }

    if (captures.length > 0) {
      this.logger.log("Listing pages followed", {
        operation: "followPagination",
        sourceId: source.id,
        pages: captures.length,
        param: knownParam,
        timestamp: new Date().toISOString(),
      });
    }
    return captures;
  }

  private async retrieveContent(
    retriever: PageRetriever,
    url: string,
    ctx: RunContext,
  ): Promise<RetrievedPage> {
    const page = await this.retrieveWithRetry(retriever, url, ctx);
    if (isAntiBotChallenge(page.html)) {
      throw new AntiBotChallengeError(page.status);
    }
    return page;
  }

  /**
   * Bounded exponential backoff on transient errors. The cancellation flag
   * is checked and the politeness gate passed before every attempt.
   */
  private async retrieveWithRetry(
    retriever: PageRetriever,
    url: string,
    ctx: RunContext,
  ): Promise<RetrievedPage> {
    const domain = domainOf(url);
    const maxAttempts = Math.max(1, this.settings.fetchMaxAttempts);
    let lastError: FetchTransientError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      ctx.throwIfCancelled();
      await ctx.politeness.acquire(domain);
      ctx.throwIfCancelled();

      try {
        return await retriever.retrieve(url);
      } catch (error) {
        if (
          error instanceof FetchFailedError ||
          error instanceof RunCancelledError
        ) {
          throw error;
        }
        if (!(error instanceof FetchTransientError)) {
          throw new FetchFailedError(errorMessage(error));
        }

        lastError = error;
        if (attempt < maxAttempts) {
          const delay = this.settings.fetchBackoffMs * 2 ** (attempt - 1);
          this.logger.warn("Transient fetch error, retrying", {
            operation: "retrieveWithRetry",
            url,
            strategy: retriever.strategy,
            attempt,
            maxAttempts,
            delay,
            error: error.message,
            timestamp: new Date().toISOString(),
          });
          await ctx.clock.sleep(delay, ctx.signal);
        }
      }
    }

    throw new FetchFailedError(
      `Gave up after ${maxAttempts} attempts: ${lastError?.message ?? "unknown error"}`,
      lastError?.statusCode,
    );
  }

  private retrieverFor(strategy: FetchStrategy): PageRetriever {
    return strategy === "dynamic" ? this.dynamicRetriever : this.staticRetriever;
  }

  private toCapture(
    source: Source,
    outcome: StrategyOutcome,
    ctx: RunContext,
  ): PageCapture {
    const fetchedAt = new Date(ctx.clock.now()).toISOString();
    const url = normalizeUrl(outcome.page.url);
    if (url !== normalizeUrl(source.url)) {
      ctx.claimUrl(url);
    }

    return {
      id: crypto
        .createHash("sha256")
        .update(`${url}|${fetchedAt}`)
        .digest("hex")
        .slice(0, 16),
      sourceId: source.id,
      url,
      fetchedAt,
      strategy: outcome.strategy,
      status: outcome.page.status,
      html: outcome.page.html,
      category: source.category,
    };
  }

  private handleFailure(
    source: Source,
    url: string,
    error: unknown,
    ctx: RunContext,
  ): void {
    rethrowCancellation(error);
    const message = errorMessage(error);

    this.logger.error("Fetch failed", {
      operation: "fetch",
      sourceId: source.id,
      url,
      error: message,
      timestamp: new Date().toISOString(),
    });

    ctx.recordFailure({
      sourceId: source.id,
      url,
      stage: "fetch",
      kind: "FetchFailed",
      message,
    });
  }
}

function rethrowCancellation(error: unknown): void {
  if (error instanceof RunCancelledError) {
    throw error;
  }
}
