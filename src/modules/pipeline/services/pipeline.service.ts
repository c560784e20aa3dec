import { Inject, Injectable, Logger } from "@nestjs/common";
import pLimit from "p-limit";
import * as crypto from "crypto";
import { join } from "path";
import { FetcherService } from "../../fetching/services/fetcher.service";
import { ExtractorService } from "../../extraction/services/extractor.service";
import { NormalizerService } from "../../normalization/services/normalizer.service";
import {
  CorpusStore,
  dedupeDocuments,
} from "../../normalization/services/corpus-store";
import { AnalysisService } from "../../analysis/services/analysis.service";
import { AggregatorService } from "../../aggregation/services/aggregator.service";
import {
  SourceList,
  SourceListReader,
} from "../../../core/storage/source-list.reader";
import {
  LoadedDocuments,
  RecordStoreRepository,
} from "../../../core/storage/record-store.repository";
import { FailureLogRepository } from "../../../core/storage/failure-log.repository";
import { RunContext } from "../../../core/run/run-context";
import {
  CleanedDocument,
  PageCapture,
  Source,
} from "../../../core/records";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  OUTPUT_FILES,
  PipelineStage,
} from "../../../common/constants/string-const";
import {
  CorpusEmptyError,
  InvalidSourceListError,
  RunCancelledError,
  errorMessage,
  errorStack,
} from "../../../common/errors/pipeline.errors";

export interface RunSummary {
  runId: string;
  sourceCount: number;
  captureCount: number;
  documentCount: number;
  liveDocumentCount: number;
  duplicateCount: number;
  profileCount: number;
  failureCount: number;
  outputs: string[];
}

interface NormalizedCorpus {
  documents: CleanedDocument[];
  duplicateCount: number;
}

/**
 * Drives one run: sources → captures → documents → analysis → profiles.
 * Each stage's output is written before the next stage starts, so a
 * cancelled or failed run keeps whatever completed.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly sourceListReader: SourceListReader,
    private readonly fetcher: FetcherService,
    private readonly extractor: ExtractorService,
    private readonly normalizer: NormalizerService,
    private readonly analysis: AnalysisService,
    private readonly aggregator: AggregatorService,
    private readonly recordStore: RecordStoreRepository,
    private readonly failureLog: FailureLogRepository,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  /**
   * Run context whose failures are appended to the output directory's
   * failure log
   */
  createRunContext(outDir: string): RunContext {
    const failuresPath = join(outDir, OUTPUT_FILES.FAILURES);
    return new RunContext({
      requestDelayMs: this.settings.requestDelayMs,
      onFailure: (entry) => this.failureLog.record(failuresPath, entry),
    });
  }

  async runFull(
    sourcesPath: string,
    outDir: string,
    ctx: RunContext = this.createRunContext(outDir),
  ): Promise<RunSummary> {
    const requestId = crypto.randomUUID();
    const outputs: string[] = [];

    this.logger.log("Starting full pipeline run", {
      operation: "runFull",
      requestId,
      runId: ctx.runId,
      sourcesPath,
      outDir,
      timestamp: new Date().toISOString(),
    });

    const progress: { stage: PipelineStage } = { stage: "input" };

    try {
      const sources = await this.loadSources(sourcesPath, ctx);

      progress.stage = "fetch";
      const captures = await this.fetchAll(sources, ctx);
      outputs.push(await this.recordStore.saveCaptures(outDir, captures));
      ctx.throwIfCancelled();

      progress.stage = "normalize";
      const corpus = this.normalizeAll(captures, ctx);
      outputs.push(
        await this.recordStore.saveDocuments(outDir, corpus.documents),
      );
      this.ensureCorpus(corpus.documents, ctx);

      const profileCount = await this.analyzeAndAggregate(
        corpus.documents,
        outDir,
        ctx,
        outputs,
        progress,
      );

      const summary: RunSummary = {
        runId: ctx.runId,
        sourceCount: sources.length,
        captureCount: captures.length,
        documentCount: corpus.documents.length,
        liveDocumentCount: corpus.documents.filter((d) => d.live).length,
        duplicateCount: corpus.duplicateCount,
        profileCount,
        failureCount: ctx.failures.length,
        outputs,
      };

      this.logger.log("Pipeline run completed", {
        operation: "runFull",
        requestId,
        ...summary,
        timestamp: new Date().toISOString(),
      });

      return summary;
    } catch (error) {
      this.handleRunFailure("runFull", requestId, progress.stage, ctx, error);
      throw error;
    } finally {
      await this.failureLog.flush();
      ctx.close();
    }
  }

  /**
   * Re-analysis of a corpus written by an earlier run, without fetching
   */
  async runAnalysis(
    cleanedPath: string,
    outDir: string,
    ctx: RunContext = this.createRunContext(outDir),
  ): Promise<RunSummary> {
    const requestId = crypto.randomUUID();
    const outputs: string[] = [];

    this.logger.log("Starting analysis-only run", {
      operation: "runAnalysis",
      requestId,
      runId: ctx.runId,
      cleanedPath,
      outDir,
      timestamp: new Date().toISOString(),
    });

    const progress: { stage: PipelineStage } = { stage: "input" };

    try {
      let loaded: LoadedDocuments;
      try {
        loaded = await this.recordStore.loadDocuments(cleanedPath);
      } catch (error) {
        throw new InvalidSourceListError(
          `Cannot load cleaned corpus ${cleanedPath}: ${errorMessage(error)}`,
        );
      }
      for (const rejected of loaded.rejected) {
        ctx.recordFailure({
          sourceId: rejected.id ?? `${cleanedPath}#${rejected.index}`,
          stage: "input",
          kind: "InvalidDocument",
          message: `Record ${rejected.index}: ${rejected.reason}`,
        });
      }

      // normalising an already deduplicated corpus again changes nothing
      const documents = dedupeDocuments(loaded.documents);
      this.ensureCorpus(documents, ctx);

      const profileCount = await this.analyzeAndAggregate(
        documents,
        outDir,
        ctx,
        outputs,
        progress,
      );

      return {
        runId: ctx.runId,
        sourceCount: new Set(documents.map((d) => d.sourceId)).size,
        captureCount: 0,
        documentCount: documents.length,
        liveDocumentCount: documents.filter((d) => d.live).length,
        duplicateCount: loaded.documents.length - documents.length,
        profileCount,
        failureCount: ctx.failures.length,
        outputs,
      };
    } catch (error) {
      this.handleRunFailure(
        "runAnalysis",
        requestId,
        progress.stage,
        ctx,
        error,
      );
      throw error;
    } finally {
      await this.failureLog.flush();
      ctx.close();
    }
  }

  private async loadSources(
    sourcesPath: string,
    ctx: RunContext,
  ): Promise<Source[]> {
    let list: SourceList;
    try {
      list = await this.sourceListReader.read(sourcesPath);
    } catch (error) {
      ctx.recordFailure({
        sourceId: sourcesPath,
        stage: "input",
        kind: "InvalidSource",
        message: errorMessage(error),
      });
      throw error;
    }

    for (const row of list.rejected) {
      ctx.recordFailure({
        sourceId: row.url || `line:${row.line}`,
        url: row.url || undefined,
        stage: "input",
        kind: "InvalidSource",
        message: `Line ${row.line}: ${row.reason}`,
      });
    }
    return list.sources;
  }

  /**
   * Bounded worker pool over sources. Results keep source-list order
   * whatever order the fetches complete in.
   */
  private async fetchAll(
    sources: Source[],
    ctx: RunContext,
  ): Promise<PageCapture[]> {
    const limit = pLimit(Math.max(1, this.settings.fetchConcurrency));
    const settled = await Promise.allSettled(
      sources.map((source) => limit(() => this.fetchSource(source, ctx))),
    );

    const captures: PageCapture[] = [];
    for (const result of settled) {
      if (result.status === "fulfilled") {
        captures.push(...result.value);
      } else if (!(result.reason instanceof RunCancelledError)) {
        // fetchSource converts every other error into a failure entry
        this.logger.error("Unexpected fetch worker rejection", {
          operation: "fetchAll",
          error: errorMessage(result.reason),
          timestamp: new Date().toISOString(),
        });
      }
    }
    return captures;
  }

  private async fetchSource(
    source: Source,
    ctx: RunContext,
  ): Promise<PageCapture[]> {
    try {
      return await this.fetcher.fetch(source, ctx);
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      this.logger.error(
        "Source fetch crashed",
        {
          operation: "fetchSource",
          sourceId: source.id,
          error: errorMessage(error),
          timestamp: new Date().toISOString(),
        },
        errorStack(error),
      );
      ctx.recordFailure({
        sourceId: source.id,
        url: source.url,
        stage: "fetch",
        kind: "FetchFailed",
        message: errorMessage(error),
      });
      return [];
    }
  }

  /**
   * Extraction and normalisation in admission order, so the earliest-seen
   * duplicate survives deterministically
   */
  private normalizeAll(
    captures: PageCapture[],
    ctx: RunContext,
  ): NormalizedCorpus {
    const corpus = new CorpusStore();
    let duplicateCount = 0;

    for (const capture of captures) {
      ctx.throwIfCancelled();
      const record = this.extractor.extract(capture);
      const outcome = this.normalizer.normalize(record, corpus);

      if (outcome.status === "empty") {
        ctx.recordFailure({
          sourceId: capture.sourceId,
          url: capture.url,
          stage: "extract",
          kind: "ExtractionFailed",
          message: "No text content could be extracted from the page",
        });
      } else if (outcome.status === "duplicate") {
        duplicateCount++;
      }
    }

    return { documents: [...corpus.close()], duplicateCount };
  }

  private async analyzeAndAggregate(
    documents: CleanedDocument[],
    outDir: string,
    ctx: RunContext,
    outputs: string[],
    progress: { stage: PipelineStage },
  ): Promise<number> {
    progress.stage = "analysis";
    const report = await this.analysis.analyze(documents, ctx);
    outputs.push(await this.recordStore.saveAnalysis(outDir, report));
    ctx.throwIfCancelled();

    progress.stage = "aggregate";
    const profiles = this.aggregator.aggregate(documents, report.results);
    outputs.push(await this.recordStore.saveProfiles(outDir, profiles));
    return profiles.length;
  }

  private ensureCorpus(documents: CleanedDocument[], ctx: RunContext): void {
    if (documents.length > 0) {
      return;
    }
    const error = new CorpusEmptyError();
    ctx.recordFailure({
      sourceId: ctx.runId,
      stage: "normalize",
      kind: "CorpusEmpty",
      message: error.message,
    });
    throw error;
  }

  private handleRunFailure(
    operation: string,
    requestId: string,
    stage: PipelineStage,
    ctx: RunContext,
    error: unknown,
  ): void {
    if (error instanceof RunCancelledError) {
      ctx.recordFailure({
        sourceId: ctx.runId,
        stage,
        kind: "RunCancelled",
        message: `${error.message} during ${stage}`,
      });
    }

    this.logger.error(
      "Pipeline run failed",
      {
        operation,
        requestId,
        runId: ctx.runId,
        stage,
        error: errorMessage(error),
        failureCount: ctx.failures.length,
        timestamp: new Date().toISOString(),
      },
      errorStack(error),
    );
  }
}
