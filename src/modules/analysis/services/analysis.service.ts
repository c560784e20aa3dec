import { Inject, Injectable, Logger } from "@nestjs/common";
import * as crypto from "crypto";
import {
  AnalysisReport,
  AnalysisResult,
  CleanedDocument,
  CorpusSummary,
  RankedKeyword,
} from "../../../core/records";
import { RunContext } from "../../../core/run/run-context";
import { processText } from "./text-processor";
import {
  TokenizedDocument,
  compareKeywords,
  computeTfIdf,
  roundScore,
} from "./tfidf";
import { classifyTheme } from "./theme-classifier";
import { clusterByJaccard } from "./clustering";
import { cooccurrence } from "./cooccurrence";
import { documentQuality, siteQuality } from "./quality-score";
import { extractiveSummary } from "../summarizers/extractive-summarizer";
import {
  SUMMARY_GENERATOR,
  SummaryGenerator,
} from "../summarizers/summary-generator";
import {
  PIPELINE_SETTINGS,
  PipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  AnalysisFailedError,
  RunCancelledError,
  errorMessage,
  errorStack,
} from "../../../common/errors/pipeline.errors";

interface DocumentPass {
  document: CleanedDocument;
  tokens: string[];
  summary: string;
  summarySource: AnalysisResult["summarySource"];
  error?: string;
}

const CORPUS_TOP_KEYWORDS = 20;

/**
 * Two-phase corpus analysis. The per-document pass tokenises and
 * summarises; the corpus-wide pass starts only once the corpus is closed
 * and every document has been through the first pass.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(SUMMARY_GENERATOR) private readonly generator: SummaryGenerator,
  ) {}

  async analyze(
    documents: readonly CleanedDocument[],
    ctx?: RunContext,
  ): Promise<AnalysisReport> {
    const requestId = crypto.randomUUID();

    this.logger.log("Analysing corpus", {
      operation: "analyze",
      requestId,
      documentCount: documents.length,
      generativeSummaries: this.generator.enabled,
      timestamp: new Date().toISOString(),
    });

    const passes: DocumentPass[] = [];
    for (const document of documents) {
      ctx?.throwIfCancelled();
      passes.push(await this.documentPass(document, ctx));
    }

    const analyzed = passes.filter((pass) => pass.error === undefined);
    const tokenized: TokenizedDocument[] = analyzed.map((pass) => ({
      id: pass.document.id,
      tokens: pass.tokens,
    }));
    const keywords = computeTfIdf(
      tokenized,
      this.settings.topKeywords,
      documents.length,
    );

    ctx?.throwIfCancelled();
    const clusterIds = clusterByJaccard(
      analyzed.map(
        (pass) =>
          new Set(
            (keywords.get(pass.document.id) ?? [])
              .slice(0, this.settings.clusterTopN)
              .map((keyword) => keyword.term),
          ),
      ),
      this.settings.clusterSimilarity,
    );
    const clusterByDocument = new Map(
      analyzed.map((pass, index) => [pass.document.id, clusterIds[index] ?? null]),
    );

    const results: AnalysisResult[] = [];
    for (const pass of passes) {
      ctx?.throwIfCancelled();
      results.push(this.toResult(pass, keywords, clusterByDocument));
    }

    const report: AnalysisReport = {
      results,
      cooccurrence: cooccurrence(
        analyzed.map((pass) => pass.tokens),
        this.settings.cooccurrenceTerms,
        this.settings.cooccurrenceWindow,
      ),
      corpus: this.summarizeCorpus(passes, results),
    };

    this.logger.log("Corpus analysed", {
      operation: "analyze",
      requestId,
      analyzed: report.corpus.analyzedCount,
      failed: report.corpus.failedCount,
      clusters: report.corpus.clusterCount,
      timestamp: new Date().toISOString(),
    });

    return report;
  }

  private async documentPass(
    document: CleanedDocument,
    ctx?: RunContext,
  ): Promise<DocumentPass> {
    try {
      const tokens = processText(document.text, document.language);
      if (tokens.length === 0) {
        throw new AnalysisFailedError(
          `No analysable terms in document (language: ${document.language})`,
        );
      }

      let summary = extractiveSummary(
        document.text,
        this.settings.summarySentences,
      );
      let summarySource: AnalysisResult["summarySource"] = "extractive";
      if (this.generator.enabled) {
        const generated = await this.generateSafely(document);
        if (generated) {
          summary = generated;
          summarySource = "generative";
        }
      }

      return { document, tokens, summary, summarySource };
    } catch (error) {
      if (error instanceof RunCancelledError) {
        throw error;
      }
      const message = errorMessage(error);
      this.logger.error(
        "Document analysis failed",
        {
          operation: "documentPass",
          documentId: document.id,
          error: message,
          timestamp: new Date().toISOString(),
        },
        errorStack(error),
      );
      ctx?.recordFailure({
        sourceId: document.sourceId,
        url: document.url,
        stage: "analysis",
        kind: "AnalysisFailed",
        message,
      });
      return {
        document,
        tokens: [],
        summary: "",
        summarySource: "none",
        error: message,
      };
    }
  }

  private async generateSafely(
    document: CleanedDocument,
  ): Promise<string | null> {
    try {
      return await this.generator.generate(document);
    } catch (error) {
      this.logger.warn("Summary generator threw, keeping extractive summary", {
        operation: "generateSafely",
        documentId: document.id,
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      });
      return null;
    }
  }

  private toResult(
    pass: DocumentPass,
    keywords: ReadonlyMap<string, RankedKeyword[]>,
    clusters: ReadonlyMap<string, number | null>,
  ): AnalysisResult {
    const { document } = pass;
    if (pass.error !== undefined) {
      return {
        documentId: document.id,
        language: document.language,
        keywords: [],
        theme: null,
        summary: "",
        summarySource: "none",
        clusterId: null,
        error: { kind: "AnalysisFailed", message: pass.error },
      };
    }

    const ranked = keywords.get(document.id) ?? [];
    return {
      documentId: document.id,
      language: document.language,
      keywords: ranked,
      theme: classifyTheme(ranked),
      summary: pass.summary,
      summarySource: pass.summarySource,
      clusterId: clusters.get(document.id) ?? null,
    };
  }

  private summarizeCorpus(
    passes: readonly DocumentPass[],
    results: readonly AnalysisResult[],
  ): CorpusSummary {
    const languages: Record<string, number> = {};
    for (const { document } of passes) {
      languages[document.language] = (languages[document.language] ?? 0) + 1;
    }

    const themes: Record<string, number> = {};
    const totals = new Map<string, number>();
    const clusters = new Set<number>();
    let failedCount = 0;

    for (const result of results) {
      if (result.error) {
        failedCount++;
        continue;
      }
      if (result.theme) {
        themes[result.theme] = (themes[result.theme] ?? 0) + 1;
      }
      if (result.clusterId !== null) {
        clusters.add(result.clusterId);
      }
      for (const keyword of result.keywords) {
        totals.set(keyword.term, (totals.get(keyword.term) ?? 0) + keyword.score);
      }
    }

    const topKeywords = [...totals.entries()]
      .map(([term, score]) => ({ term, score: roundScore(score) }))
      .sort(compareKeywords)
      .slice(0, CORPUS_TOP_KEYWORDS);

    const siteScores = siteQuality(
      passes.map((pass, index) => ({
        domain: pass.document.domain,
        score: documentQuality({
          keywordCount: results[index]?.keywords.length ?? 0,
          distinctTerms: new Set(pass.tokens).size,
          tokenCount: pass.tokens.length,
          hasSummary: pass.summary.length > 0,
          language: pass.document.language,
        }),
      })),
    );

    return {
      documentCount: passes.length,
      analyzedCount: results.length - failedCount,
      failedCount,
      clusterCount: clusters.size,
      languages,
      themes,
      topKeywords,
      siteScores,
    };
  }
}
