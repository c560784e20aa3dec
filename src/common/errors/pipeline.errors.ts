export type PipelineErrorKind =
  | "FetchTransient"
  | "FetchFailed"
  | "AnalysisFailed"
  | "CorpusEmpty"
  | "InvalidSourceList"
  | "RunCancelled";

/**
 * Base class for every error the pipeline reasons about.
 * `kind` is what ends up in the failure log.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Timeout, connection reset or 5xx. Retried by the fetcher, never escapes it.
 */
export class FetchTransientError extends PipelineError {
  readonly kind = "FetchTransient" as const;

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

export class FetchFailedError extends PipelineError {
  readonly kind = "FetchFailed" as const;

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

/**
 * A bot-protection interstitial came back instead of the requested page
 */
export class AntiBotChallengeError extends FetchFailedError {
  constructor(statusCode?: number) {
    super("Blocked by anti-bot challenge", statusCode);
  }
}

export class AnalysisFailedError extends PipelineError {
  readonly kind = "AnalysisFailed" as const;
}

export class CorpusEmptyError extends PipelineError {
  readonly kind = "CorpusEmpty" as const;

  constructor(message = "No document survived normalization for this run") {
    super(message);
  }
}

export class InvalidSourceListError extends PipelineError {
  readonly kind = "InvalidSourceList" as const;
}

export class RunCancelledError extends PipelineError {
  readonly kind = "RunCancelled" as const;

  constructor(message = "Run cancelled") {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string {
  return error instanceof Error ? (error.stack ?? "") : "";
}
