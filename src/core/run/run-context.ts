import { randomUUID } from "crypto";
import { PolitenessGate } from "./politeness-gate";
import { Clock, systemClock } from "./clock";
import { FailureEntry } from "../records";
import { RunCancelledError } from "../../common/errors/pipeline.errors";
import { normalizeUrl } from "../../common/helpers/url.helper";

export type FailureInput = Omit<FailureEntry, "timestamp" | "runId">;

export interface RunContextOptions {
  runId?: string;
  requestDelayMs: number;
  clock?: Clock;
  onFailure?: (entry: FailureEntry) => void;
}

/**
 * State scoped to one pipeline run: visited URLs, the politeness gate,
 * the cancellation flag and the failures recorded so far.
 * Discarded when the run ends; nothing here outlives it.
 */
export class RunContext {
  readonly runId: string;
  readonly clock: Clock;
  readonly politeness: PolitenessGate;
  private readonly visited = new Set<string>();
  private readonly controller = new AbortController();
  private readonly recorded: FailureEntry[] = [];
  private readonly onFailure?: (entry: FailureEntry) => void;

  constructor(options: RunContextOptions) {
    this.runId = options.runId ?? randomUUID();
    this.clock = options.clock ?? systemClock;
    this.politeness = new PolitenessGate(
      options.requestDelayMs,
      this.clock,
      this.controller.signal,
    );
    this.onFailure = options.onFailure;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get failures(): readonly FailureEntry[] {
    return this.recorded;
  }

  cancel(reason = "Run cancelled"): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new RunCancelledError(reason));
    }
  }

  throwIfCancelled(): void {
    if (this.controller.signal.aborted) {
      const reason: unknown = this.controller.signal.reason;
      throw reason instanceof RunCancelledError
        ? reason
        : new RunCancelledError();
    }
  }

  /**
   * Check-and-insert on the visited set. Returns false when the normalized
   * URL was already claimed during this run.
   */
  claimUrl(url: string): boolean {
    const key = normalizeUrl(url);
    if (this.visited.has(key)) {
      return false;
    }
    this.visited.add(key);
    return true;
  }

  recordFailure(failure: FailureInput): FailureEntry {
    const entry: FailureEntry = {
      timestamp: new Date(this.clock.now()).toISOString(),
      runId: this.runId,
      ...failure,
    };
    this.recorded.push(entry);
    this.onFailure?.(entry);
    return entry;
  }

  close(): void {
    this.visited.clear();
    this.politeness.reset();
  }
}
