import { Clock, systemClock } from "./clock";

/**
 * Enforces a minimum delay between consecutive requests to the same domain.
 * Callers for one domain are queued on a promise chain, so the
 * last-request map is only ever touched by the turn that owns it.
 * Waiting turns reject once `signal` aborts.
 */
export class PolitenessGate {
  private readonly lastRequestAt = new Map<string, number>();
  private readonly tails = new Map<string, Promise<void>>();

  constructor(
    private readonly minDelayMs: number,
    private readonly clock: Clock = systemClock,
    private readonly signal?: AbortSignal,
  ) {}

  acquire(domain: string): Promise<void> {
    const previous = this.tails.get(domain) ?? Promise.resolve();
    const turn = previous.then(() => this.waitTurn(domain));
    // a failed turn must not block the next caller; the error still reaches
    // whoever awaits `turn`
    this.tails.set(
      domain,
      turn.then(
        () => undefined,
        () => undefined,
      ),
    );
    return turn;
  }

  reset(): void {
    this.lastRequestAt.clear();
    this.tails.clear();
  }

  private async waitTurn(domain: string): Promise<void> {
    const last = this.lastRequestAt.get(domain);
    if (last !== undefined && this.minDelayMs > 0) {
      const wait = last + this.minDelayMs - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait, this.signal);
      }
    }
    this.lastRequestAt.set(domain, this.clock.now());
  }
}
