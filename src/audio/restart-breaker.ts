import { logger } from '../logger.js';

/**
 * Circuit breaker for capture restarts: after `maxFailures` failures inside
 * `windowMs`, further restarts are refused until the oldest failure ages out.
 */
const BREAKER_WINDOW_MS = 60_000;
const BREAKER_MAX_FAILURES = 3;

export class RestartBreaker {
  private failures: number[] = [];

  constructor(
    private readonly label: string,
    private readonly windowMs = BREAKER_WINDOW_MS,
    private readonly maxFailures = BREAKER_MAX_FAILURES,
    private readonly now: () => number = Date.now
  ) {}

  /** Record a failure; returns true when the breaker is now open. */
  recordFailure(): boolean {
    this.prune();
    this.failures.push(this.now());
    logger.warn(`${this.label}: capture failure (${this.failures.length}/${this.maxFailures} in ${this.windowMs / 1000}s)`);
    return this.isOpen();
  }

  isOpen(): boolean {
    this.prune();
    return this.failures.length >= this.maxFailures;
  }

  reset(): void {
    this.failures = [];
  }

  private prune(): void {
    const now = this.now();
    this.failures = this.failures.filter((t) => now - t < this.windowMs);
  }
}
