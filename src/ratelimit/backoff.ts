/**
 * Exponential backoff with optional multiplicative jitter.
 */

export interface BackoffOptions {
  /** Delay before the first retry, in milliseconds. */
  minBackoffMs: number;
  /** Upper bound on the deterministic delay, in milliseconds. */
  maxBackoffMs: number;
  /** Scale each delay by a random factor in [0.5, 1.5). */
  jitter: boolean;
  /** Uniform random source in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

export class BackoffPolicy {
  private readonly minBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly jitter: boolean;
  private readonly random: () => number;

  constructor(options: BackoffOptions) {
    this.minBackoffMs = options.minBackoffMs;
    this.maxBackoffMs = options.maxBackoffMs;
    this.jitter = options.jitter;
    this.random = options.random ?? Math.random;
  }

  /** Delay without jitter: `min(maxBackoffMs, minBackoffMs * 2^attempt)`. */
  baseDelay(attempt: number): number {
    if (!Number.isInteger(attempt) || attempt < 0) {
      throw new RangeError(`Backoff attempt must be a non-negative integer, got ${attempt}`);
    }
    return Math.min(this.maxBackoffMs, this.minBackoffMs * Math.pow(2, attempt));
  }

  /**
   * Milliseconds to wait before retry number `attempt` (0 = first retry).
   * With jitter the result lies in [0.5, 1.5) times the base delay.
   */
  delay(attempt: number): number {
    const base = this.baseDelay(attempt);
    if (!this.jitter) {
      return base;
    }
    return base * (0.5 + this.random());
  }
}
