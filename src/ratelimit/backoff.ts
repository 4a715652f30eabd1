/**
 * Exponential backoff with jitter, used to pace gateway reconnects.
 */

export interface BackoffOptions {
  /** Multiplier raised to the current increment. Default 1.85. */
  base?: number;
  /** Upper bound for a single delay in ms. Default 600000 (10 minutes). */
  maximumMs?: number;
  /** Jitter spread; the delay is scaled by a uniform factor in [1 - ratio, 1 + ratio]. Default 0.1. */
  jitterRatio?: number;
  /** Increment the sequence starts at, so the first call already waits. Default 2. */
  initialIncrement?: number;
  /** Added to the increment after every call. Default 1. */
  step?: number;
  /** Random source returning values in [0, 1). Default Math.random. */
  random?: () => number;
}

/**
 * Stateful delay generator.
 * `next()` returns `min(maximumMs, base^increment * 1000 * jitter)` and then
 * advances the increment; `reset()` returns to the initial increment.
 */
export class ExponentialBackoff {
  readonly base: number;
  readonly maximumMs: number;
  readonly jitterRatio: number;
  readonly initialIncrement: number;
  readonly step: number;
  private readonly random: () => number;
  private increment: number;

  constructor(options: BackoffOptions = {}) {
    this.base = options.base ?? 1.85;
    this.maximumMs = options.maximumMs ?? 600_000;
    this.jitterRatio = options.jitterRatio ?? 0.1;
    this.initialIncrement = options.initialIncrement ?? 2;
    this.step = options.step ?? 1;
    this.random = options.random ?? Math.random;

    if (this.base <= 1) {
      throw new RangeError(`Backoff base must be greater than 1, got ${this.base}`);
    }
    if (this.jitterRatio < 0 || this.jitterRatio >= 1) {
      throw new RangeError(`Backoff jitterRatio must be in [0, 1), got ${this.jitterRatio}`);
    }

    this.increment = this.initialIncrement;
  }

  /** Current exponent, exposed for diagnostics. */
  get currentIncrement(): number {
    return this.increment;
  }

  /** Next delay in milliseconds. */
  next(): number {
    const raw = Math.pow(this.base, this.increment) * 1000;
    // The exponent stops growing once the cap is reached.
    if (raw < this.maximumMs) {
      this.increment += this.step;
    }

    const jitter = 1 - this.jitterRatio + this.random() * 2 * this.jitterRatio;
    return Math.min(this.maximumMs, raw * jitter);
  }

  /** Restart the sequence after a sustained healthy connection. */
  reset(): void {
    this.increment = this.initialIncrement;
  }
}
