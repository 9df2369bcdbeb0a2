// src/transport/backoff.ts

import { ConfigError } from '../errors.js';

/**
 * Reconnect delay: `min * 2^(failures - 1)`, capped at `max`.
 */
export class ExponentialBackoff {
  private _failures: number = 0;

  constructor(
    private readonly minDelayMs: number,
    private readonly maxDelayMs: number
  ) {
    if (!(minDelayMs > 0) || !(maxDelayMs >= minDelayMs)) {
      throw new ConfigError('backoff', `need 0 < min <= max, got ${minDelayMs}/${maxDelayMs}`);
    }
  }

  /**
   * Records a failure and returns the delay before the next attempt.
   */
  next(): number {
    this._failures++;
    return this.delayFor(this._failures);
  }

  delayFor(failures: number): number {
    if (failures <= 0) return 0;
    // 2^exponent overflows to Infinity long before it matters; the cap applies first.
    const exponent = Math.min(failures - 1, 30);
    return Math.min(this.minDelayMs * 2 ** exponent, this.maxDelayMs);
  }

  reset(): void {
    this._failures = 0;
  }

  get failures(): number {
    return this._failures;
  }
}
