import { describe, it, expect } from 'vitest';
import { ExponentialBackoff } from '../backoff.js';

describe('ExponentialBackoff', () => {
  it('should already wait on the first call', () => {
    const backoff = new ExponentialBackoff({ random: () => 0.5 });
    // 1.85^2 seconds with a neutral jitter factor
    expect(backoff.next()).toBeCloseTo(3422.5, 6);
  });

  it('should grow monotonically and then stay at the cap', () => {
    const backoff = new ExponentialBackoff({ random: () => 0.5, maximumMs: 60_000 });
    const delays = Array.from({ length: 12 }, () => backoff.next());

    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]!).toBeGreaterThanOrEqual(delays[i - 1]!);
    }
    expect(delays[delays.length - 1]).toBe(60_000);
    expect(Math.max(...delays)).toBe(60_000);
  });

  it('should stop raising the exponent once the cap is reached', () => {
    const backoff = new ExponentialBackoff({ random: () => 0.5, maximumMs: 10_000 });
    for (let i = 0; i < 50; i++) {
      backoff.next();
    }
    expect(Number.isFinite(Math.pow(backoff.base, backoff.currentIncrement))).toBe(true);
    expect(backoff.next()).toBe(10_000);
  });

  it('should restore the initial delay on reset', () => {
    const backoff = new ExponentialBackoff({ random: () => 0.5 });
    const first = backoff.next();
    backoff.next();
    backoff.next();

    backoff.reset();

    expect(backoff.currentIncrement).toBe(2);
    expect(backoff.next()).toBe(first);
  });

  it('should honour a custom step', () => {
    const backoff = new ExponentialBackoff({ base: 2, initialIncrement: 0, step: 2, random: () => 0.5 });
    expect(backoff.next()).toBeCloseTo(1000, 6);
    expect(backoff.next()).toBeCloseTo(4000, 6);
    expect(backoff.next()).toBeCloseTo(16000, 6);
  });

  it('should keep jitter within the configured ratio', () => {
    const low = new ExponentialBackoff({ base: 2, initialIncrement: 1, random: () => 0 });
    const high = new ExponentialBackoff({ base: 2, initialIncrement: 1, random: () => 0.999999 });

    expect(low.next()).toBeCloseTo(1800, 6);
    expect(high.next()).toBeCloseTo(2200, 2);
  });

  it('should reject a base that would not grow', () => {
    expect(() => new ExponentialBackoff({ base: 1 })).toThrow(RangeError);
  });
});
