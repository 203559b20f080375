import { describe, expect, it } from 'vitest';
import { NONCE_LENGTH, computeTarget, expectedTrials } from './difficulty.js';

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

describe('computeTarget', () => {
  it('divides 2^64 by the nonce-padded length for an empty payload with no TTL', () => {
    expect(NONCE_LENGTH).toBe(8);
    expect(computeTarget(0, 0, 1)).toBe(2n ** 61n);
  });

  it('scales with TTL in whole seconds', () => {
    // len = 108, ttl term = floor(86400 * 108 / 65536) = 142 -> 10 * 250
    expect(expectedTrials(100, ONE_DAY_MS, 10)).toBe(2500n);
    // sub-second TTLs do not count
    expect(computeTarget(100, 999, 10)).toBe(computeTarget(100, 0, 10));
  });

  it('scales linearly with nonceTrials', () => {
    expect(expectedTrials(56, 0, 1)).toBe(64n);
    expect(expectedTrials(56, 0, 7)).toBe(448n);
  });

  it('never gets easier as the payload grows', () => {
    let previous = computeTarget(0, ONE_DAY_MS, 10);
    for (let size = 1; size <= 4096; size *= 2) {
      const target = computeTarget(size, ONE_DAY_MS, 10);
      expect(target).toBeLessThanOrEqual(previous);
      previous = target;
    }
  });

  it('is strictly harder for a larger payload at equal TTL', () => {
    expect(computeTarget(256, ONE_DAY_MS, 10)).toBeLessThan(computeTarget(64, ONE_DAY_MS, 10));
  });

  it('never gets easier as the TTL grows', () => {
    const targets = [0, 60_000, ONE_DAY_MS, 4 * ONE_DAY_MS].map((ttl) => computeTarget(512, ttl, 10));
    for (let i = 1; i < targets.length; i++) {
      expect(targets[i]).toBeLessThanOrEqual(targets[i - 1]);
    }
    expect(targets[3]).toBeLessThan(targets[0]);
  });

  it('drops to zero once the expected work passes 2^64 trials', () => {
    const nonceTrials = Number.MAX_SAFE_INTEGER;
    expect(computeTarget(2048, 0, nonceTrials)).toBe(0n);
    expect(expectedTrials(2048, 0, nonceTrials)).toBe(2056n * BigInt(nonceTrials));
  });

  it('rejects invalid parameters', () => {
    expect(() => computeTarget(-1, 0, 1)).toThrow(RangeError);
    expect(() => computeTarget(10, 1.5, 1)).toThrow(RangeError);
    expect(() => computeTarget(10, 0, 0)).toThrow('nonceTrials must be a positive integer, got 0');
  });
});
