import { describe, it, expect } from 'vitest';
import { backoffDelay } from '../../src/orchestrator/backoff.js';

const midpoint = () => 0.5;

describe('backoffDelay', () => {
  it('should double from the base delay per attempt', () => {
    expect(backoffDelay(1, undefined, midpoint)).toBe(5000);
    expect(backoffDelay(2, undefined, midpoint)).toBe(10000);
    expect(backoffDelay(3, undefined, midpoint)).toBe(20000);
  });

  it('should cap at the maximum delay', () => {
    expect(backoffDelay(7, undefined, midpoint)).toBe(300000);
    expect(backoffDelay(50, undefined, midpoint)).toBe(300000);
  });

  it('should apply up to 20% jitter either way', () => {
    expect(backoffDelay(1, undefined, () => 0)).toBe(4000);
    expect(backoffDelay(1, undefined, () => 1)).toBe(6000);
    expect(backoffDelay(1, undefined, () => 0.25)).toBe(4500);
  });

  it('should never exceed the maximum, even with upward jitter', () => {
    expect(backoffDelay(10, undefined, () => 1)).toBe(300000);
  });

  it('should treat attempts below 1 as the first attempt', () => {
    expect(backoffDelay(0, undefined, midpoint)).toBe(5000);
    expect(backoffDelay(-3, undefined, midpoint)).toBe(5000);
  });

  it('should honour a custom policy', () => {
    const policy = { baseMs: 100, maxMs: 1000 };
    expect(backoffDelay(4, policy, midpoint)).toBe(800);
    expect(backoffDelay(5, policy, midpoint)).toBe(1000);
    expect(backoffDelay(1, { baseMs: 0, maxMs: 1000 }, () => 1)).toBe(0);
  });

  it('should stay a non-negative whole number within bounds', () => {
    const policy = { baseMs: 5000, maxMs: 300000 };
    for (let attempt = 1; attempt <= 20; attempt++) {
      for (const r of [0, 0.1, 0.5, 0.9, 0.999]) {
        const delay = backoffDelay(attempt, policy, () => r);
        expect(delay).toBeGreaterThanOrEqual(0);
        expect(delay).toBeLessThanOrEqual(policy.maxMs);
        expect(Number.isInteger(delay)).toBe(true);
      }
    }
  });

  it('should not decrease in expectation as attempts grow', () => {
    const delays = [1, 2, 3, 4, 5, 6, 7, 8].map((attempt) => backoffDelay(attempt, undefined, midpoint));
    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0);
    }
  });
});
