import type { BackoffConfig } from '../config/schema.js';

export const DEFAULT_BACKOFF: BackoffConfig = { baseMs: 5000, maxMs: 300000 };

/** Fraction of the raw delay used as symmetric jitter. */
const JITTER_RATIO = 0.2;

/**
 * Delay before retry iteration `attempt` (1-based) of a wave: exponential,
 * capped at `maxMs`, with ±20% jitter. Always within [0, maxMs].
 */
export function backoffDelay(
  attempt: number,
  policy: BackoffConfig = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponent = Math.max(1, Math.floor(attempt)) - 1;
  const raw = Math.min(policy.baseMs * 2 ** exponent, policy.maxMs);
  const jitter = raw * JITTER_RATIO;
  const delay = raw - jitter + random() * 2 * jitter;
  return Math.round(Math.min(Math.max(delay, 0), policy.maxMs));
}
