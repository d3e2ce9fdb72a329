/**
 * Failure classification over raw agent output.
 *
 * Patterns are tested in a fixed priority order and the first match wins, so
 * text carrying several markers (a billing notice that also says "error 403")
 * always lands on the same kind.
 */

export const ErrorKind = {
  None: 'none',
  RateLimit: 'rateLimit',
  Auth: 'auth',
  Quota: 'quota',
  Timeout: 'timeout',
  Network: 'network',
  ApiError: 'apiError',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export const ERROR_KINDS: readonly ErrorKind[] = Object.values(ErrorKind);

export interface ExitSignal {
  /** The executor's own timeout fired. */
  timedOut?: boolean;
  /** Process exit code; 124 is what `timeout(1)` reports. */
  exitCode?: number | null;
}

const TIMEOUT_EXIT_CODE = 124;

const PATTERNS: ReadonlyArray<readonly [Exclude<ErrorKind, 'none'>, RegExp]> = [
  [ErrorKind.RateLimit, /\b429\b|rate.?limit|too many requests|throttl/i],
  [ErrorKind.Auth, /\b40[13]\b|unauthorized|forbidden|invalid.?api.?key/i],
  [ErrorKind.Quota, /quota|billing|exceeded|insufficient|payment.?required|\b402\b/i],
  [ErrorKind.Timeout, /timeout|timed?.?out/i],
  [ErrorKind.Network, /network|connection|refused|ECONNREFUSED|ETIMEDOUT/i],
  [ErrorKind.ApiError, /\b50[0234]\b|internal.?server|bad.?gateway/i],
];

export function classify(rawOutput: string, exitSignal: ExitSignal = {}): ErrorKind {
  const timedOut = exitSignal.timedOut === true || exitSignal.exitCode === TIMEOUT_EXIT_CODE;

  for (const [kind, pattern] of PATTERNS) {
    if (pattern.test(rawOutput)) {
      return kind;
    }
    if (kind === ErrorKind.Timeout && timedOut) {
      return kind;
    }
  }

  return ErrorKind.None;
}

export function isFatal(kind: ErrorKind): boolean {
  return kind === ErrorKind.Auth || kind === ErrorKind.Quota;
}

export function isRetryable(kind: ErrorKind): boolean {
  switch (kind) {
    case ErrorKind.RateLimit:
    case ErrorKind.Timeout:
    case ErrorKind.Network:
    case ErrorKind.ApiError:
      return true;
    case ErrorKind.None:
    case ErrorKind.Auth:
    case ErrorKind.Quota:
      return false;
  }
}

const LABELS: Record<ErrorKind, string> = {
  none: 'NONE',
  rateLimit: 'RATE_LIMIT',
  auth: 'AUTH_ERROR',
  quota: 'QUOTA_EXCEEDED',
  timeout: 'TIMEOUT',
  network: 'NETWORK_ERROR',
  apiError: 'API_ERROR',
};

export function errorKindLabel(kind: ErrorKind): string {
  return LABELS[kind];
}

/** A phrase that `classify` maps back to `kind`. */
const PHRASES: Record<ErrorKind, string> = {
  none: 'failed',
  rateLimit: 'rate limited',
  auth: 'unauthorized',
  quota: 'quota exceeded',
  timeout: 'timed out',
  network: 'network error',
  apiError: 'internal server error',
};

export function errorKindPhrase(kind: ErrorKind): string {
  return PHRASES[kind];
}
