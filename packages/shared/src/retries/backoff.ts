export type BackoffOptions = {
  baseMs: number;
  factor: number;
  maxMs: number;
};

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseMs: 250,
  factor: 2,
  maxMs: 5_000
};

/**
 * Delay before poll attempt `attempt` (1-based): `baseMs * factor^(attempt - 1)`, capped at `maxMs`.
 * Attempts below one count as the first.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const exponent = Number.isFinite(attempt) ? Math.max(0, Math.floor(attempt) - 1) : 0;
  return Math.round(Math.min(options.baseMs * Math.pow(options.factor, exponent), options.maxMs));
}
