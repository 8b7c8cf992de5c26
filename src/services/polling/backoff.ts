import type { PollerConfig } from './types';

export type BackoffConfig = Pick<
  PollerConfig,
  'initialDelayMs' | 'backoffFactor' | 'fixedAttempts' | 'maxDelayMs'
>;

/**
 * Delay to wait after attempt `pollCount` before issuing the next one.
 *
 * Flat `initialDelayMs` while `pollCount <= fixedAttempts`, then
 * `initialDelayMs * backoffFactor^(pollCount - fixedAttempts)` capped at
 * `maxDelayMs`. Non-decreasing in `pollCount` as long as
 * `backoffFactor >= 1` and `maxDelayMs >= initialDelayMs`.
 */
export function computeBackoffDelay(pollCount: number, config: BackoffConfig): number {
  if (pollCount <= config.fixedAttempts) {
    return Math.min(config.initialDelayMs, config.maxDelayMs);
  }
  const exponent = pollCount - config.fixedAttempts;
  return Math.min(
    config.initialDelayMs * Math.pow(config.backoffFactor, exponent),
    config.maxDelayMs
  );
}
