import { computeBackoffDelay, BackoffConfig } from './backoff';
import { DEFAULT_POLLER_CONFIG } from './config';

describe('computeBackoffDelay', () => {
  const config: BackoffConfig = {
    initialDelayMs: 1000,
    backoffFactor: 2,
    fixedAttempts: 3,
    maxDelayMs: 10000,
  };

  it('should return the initial delay during the fixed phase', () => {
    expect(computeBackoffDelay(1, config)).toBe(1000);
    expect(computeBackoffDelay(2, config)).toBe(1000);
    expect(computeBackoffDelay(3, config)).toBe(1000);
  });

  it('should grow exponentially after the fixed phase', () => {
    expect(computeBackoffDelay(4, config)).toBe(2000); // 1000 * 2^1
    expect(computeBackoffDelay(5, config)).toBe(4000); // 1000 * 2^2
    expect(computeBackoffDelay(6, config)).toBe(8000); // 1000 * 2^3
  });

  it('should cap at maxDelayMs', () => {
    expect(computeBackoffDelay(7, config)).toBe(10000);
    expect(computeBackoffDelay(50, config)).toBe(10000);
  });

  it('should stay flat with a factor of 1', () => {
    const flat = { ...config, backoffFactor: 1 };
    expect(computeBackoffDelay(1, flat)).toBe(1000);
    expect(computeBackoffDelay(20, flat)).toBe(1000);
  });

  it('should grow from the first retry when there is no fixed phase', () => {
    const noFixed = { ...config, fixedAttempts: 0 };
    expect(computeBackoffDelay(1, noFixed)).toBe(2000);
    expect(computeBackoffDelay(2, noFixed)).toBe(4000);
  });

  it('should never exceed maxDelayMs even for the fixed phase', () => {
    const tight = { ...config, maxDelayMs: 500 };
    expect(computeBackoffDelay(1, tight)).toBe(500);
  });

  it('should produce the default curve', () => {
    const delays = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10].map(n => computeBackoffDelay(n, DEFAULT_POLLER_CONFIG));
    expect(delays).toEqual([1500, 1500, 1500, 1500, 1500, 3000, 6000, 12000, 24000, 24000]);
  });

  it('should be non-decreasing and bounded for every attempt', () => {
    const configs: BackoffConfig[] = [
      config,
      DEFAULT_POLLER_CONFIG,
      { initialDelayMs: 0, backoffFactor: 3, fixedAttempts: 0, maxDelayMs: 0 },
      { initialDelayMs: 250, backoffFactor: 1.5, fixedAttempts: 1, maxDelayMs: 60000 },
    ];

    for (const candidate of configs) {
      let previous = 0;
      for (let n = 1; n <= 200; n++) {
        const delay = computeBackoffDelay(n, candidate);
        expect(delay).toBeGreaterThanOrEqual(previous);
        expect(delay).toBeLessThanOrEqual(candidate.maxDelayMs);
        previous = delay;
      }
    }
  });
});
