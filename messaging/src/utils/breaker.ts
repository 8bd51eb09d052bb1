import CircuitBreaker from 'opossum';
import type { BreakerSettings } from '../config';
import { logCircuitBreaker } from '../logger';

/**
 * Wraps an async operation in an opossum circuit breaker that lives as long as
 * the returned function, so failures accumulate across calls. When the
 * breaker is disabled the action is called directly.
 */
export function withBreaker<TI extends unknown[], TR>(
  name: string,
  action: (...args: TI) => Promise<TR>,
  settings: BreakerSettings
): (...args: TI) => Promise<TR> {
  if (!settings.enabled) return action;

  const breaker = new CircuitBreaker<TI, TR>(action, {
    name,
    timeout: settings.timeout,
    resetTimeout: settings.resetTimeout,
    errorThresholdPercentage: settings.errorThresholdPercentage,
    volumeThreshold: settings.volumeThreshold,
  });
  breaker.on('open', () => logCircuitBreaker(name, 'open', 'error threshold reached'));
  breaker.on('halfOpen', () => logCircuitBreaker(name, 'half-open'));
  breaker.on('close', () => logCircuitBreaker(name, 'closed'));

  return (...args: TI) => breaker.fire(...args);
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });

export const backoffDelay = (attempt: number, baseMs = 1000, maxMs = 30000): number =>
  Math.min(maxMs, baseMs * 2 ** attempt);
