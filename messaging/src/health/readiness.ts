import { createLogger } from '../logger';

const log = createLogger('readiness');

export type DependencyCheck = () => Promise<unknown>;

const withTimeout = <T>(p: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error('ready_timeout')), timeoutMs);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(timer));
};

/**
 * Ready when every named dependency answers within the timeout. A check
 * returning `false` counts as not ready; any other value or no value is ready.
 */
export function buildReadiness(checks: Record<string, DependencyCheck>, timeoutMs: number) {
  return async function readiness(): Promise<boolean> {
    for (const [name, check] of Object.entries(checks)) {
      try {
        const result = await withTimeout(check(), timeoutMs);
        if (result === false) {
          log.warn({ dependency: name }, '[Ready] dependency not ready');
          return false;
        }
      } catch (err) {
        log.warn({ err, dependency: name }, '[Ready] readiness check failed');
        return false;
      }
    }
    return true;
  };
}
