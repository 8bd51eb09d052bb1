import { toBool, toNumber } from 'saga-messaging';
import { FixedWindowLimiter, Lease, QueueOrder, RateLimitPolicy } from './fixedWindowLimiter';

export const POLICY_NAMES = ['default', 'order', 'product'] as const;
export type PolicyName = (typeof POLICY_NAMES)[number];

export interface RateLimitSettings {
  enabled: boolean;
  policies: Record<PolicyName, RateLimitPolicy>;
}

const toQueueOrder = (v: string | undefined, def: QueueOrder): QueueOrder =>
  v === 'oldest-first' || v === 'newest-first' ? v : def;

function policyFromEnv(name: PolicyName, def: RateLimitPolicy): RateLimitPolicy {
  const prefix = `RATE_LIMIT_${name.toUpperCase()}`;
  const env = process.env;
  return {
    permitLimit: toNumber(env[`${prefix}_PERMIT_LIMIT`], def.permitLimit),
    windowMs: toNumber(env[`${prefix}_WINDOW_MS`], def.windowMs),
    queueLimit: toNumber(env[`${prefix}_QUEUE_LIMIT`], def.queueLimit),
    queueOrder: toQueueOrder(env[`${prefix}_QUEUE_ORDER`], def.queueOrder),
  };
}

export function loadRateLimitSettings(): RateLimitSettings {
  return {
    enabled: toBool(process.env.RATE_LIMIT_ENABLED, true),
    policies: {
      default: policyFromEnv('default', { permitLimit: 100, windowMs: 60_000, queueLimit: 2, queueOrder: 'oldest-first' }),
      order: policyFromEnv('order', { permitLimit: 30, windowMs: 60_000, queueLimit: 2, queueOrder: 'oldest-first' }),
      product: policyFromEnv('product', { permitLimit: 100, windowMs: 60_000, queueLimit: 5, queueOrder: 'newest-first' }),
    },
  };
}

export function policyForPath(path: string): PolicyName {
  const p = path.toLowerCase();
  if (p.includes('/product')) return 'product';
  if (p.includes('/order')) return 'order';
  return 'default';
}

const SWEEP_EVERY = 1000;

/** One limiter per `<policy>:<identity>`, created on first use. */
export class RateLimiterRegistry {
  private readonly limiters = new Map<string, FixedWindowLimiter>();
  private calls = 0;

  constructor(private readonly settings: RateLimitSettings) {}

  async acquire(policy: PolicyName, identity: string): Promise<Lease> {
    if (!this.settings.enabled) return { acquired: true, retryAfterMs: 0 };
    if (++this.calls % SWEEP_EVERY === 0) this.sweep();

    const key = `${policy}:${identity}`;
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new FixedWindowLimiter(this.settings.policies[policy]);
      this.limiters.set(key, limiter);
    }
    return limiter.acquire();
  }

  get size(): number {
    return this.limiters.size;
  }

  dispose(): void {
    for (const limiter of this.limiters.values()) limiter.dispose();
    this.limiters.clear();
  }

  private sweep(): void {
    const now = Date.now();
    for (const [key, limiter] of this.limiters) {
      if (limiter.isIdle(now)) this.limiters.delete(key);
    }
  }
}
