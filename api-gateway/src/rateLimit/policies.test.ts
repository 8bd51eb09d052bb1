import { describe, expect, it } from 'vitest';
import type { RateLimitPolicy } from './fixedWindowLimiter';
import { policyForPath, RateLimiterRegistry, RateLimitSettings } from './policies';

const single: RateLimitPolicy = { permitLimit: 1, windowMs: 60_000, queueLimit: 0, queueOrder: 'oldest-first' };
const settings = (enabled: boolean): RateLimitSettings => ({
  enabled,
  policies: { default: single, order: single, product: single },
});

describe('policyForPath', () => {
  it('maps paths to policies', () => {
    expect(policyForPath('/order-summary/ord-1')).toBe('order');
    expect(policyForPath('/products')).toBe('product');
    expect(policyForPath('/health')).toBe('default');
  });
});

describe('RateLimiterRegistry', () => {
  it('keeps a separate window per policy and identity', async () => {
    const registry = new RateLimiterRegistry(settings(true));

    expect((await registry.acquire('order', 'user:1')).acquired).toBe(true);
    expect((await registry.acquire('order', 'user:1')).acquired).toBe(false);
    expect((await registry.acquire('order', 'user:2')).acquired).toBe(true);
    expect((await registry.acquire('product', 'user:1')).acquired).toBe(true);
    expect(registry.size).toBe(3);
  });

  it('lets everything through when disabled', async () => {
    const registry = new RateLimiterRegistry(settings(false));

    await registry.acquire('order', 'user:1');

    expect(await registry.acquire('order', 'user:1')).toEqual({ acquired: true, retryAfterMs: 0 });
    expect(registry.size).toBe(0);
  });
});
