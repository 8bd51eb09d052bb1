import { afterEach, describe, expect, it } from 'vitest';
import { listen, RunningApp } from 'saga-messaging/testing';
import { createGatewayApp } from './app';
import type { RateLimitPolicy } from './rateLimit/fixedWindowLimiter';
import { RateLimiterRegistry } from './rateLimit/policies';
import { FetchLike, OrderSummaryAggregator } from './summary/orderSummaryAggregator';

const ORDER = {
  orderId: 'ord-1',
  userId: 'user-1',
  status: 'PLACED',
  customerName: 'Test Customer',
  items: [],
  total: 0,
  createdAt: '2024-05-01T10:00:00.000Z',
  updatedAt: '2024-05-01T10:00:00.000Z',
};

const orderService: FetchLike = async (url) => {
  if (url === 'http://orders.test/orders/ord-1') {
    return new Response(JSON.stringify({ success: true, data: ORDER }), { status: 200 });
  }
  if (url === 'http://orders.test/orders/ord-broken') {
    return new Response('upstream down', { status: 502 });
  }
  return new Response(JSON.stringify({ success: false, data: null, message: 'Order not found', errors: [] }), { status: 404 });
};

const generous: RateLimitPolicy = { permitLimit: 100, windowMs: 60_000, queueLimit: 0, queueOrder: 'oldest-first' };
const strict: RateLimitPolicy = { permitLimit: 1, windowMs: 60_000, queueLimit: 0, queueOrder: 'oldest-first' };

async function start(orderPolicy: RateLimitPolicy = generous): Promise<{ running: RunningApp; limiters: RateLimiterRegistry }> {
  const limiters = new RateLimiterRegistry({
    enabled: true,
    policies: { default: generous, order: orderPolicy, product: generous },
  });
  const aggregator = new OrderSummaryAggregator(
    { orderServiceUrl: 'http://orders.test', inventoryServiceUrl: 'http://inventory.test', timeoutMs: 1000 },
    orderService
  );
  const running = await listen(createGatewayApp('api-gateway', { aggregator, limiters }));
  return { running, limiters };
}

describe('api gateway', () => {
  let current: { running: RunningApp; limiters: RateLimiterRegistry } | null = null;

  afterEach(async () => {
    current?.limiters.dispose();
    await current?.running.close();
    current = null;
  });

  it('returns the summary and echoes the correlation id', async () => {
    current = await start();
    const res = await fetch(`${current.running.baseUrl}/order-summary/ord-1`, { headers: { 'x-correlation-id': 'corr-42' } });

    expect(res.status).toBe(200);
    expect(res.headers.get('x-correlation-id')).toBe('corr-42');
    const body = await res.json();
    expect(body.success).toBe(true);
    expect(body.data.orderId).toBe('ord-1');
    expect(body.data.warnings).toEqual(['Payment details are unavailable.']);
  });

  it('mints a correlation id when the caller sends none', async () => {
    current = await start();
    const res = await fetch(`${current.running.baseUrl}/order-summary/ord-1`);

    expect(res.headers.get('x-correlation-id')).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('answers 404 for an unknown order', async () => {
    current = await start();
    const res = await fetch(`${current.running.baseUrl}/order-summary/ord-missing`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, data: null, message: 'Order with id ord-missing not found.', errors: [] });
  });

  it('answers 500 when the order service fails', async () => {
    current = await start();
    const res = await fetch(`${current.running.baseUrl}/order-summary/ord-broken`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, data: null, message: 'An unexpected error occurred', errors: [] });
  });

  it('rejects a caller over its limit and lets other callers through', async () => {
    current = await start(strict);
    const url = `${current.running.baseUrl}/order-summary/ord-1`;

    expect((await fetch(url, { headers: { 'x-user-id': 'user-1' } })).status).toBe(200);
    const limited = await fetch(url, { headers: { 'x-user-id': 'user-1' } });

    expect(limited.status).toBe(429);
    expect(limited.headers.get('retry-after')).toBe('60');
    expect(await limited.json()).toEqual({
      success: false,
      data: null,
      message: 'Too many requests. Please try again later.',
      errors: ['rate_limit_exceeded'],
    });
    expect((await fetch(url, { headers: { 'x-user-id': 'user-2' } })).status).toBe(200);
  });
});
