import { describe, expect, it } from 'vitest';
import {
  CUSTOMER_WARNING,
  Downstreams,
  DownstreamError,
  FetchLike,
  OrderSummaryAggregator,
  PAYMENT_WARNING,
  PRODUCTS_WARNING,
} from './orderSummaryAggregator';

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const order = {
  orderId: 'ord-1',
  userId: 'user-1',
  status: 'CONFIRMED',
  customerName: 'Test Customer',
  customerEmail: 'customer@example.com',
  items: [
    { productId: 'p-1', quantity: 2, unitPrice: 10 },
    { productId: 'p-2', quantity: 1, unitPrice: 5 },
  ],
  total: 25,
  createdAt: '2024-05-01T10:00:00.000Z',
  updatedAt: '2024-05-01T10:05:00.000Z',
  statusHistory: [{ status: 'PLACED', at: '2024-05-01T10:00:00.000Z' }],
};

const products = [
  { productId: 'p-1', name: 'Laptop', stock: 3, updatedAt: '2024-05-01T09:00:00.000Z' },
  { productId: 'p-2', name: 'Mouse', stock: 0, updatedAt: '2024-05-01T09:00:00.000Z' },
];

const payment = { paymentId: 'pay-1', status: 'Paid', method: 'card' };

type Route = () => Response | Promise<Response>;

function stubFetch(routes: Record<string, Route>) {
  const calls: { url: string; correlationId: string | null }[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, correlationId: new Headers(init?.headers).get('x-correlation-id') });
    const route = routes[url];
    if (!route) throw new Error(`unexpected request to ${url}`);
    return route();
  };
  return { fetchImpl, calls };
}

const downstreams = (overrides: Partial<Downstreams> = {}): Downstreams => ({
  orderServiceUrl: 'http://orders.test',
  inventoryServiceUrl: 'http://inventory.test',
  timeoutMs: 1000,
  ...overrides,
});

const ORDER_URL = 'http://orders.test/orders/ord-1';
const PRODUCTS_URL = 'http://inventory.test/products?ids=p-1,p-2';
const PAYMENT_URL = 'http://payments.test/payments/order/ord-1';

describe('OrderSummaryAggregator', () => {
  it('combines order, customer, products and payment', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order, message: 'OK', errors: [] }),
      [PRODUCTS_URL]: () => json({ success: true, data: products, message: 'OK', errors: [] }),
      [PAYMENT_URL]: () => json({ success: true, data: payment }),
    });
    const aggregator = new OrderSummaryAggregator(downstreams({ paymentServiceUrl: 'http://payments.test' }), fetchImpl);

    const summary = await aggregator.getSummary('ord-1', 'corr-1');

    expect(summary).toEqual({
      orderId: 'ord-1',
      order: { status: 'CONFIRMED', total: 25, createdAt: '2024-05-01T10:00:00.000Z', updatedAt: '2024-05-01T10:05:00.000Z' },
      customer: { userId: 'user-1', name: 'Test Customer', email: 'customer@example.com', phoneNumber: null },
      products: [
        { productId: 'p-1', name: 'Laptop', quantity: 2, unitPrice: 10, inStock: 3 },
        { productId: 'p-2', name: 'Mouse', quantity: 1, unitPrice: 5, inStock: 0 },
      ],
      payment: { paymentId: 'pay-1', status: 'Paid', method: 'card' },
      warnings: [],
      isPartial: false,
    });
  });

  it('forwards the correlation id to every downstream', async () => {
    const { fetchImpl, calls } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order }),
      [PRODUCTS_URL]: () => json({ success: true, data: products }),
      [PAYMENT_URL]: () => json({ success: true, data: payment }),
    });
    const aggregator = new OrderSummaryAggregator(downstreams({ paymentServiceUrl: 'http://payments.test' }), fetchImpl);

    await aggregator.getSummary('ord-1', 'corr-7');

    expect(calls.map((c) => c.url).sort()).toEqual([ORDER_URL, PAYMENT_URL, PRODUCTS_URL].sort());
    expect(calls.every((c) => c.correlationId === 'corr-7')).toBe(true);
  });

  it('returns null when the order does not exist', async () => {
    const { fetchImpl, calls } = stubFetch({
      [ORDER_URL]: () => json({ success: false, data: null, message: 'Order not found', errors: [] }, 404),
    });
    const aggregator = new OrderSummaryAggregator(downstreams(), fetchImpl);

    expect(await aggregator.getSummary('ord-1', 'corr-1')).toBeNull();
    expect(calls).toHaveLength(1);
  });

  it('fails when the order service fails', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: false, data: null, message: 'boom', errors: [] }, 503),
    });
    const aggregator = new OrderSummaryAggregator(downstreams(), fetchImpl);

    await expect(aggregator.getSummary('ord-1', 'corr-1')).rejects.toBeInstanceOf(DownstreamError);
  });

  it('fails when the order service answers with something other than an order', async () => {
    const { fetchImpl } = stubFetch({ [ORDER_URL]: () => json({ success: true, data: { id: 'ord-1' } }) });
    const aggregator = new OrderSummaryAggregator(downstreams(), fetchImpl);

    await expect(aggregator.getSummary('ord-1', 'corr-1')).rejects.toThrow('Order service returned an invalid response');
  });

  it('warns about products missing from the inventory response', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order }),
      [PRODUCTS_URL]: () => json({ success: true, data: [products[0]] }),
    });
    const aggregator = new OrderSummaryAggregator(downstreams(), fetchImpl);

    const summary = await aggregator.getSummary('ord-1', 'corr-1');

    expect(summary?.products.map((p) => p.productId)).toEqual(['p-1']);
    expect(summary?.warnings).toEqual([PRODUCTS_WARNING, PAYMENT_WARNING]);
    expect(summary?.isPartial).toBe(true);
  });

  it('keeps the order when inventory is unreachable', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order }),
      [PRODUCTS_URL]: () => Promise.reject(new TypeError('fetch failed')),
      [PAYMENT_URL]: () => json({ success: true, data: payment }),
    });
    const aggregator = new OrderSummaryAggregator(downstreams({ paymentServiceUrl: 'http://payments.test' }), fetchImpl);

    const summary = await aggregator.getSummary('ord-1', 'corr-1');

    expect(summary?.order.status).toBe('CONFIRMED');
    expect(summary?.products).toEqual([]);
    expect(summary?.warnings).toEqual([PRODUCTS_WARNING]);
  });

  it('loads the customer from the user service when one is configured', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order }),
      [PRODUCTS_URL]: () => json({ success: true, data: products }),
      'http://users.test/users/user-1': () =>
        json({ success: true, data: { userId: 'user-1', fullName: 'Profile Name', phoneNumber: '+10000000000' } }),
    });
    const aggregator = new OrderSummaryAggregator(downstreams({ userServiceUrl: 'http://users.test' }), fetchImpl);

    const summary = await aggregator.getSummary('ord-1', 'corr-1');

    expect(summary?.customer).toEqual({ userId: 'user-1', name: 'Profile Name', email: null, phoneNumber: '+10000000000' });
  });

  it('warns when the user service has no profile', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order }),
      [PRODUCTS_URL]: () => json({ success: true, data: products }),
      [PAYMENT_URL]: () => json({ success: true, data: payment }),
      'http://users.test/users/user-1': () => json({ success: false, data: null, message: 'User not found', errors: [] }, 404),
    });
    const aggregator = new OrderSummaryAggregator(
      downstreams({ userServiceUrl: 'http://users.test', paymentServiceUrl: 'http://payments.test' }),
      fetchImpl
    );

    const summary = await aggregator.getSummary('ord-1', 'corr-1');

    expect(summary?.customer).toBeNull();
    expect(summary?.warnings).toEqual([CUSTOMER_WARNING]);
  });

  it('warns when the payment service has no payment for the order', async () => {
    const { fetchImpl } = stubFetch({
      [ORDER_URL]: () => json({ success: true, data: order }),
      [PRODUCTS_URL]: () => json({ success: true, data: products }),
      [PAYMENT_URL]: () => json({ success: false, data: null, message: 'not found', errors: [] }, 404),
    });
    const aggregator = new OrderSummaryAggregator(downstreams({ paymentServiceUrl: 'http://payments.test' }), fetchImpl);

    const summary = await aggregator.getSummary('ord-1', 'corr-1');

    expect(summary?.payment).toBeNull();
    expect(summary?.warnings).toEqual([PAYMENT_WARNING]);
  });
});
