import type { z } from 'zod';
import { AppError, createLogger, Logger } from 'saga-messaging';
import { CORRELATION_HEADER } from '../http/middleware/correlationId';
import {
  OrderEnvelope,
  OrderView,
  PaymentEnvelope,
  PaymentViewSchema,
  ProductsEnvelope,
  UserEnvelope,
} from './downstream';

export const CUSTOMER_WARNING = 'Customer details could not be loaded.';
export const PRODUCTS_WARNING = 'Product details could not be fully loaded.';
export const PAYMENT_WARNING = 'Payment details are unavailable.';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface Downstreams {
  orderServiceUrl: string;
  inventoryServiceUrl: string;
  /** Without a user service the customer is taken from the order's contact details. */
  userServiceUrl?: string;
  paymentServiceUrl?: string;
  timeoutMs: number;
}

export interface CustomerInfo {
  userId: string;
  name: string;
  email: string | null;
  phoneNumber: string | null;
}

export interface ProductLine {
  productId: string;
  name: string;
  quantity: number;
  unitPrice: number;
  inStock: number;
}

export interface OrderSummary {
  orderId: string;
  order: Pick<OrderView, 'status' | 'total' | 'createdAt' | 'updatedAt'>;
  customer: CustomerInfo | null;
  products: ProductLine[];
  payment: z.infer<typeof PaymentViewSchema> | null;
  warnings: string[];
  isPartial: boolean;
}

/** The order service failed or answered with something other than an order. */
export class DownstreamError extends AppError {
  constructor(message: string) {
    super(message, 'downstream_failed', 500);
  }
}

/**
 * Builds the order summary from the order, then customer, products and
 * payment in parallel. Only the order is required; every other part that
 * cannot be loaded becomes a warning on a partial summary.
 */
export class OrderSummaryAggregator {
  private readonly log: Logger;

  constructor(
    private readonly downstreams: Downstreams,
    private readonly fetchImpl: FetchLike = fetch,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('summary');
  }

  async getSummary(orderId: string, correlationId: string): Promise<OrderSummary | null> {
    const order = await this.fetchOrder(orderId, correlationId);
    if (!order) {
      this.log.warn({ orderId, correlationId }, '[Gateway] order not found');
      return null;
    }

    const [customer, products, payment] = await Promise.all([
      this.fetchCustomer(order, correlationId),
      this.fetchProducts(order, correlationId),
      this.fetchPayment(orderId, correlationId),
    ]);

    const warnings: string[] = [];
    if (!customer) warnings.push(CUSTOMER_WARNING);
    if (products.length < order.items.length) warnings.push(PRODUCTS_WARNING);
    if (!payment) warnings.push(PAYMENT_WARNING);

    return {
      orderId: order.orderId,
      order: { status: order.status, total: order.total, createdAt: order.createdAt, updatedAt: order.updatedAt },
      customer,
      products,
      payment,
      warnings,
      isPartial: warnings.length > 0,
    };
  }

  private async get(url: string, correlationId: string): Promise<Response> {
    return this.fetchImpl(url, {
      headers: { accept: 'application/json', [CORRELATION_HEADER]: correlationId },
      signal: AbortSignal.timeout(this.downstreams.timeoutMs),
    });
  }

  private async fetchOrder(orderId: string, correlationId: string): Promise<OrderView | null> {
    const res = await this.get(`${this.downstreams.orderServiceUrl}/orders/${encodeURIComponent(orderId)}`, correlationId);
    if (res.status === 404) return null;
    if (!res.ok) throw new DownstreamError(`Order service answered ${res.status}`);
    const parsed = OrderEnvelope.safeParse(await res.json());
    if (!parsed.success) throw new DownstreamError('Order service returned an invalid response');
    return parsed.data.data;
  }

  private async fetchCustomer(order: OrderView, correlationId: string): Promise<CustomerInfo | null> {
    const base = this.downstreams.userServiceUrl;
    if (!base) {
      return {
        userId: order.userId,
        name: order.customerName,
        email: order.customerEmail ?? null,
        phoneNumber: order.phoneNumber ?? null,
      };
    }
    try {
      const res = await this.get(`${base}/users/${encodeURIComponent(order.userId)}`, correlationId);
      if (!res.ok) {
        this.log.warn({ userId: order.userId, status: res.status }, '[Gateway] user service did not return a profile');
        return null;
      }
      const { data } = UserEnvelope.parse(await res.json());
      return { userId: data.userId, name: data.fullName, email: data.email ?? null, phoneNumber: data.phoneNumber ?? null };
    } catch (err) {
      this.log.error({ err, userId: order.userId }, '[Gateway] failed to load customer');
      return null;
    }
  }

  private async fetchProducts(order: OrderView, correlationId: string): Promise<ProductLine[]> {
    const ids = [...new Set(order.items.map((i) => i.productId))];
    if (ids.length === 0) return [];
    try {
      const query = ids.map(encodeURIComponent).join(',');
      const res = await this.get(`${this.downstreams.inventoryServiceUrl}/products?ids=${query}`, correlationId);
      if (!res.ok) {
        this.log.warn({ status: res.status, ids }, '[Gateway] inventory service did not return products');
        return [];
      }
      const { data } = ProductsEnvelope.parse(await res.json());
      const byId = new Map(data.map((p) => [p.productId, p]));
      return order.items.flatMap((item) => {
        const product = byId.get(item.productId);
        if (!product) {
          this.log.warn({ productId: item.productId }, '[Gateway] product missing from inventory response');
          return [];
        }
        return [{ productId: item.productId, name: product.name, quantity: item.quantity, unitPrice: item.unitPrice, inStock: product.stock }];
      });
    } catch (err) {
      this.log.error({ err, ids }, '[Gateway] failed to load products');
      return [];
    }
  }

  private async fetchPayment(orderId: string, correlationId: string): Promise<OrderSummary['payment']> {
    const base = this.downstreams.paymentServiceUrl;
    if (!base) return null;
    try {
      const res = await this.get(`${base}/payments/order/${encodeURIComponent(orderId)}`, correlationId);
      if (!res.ok) return null;
      return PaymentEnvelope.parse(await res.json()).data;
    } catch (err) {
      this.log.error({ err, orderId }, '[Gateway] failed to load payment');
      return null;
    }
  }
}
