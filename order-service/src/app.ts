import type { Express } from 'express';
import { ConsumerRuntime, createServer, errorHandler, notFoundHandler } from 'saga-messaging';
import { IdempotencyCache } from './http/idempotency';
import registerOrderRoutes, { OrdersDepsProvider } from './http/routes';
import { orderCancelledHandler } from './messaging/orderCancelledHandler';
import { orderConfirmedHandler } from './messaging/orderConfirmedHandler';
import type { EventLog } from './repositories/eventsRepo';
import type { OrdersRepository } from './repositories/ordersRepo';

export interface OrderAppOptions {
  serviceName: string;
  idempotencyTtlMs: number;
  readiness?: () => Promise<boolean>;
}

export function createOrderApp(getDeps: OrdersDepsProvider, options: OrderAppOptions): Express {
  const app = createServer(options.serviceName, async () => true, options.readiness);
  // Mount routes unconditionally; handlers answer 503 until the deps are ready
  registerOrderRoutes(app, getDeps, new IdempotencyCache(options.idempotencyTtlMs));
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

export function registerOrderConsumers(runtime: ConsumerRuntime, orders: OrdersRepository, events: EventLog): void {
  runtime.register(orderCancelledHandler(orders, events)).register(orderConfirmedHandler(orders, events));
}
