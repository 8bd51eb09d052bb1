import type { Express } from 'express';
import { createServer, errorHandler, notFoundHandler } from 'saga-messaging';
import { correlationId } from './http/middleware/correlationId';
import { rateLimit } from './http/middleware/rateLimit';
import registerGatewayRoutes from './http/routes';
import type { RateLimiterRegistry } from './rateLimit/policies';
import type { OrderSummaryAggregator } from './summary/orderSummaryAggregator';

export interface GatewayAppDeps {
  aggregator: OrderSummaryAggregator;
  limiters: RateLimiterRegistry;
}

export function createGatewayApp(serviceName: string, { aggregator, limiters }: GatewayAppDeps): Express {
  const app = createServer(serviceName, async () => true);
  app.use(correlationId);
  app.use(rateLimit(limiters));
  registerGatewayRoutes(app, aggregator);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
