import { installShutdown, logger } from 'saga-messaging';
import { createGatewayApp } from './app';
import { config } from './config';
import { RateLimiterRegistry } from './rateLimit/policies';
import { OrderSummaryAggregator } from './summary/orderSummaryAggregator';

const limiters = new RateLimiterRegistry(config.RATE_LIMIT);
const aggregator = new OrderSummaryAggregator({
  orderServiceUrl: config.ORDER_SERVICE_URL,
  inventoryServiceUrl: config.INVENTORY_SERVICE_URL,
  userServiceUrl: config.USER_SERVICE_URL,
  paymentServiceUrl: config.PAYMENT_SERVICE_URL,
  timeoutMs: config.DOWNSTREAM_TIMEOUT_MS,
});

const app = createGatewayApp(config.SERVICE_NAME, { aggregator, limiters });

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, service: config.SERVICE_NAME, rateLimit: config.RATE_LIMIT.enabled }, 'Service started');
});

installShutdown(server, async () => {
  limiters.dispose();
});
