import { loadMessagingConfig, toNumber } from 'saga-messaging';

export const config = {
  ...loadMessagingConfig({ mongoUrl: 'mongodb://localhost:27017/orders' }),
  SERVICE_NAME: process.env.SERVICE_NAME || 'order-service',
  PORT: toNumber(process.env.PORT, 3001),
  IDEMPOTENCY_TTL_MS: toNumber(process.env.IDEMPOTENCY_TTL_MS, 24 * 60 * 60 * 1000),
};

export type OrderServiceConfig = typeof config;
