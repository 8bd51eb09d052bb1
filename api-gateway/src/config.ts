import { toNumber } from 'saga-messaging';
import { loadRateLimitSettings } from './rateLimit/policies';

export const config = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  SERVICE_NAME: process.env.SERVICE_NAME || 'api-gateway',
  PORT: toNumber(process.env.PORT, 3000),
  ORDER_SERVICE_URL: process.env.ORDER_SERVICE_URL || 'http://localhost:3001',
  INVENTORY_SERVICE_URL: process.env.INVENTORY_SERVICE_URL || 'http://localhost:3002',
  USER_SERVICE_URL: process.env.USER_SERVICE_URL || undefined,
  PAYMENT_SERVICE_URL: process.env.PAYMENT_SERVICE_URL || undefined,
  DOWNSTREAM_TIMEOUT_MS: toNumber(process.env.DOWNSTREAM_TIMEOUT_MS, 3000),
  RATE_LIMIT: loadRateLimitSettings(),
};
