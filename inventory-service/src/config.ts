import { loadMessagingConfig, toBool, toNumber } from 'saga-messaging';

export const config = {
  ...loadMessagingConfig({ mongoUrl: 'mongodb://localhost:27017/inventory' }),
  SERVICE_NAME: process.env.SERVICE_NAME || 'inventory-service',
  PORT: toNumber(process.env.PORT, 3002),
  // Inserts the bundled catalogue on start; existing products keep their stock
  SEED_PRODUCTS: toBool(process.env.SEED_PRODUCTS, true),
};
