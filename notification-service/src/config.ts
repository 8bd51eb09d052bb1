import { loadMessagingConfig, toBool, toNumber } from 'saga-messaging';

export const config = {
  ...loadMessagingConfig({ mongoUrl: 'mongodb://localhost:27017/notifications' }),
  SERVICE_NAME: process.env.SERVICE_NAME || 'notification-service',
  PORT: toNumber(process.env.PORT, 3003),
  DISPATCHER_ENABLED: toBool(process.env.DISPATCHER_ENABLED, true),
  DISPATCH_INTERVAL_MS: toNumber(process.env.DISPATCH_INTERVAL_MS, 30_000),
  DISPATCH_BATCH_SIZE: toNumber(process.env.DISPATCH_BATCH_SIZE, 50),
};
