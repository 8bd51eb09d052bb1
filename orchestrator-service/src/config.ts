import { loadMessagingConfig, toNumber } from 'saga-messaging';

export const config = {
  ...loadMessagingConfig({ mongoUrl: 'mongodb://localhost:27017/orchestrator' }),
  SERVICE_NAME: process.env.SERVICE_NAME || 'orchestrator-service',
  PORT: toNumber(process.env.PORT, 3004),
  DEFAULT_CANCEL_REASON: process.env.DEFAULT_CANCEL_REASON || 'insufficient stock',
};
