export * from './config';
export * from './errors';
export * from './logger';
export * from './events';
export * from './utils/breaker';
export * from './mq/transport';
export * from './mq/connection';
export * from './mq/bus';
export * from './mq/topology';
export * from './mq/unitOfWork';
export * from './mq/consumer';
export * from './processed/store';
export * from './db/mongo';
export * from './db/redis';
export * from './http/server';
export * from './health/readiness';
export * from './bootstrap';
