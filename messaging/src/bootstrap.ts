import type { Server } from 'http';
import type { MessagingConfig } from './config';
import { closeMongo, connectMongo, Mongo, mongoUnitOfWorkFactory } from './db/mongo';
import { closeRedis, connectRedis, RedisClient, RedisProcessedEventStore } from './db/redis';
import { buildReadiness } from './health/readiness';
import { logger } from './logger';
import { MessageBus } from './mq/bus';
import { ConnectionManager } from './mq/connection';
import { ConsumerRuntime } from './mq/consumer';
import { declareTopology } from './mq/topology';
import type { UnitOfWorkFactory } from './mq/unitOfWork';
import { backoffDelay, sleep } from './utils/breaker';

/** Broker, database and processed-event store of one service process. */
export interface Infra {
  connection: ConnectionManager;
  bus: MessageBus;
  mongo: Mongo;
  redis: RedisClient;
  unitOfWork: UnitOfWorkFactory;
  runtime: ConsumerRuntime;
}

export async function connectInfra(config: MessagingConfig, serviceName: string, dbName: string): Promise<Infra> {
  const connection = new ConnectionManager(config.RABBITMQ_URL, { prefetch: config.PREFETCH });
  let mongo: Mongo | null = null;
  let redis: RedisClient | null = null;
  try {
    await connection.start();
    const bus = new MessageBus(connection, serviceName, config.MQ_BREAKER);
    mongo = await connectMongo(config.MONGO_URL, dbName);
    redis = await connectRedis(config.REDIS_URL);
    const unitOfWork = mongoUnitOfWorkFactory(mongo.client, config.MONGO_TRANSACTIONS);
    const runtime = new ConsumerRuntime({
      subscriber: bus,
      publisher: bus,
      processed: new RedisProcessedEventStore(redis, config.PROCESSED_TTL_SECONDS),
      unitOfWork,
      maxRetries: config.CONSUMER_MAX_RETRIES,
      prefetch: config.PREFETCH,
    });
    return { connection, bus, mongo, redis, unitOfWork, runtime };
  } catch (err) {
    await closeRedis(redis);
    await closeMongo(mongo);
    await connection.close();
    throw err;
  }
}

/** Declares the queues the runtime consumes, then starts consuming. */
export async function startConsumers(infra: Infra, config: MessagingConfig): Promise<void> {
  const ch = await infra.connection.createChannel(0);
  try {
    await declareTopology(ch, infra.runtime.queues, { retryDelayMs: config.CONSUMER_RETRY_DELAY_MS });
  } finally {
    await ch.close();
  }
  await infra.runtime.start();
}

export async function closeInfra(infra: Infra | null): Promise<void> {
  if (!infra) return;
  await infra.runtime.stop();
  await infra.connection.close();
  await closeRedis(infra.redis);
  await closeMongo(infra.mongo);
}

export function infraReadiness(getInfra: () => Infra | null, timeoutMs: number) {
  return buildReadiness(
    {
      rabbitmq: async () => getInfra()?.connection.isConnected() ?? false,
      mongo: async () => {
        const infra = getInfra();
        if (!infra) return false;
        return infra.mongo.db.command({ ping: 1 });
      },
      redis: async () => {
        const infra = getInfra();
        if (!infra) return false;
        return infra.redis.ping();
      },
    },
    timeoutMs
  );
}

/**
 * Retries `start` with exponential backoff until it succeeds or the signal
 * aborts. Errors matching `isFatal` are rethrown at once.
 */
export async function startWithRetry(
  name: string,
  start: () => Promise<void>,
  signal: AbortSignal,
  isFatal: (err: unknown) => boolean = () => false
): Promise<void> {
  let attempt = 0;
  while (!signal.aborted) {
    try {
      await start();
      logger.info(`[${name}] infra and consumers started`);
      return;
    } catch (err) {
      if (isFatal(err)) throw err;
      attempt++;
      const backoff = backoffDelay(attempt);
      logger.error({ err, attempt, backoff }, `[${name}] failed to start infra/consumers; will retry`);
      await sleep(backoff, signal);
    }
  }
}

export function installShutdown(server: Server, cleanup: () => Promise<void>): void {
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      logger.info('HTTP server closed');
      cleanup().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Cleanup failed');
          process.exit(1);
        }
      );
    });
    // Force exit if not closed in time
    setTimeout(() => process.exit(1), 10_000).unref();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
