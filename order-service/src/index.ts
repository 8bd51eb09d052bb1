import { closeInfra, connectInfra, Infra, infraReadiness, installShutdown, logger, startConsumers, startWithRetry, TopologyError } from 'saga-messaging';
import { createOrderApp, registerOrderConsumers } from './app';
import { config } from './config';
import type { OrdersControllerDeps } from './http/controllers/orders.controller';
import { OrderService } from './orders/orderService';
import { MongoEventsRepo } from './repositories/eventsRepo';
import { MongoOrdersRepository } from './repositories/ordersRepo';

let infra: Infra | null = null;
let deps: OrdersControllerDeps | null = null;
const lifecycle = new AbortController();

async function start(): Promise<void> {
  if (!infra) {
    const next = await connectInfra(config, config.SERVICE_NAME, 'orders');
    let ready: OrdersControllerDeps;
    try {
      const orders = new MongoOrdersRepository(next.mongo.db, config.DB_BREAKER);
      const events = new MongoEventsRepo(next.mongo.db, config.DB_BREAKER);
      await orders.ensureIndexes();
      await events.ensureIndexes();
      registerOrderConsumers(next.runtime, orders, events);
      ready = {
        orderService: new OrderService({ orders, events, publisher: next.bus, serviceName: config.SERVICE_NAME }),
      };
    } catch (err) {
      await closeInfra(next);
      throw err;
    }
    infra = next;
    deps = ready;
  }
  await startConsumers(infra, config);
}

const app = createOrderApp(() => deps, {
  serviceName: config.SERVICE_NAME,
  idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
  readiness: infraReadiness(() => infra, config.READY_TIMEOUT_MS),
});

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, service: config.SERVICE_NAME }, 'Service started');
  startWithRetry('Order', start, lifecycle.signal, (err) => err instanceof TopologyError).catch((err: unknown) => {
    logger.fatal({ err }, '[Order] fatal startup error');
    process.exit(1);
  });
});

installShutdown(server, async () => {
  lifecycle.abort();
  await closeInfra(infra);
});
