import { closeInfra, connectInfra, Infra, infraReadiness, installShutdown, logger, startConsumers, startWithRetry, TopologyError } from 'saga-messaging';
import { createInventoryApp, registerInventoryConsumers } from './app';
import { config } from './config';
import { loadCatalogue } from './data/products';
import type { ProductsControllerDeps } from './http/controllers/products.controller';
import { ReservationService } from './reservations/reservationService';
import { MongoInventoryRepository } from './repositories/inventoryRepo';
import { MongoReservationsRepository } from './repositories/reservationsRepo';

let infra: Infra | null = null;
let deps: ProductsControllerDeps | null = null;
const lifecycle = new AbortController();

async function start(): Promise<void> {
  if (!infra) {
    const next = await connectInfra(config, config.SERVICE_NAME, 'inventory');
    let ready: ProductsControllerDeps;
    try {
      const inventory = new MongoInventoryRepository(next.mongo.db, config.DB_BREAKER);
      const reservations = new MongoReservationsRepository(next.mongo.db);
      await inventory.ensureIndexes();
      await reservations.ensureIndexes();
      if (config.SEED_PRODUCTS) {
        const inserted = await inventory.seed(loadCatalogue());
        logger.info({ inserted }, '[Inventory] catalogue seeded');
      }
      registerInventoryConsumers(next.runtime, new ReservationService(inventory, reservations), config.SERVICE_NAME);
      ready = { inventory };
    } catch (err) {
      await closeInfra(next);
      throw err;
    }
    infra = next;
    deps = ready;
  }
  await startConsumers(infra, config);
}

const app = createInventoryApp(config.SERVICE_NAME, () => deps, infraReadiness(() => infra, config.READY_TIMEOUT_MS));

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, service: config.SERVICE_NAME }, 'Service started');
  startWithRetry('Inventory', start, lifecycle.signal, (err) => err instanceof TopologyError).catch((err: unknown) => {
    logger.fatal({ err }, '[Inventory] fatal startup error');
    process.exit(1);
  });
});

installShutdown(server, async () => {
  lifecycle.abort();
  await closeInfra(infra);
});
