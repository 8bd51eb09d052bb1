import { closeInfra, connectInfra, Infra, infraReadiness, installShutdown, logger, startConsumers, startWithRetry, TopologyError } from 'saga-messaging';
import { createOrchestratorApp, registerOrchestrator } from './app';
import { config } from './config';
import { MongoSagaStateRepository } from './saga/sagaStateRepo';

let infra: Infra | null = null;
const lifecycle = new AbortController();

async function start(): Promise<void> {
  if (!infra) {
    const next = await connectInfra(config, config.SERVICE_NAME, 'orchestrator');
    try {
      const sagas = new MongoSagaStateRepository(next.mongo.db, config.DB_BREAKER);
      await sagas.ensureIndexes();
      registerOrchestrator(next.runtime, sagas, {
        producer: config.SERVICE_NAME,
        defaultCancelReason: config.DEFAULT_CANCEL_REASON,
      });
    } catch (err) {
      await closeInfra(next);
      throw err;
    }
    infra = next;
  }
  await startConsumers(infra, config);
}

const app = createOrchestratorApp(config.SERVICE_NAME, infraReadiness(() => infra, config.READY_TIMEOUT_MS));

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, service: config.SERVICE_NAME }, 'Service started');
  startWithRetry('Orchestrator', start, lifecycle.signal, (err) => err instanceof TopologyError).catch((err: unknown) => {
    logger.fatal({ err }, '[Orchestrator] fatal startup error');
    process.exit(1);
  });
});

installShutdown(server, async () => {
  lifecycle.abort();
  await closeInfra(infra);
});
