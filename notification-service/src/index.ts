import { closeInfra, connectInfra, Infra, infraReadiness, installShutdown, logger, startConsumers, startWithRetry, TopologyError } from 'saga-messaging';
import { createNotificationApp, registerNotificationConsumers } from './app';
import { createLogSenders } from './channels/senders';
import { config } from './config';
import { runDispatcher } from './dispatcher/dispatcher';
import type { NotificationsControllerDeps } from './http/controllers/notifications.controller';
import { NotificationService } from './notifications/notificationService';
import { MongoNotificationsRepository } from './repositories/notificationsRepo';
import { MongoPreferencesRepository } from './repositories/preferencesRepo';

let infra: Infra | null = null;
let deps: NotificationsControllerDeps | null = null;
let dispatching = false;
const lifecycle = new AbortController();

async function start(): Promise<void> {
  if (!infra) {
    const next = await connectInfra(config, config.SERVICE_NAME, 'notifications');
    let ready: NotificationsControllerDeps;
    try {
      const notifications = new MongoNotificationsRepository(next.mongo.db, config.DB_BREAKER);
      const preferences = new MongoPreferencesRepository(next.mongo.db);
      await notifications.ensureIndexes();
      await preferences.ensureIndexes();
      const notificationService = new NotificationService({ notifications, preferences, senders: createLogSenders() });
      registerNotificationConsumers(next.runtime, notificationService, config.SERVICE_NAME);
      ready = { notificationService };
    } catch (err) {
      await closeInfra(next);
      throw err;
    }
    infra = next;
    deps = ready;
  }
  await startConsumers(infra, config);

  if (config.DISPATCHER_ENABLED && deps && !dispatching) {
    dispatching = true;
    runDispatcher(
      deps.notificationService,
      { intervalMs: config.DISPATCH_INTERVAL_MS, batchSize: config.DISPATCH_BATCH_SIZE },
      lifecycle.signal
    ).catch((err: unknown) => logger.error({ err }, '[Dispatcher] loop crashed'));
  }
}

const app = createNotificationApp(config.SERVICE_NAME, () => deps, infraReadiness(() => infra, config.READY_TIMEOUT_MS));

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, service: config.SERVICE_NAME }, 'Service started');
  startWithRetry('Notification', start, lifecycle.signal, (err) => err instanceof TopologyError).catch((err: unknown) => {
    logger.fatal({ err }, '[Notification] fatal startup error');
    process.exit(1);
  });
});

installShutdown(server, async () => {
  lifecycle.abort();
  await closeInfra(infra);
});
