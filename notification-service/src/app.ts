import type { Express } from 'express';
import { ConsumerRuntime, createServer, errorHandler, notFoundHandler } from 'saga-messaging';
import registerNotificationRoutes, { NotificationsDepsProvider } from './http/routes';
import { orderCancelledNotificationHandler, orderConfirmedNotificationHandler } from './messaging/orderNotificationHandlers';
import type { NotificationService } from './notifications/notificationService';

export function createNotificationApp(
  serviceName: string,
  getDeps: NotificationsDepsProvider,
  readiness?: () => Promise<boolean>
): Express {
  const app = createServer(serviceName, async () => true, readiness);
  registerNotificationRoutes(app, getDeps);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

export function registerNotificationConsumers(runtime: ConsumerRuntime, service: NotificationService, producer: string): void {
  runtime
    .register(orderConfirmedNotificationHandler(service, producer))
    .register(orderCancelledNotificationHandler(service, producer));
}
