import type { Express } from 'express';
import { ConsumerRuntime, createServer, errorHandler, notFoundHandler } from 'saga-messaging';
import registerProductRoutes, { ProductsDepsProvider } from './http/routes';
import { reservationRequestedHandler } from './messaging/reservationRequestedHandler';
import type { ReservationService } from './reservations/reservationService';

export function createInventoryApp(
  serviceName: string,
  getDeps: ProductsDepsProvider,
  readiness?: () => Promise<boolean>
): Express {
  const app = createServer(serviceName, async () => true, readiness);
  registerProductRoutes(app, getDeps);
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

export function registerInventoryConsumers(runtime: ConsumerRuntime, reservations: ReservationService, producer: string): void {
  runtime.register(reservationRequestedHandler(reservations, producer));
}
