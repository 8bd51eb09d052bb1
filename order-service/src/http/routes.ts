import { Application, Router } from 'express';
import { asyncHandler } from 'saga-messaging';
import { createOrdersController, OrdersControllerDeps } from './controllers/orders.controller';
import type { IdempotencyCache } from './idempotency';

export type OrdersDepsProvider = () => OrdersControllerDeps | null;

export function registerOrderRoutes(app: Application, getDeps: OrdersDepsProvider, idempotency: IdempotencyCache) {
  const router = Router();
  const ctrl = createOrdersController(getDeps, idempotency);

  router.post('/orders', asyncHandler(ctrl.createOrder));
  router.get('/orders/:id', asyncHandler(ctrl.getOrder));

  app.use('/', router);
}

export default registerOrderRoutes;
