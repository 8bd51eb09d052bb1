import { Application, Router } from 'express';
import { asyncHandler } from 'saga-messaging';
import type { OrderSummaryAggregator } from '../summary/orderSummaryAggregator';
import { createOrderSummaryController } from './controllers/orderSummary.controller';

export function registerGatewayRoutes(app: Application, aggregator: OrderSummaryAggregator) {
  const router = Router();
  const ctrl = createOrderSummaryController(aggregator);

  router.get('/order-summary/:orderId', asyncHandler(ctrl.getOrderSummary));

  app.use('/', router);
}

export default registerGatewayRoutes;
