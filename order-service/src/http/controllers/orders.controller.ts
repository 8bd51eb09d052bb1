import type { Request, Response } from 'express';
import { logger, NotReadyError, ok, ValidationError, zodIssues } from 'saga-messaging';
import { CreateOrderSchema, OrderService } from '../../orders/orderService';
import type { IdempotencyCache } from '../idempotency';

export interface OrdersControllerDeps {
  orderService: OrderService;
}

export function createOrdersController(getDeps: () => OrdersControllerDeps | null, idempotency: IdempotencyCache) {
  const requireDeps = (): OrdersControllerDeps => {
    const deps = getDeps();
    if (!deps) throw new NotReadyError();
    return deps;
  };

  const createOrder = async (req: Request, res: Response): Promise<void> => {
    const { orderService } = requireDeps();

    const bodyParse = CreateOrderSchema.safeParse(req.body);
    if (!bodyParse.success) {
      logger.warn({ details: bodyParse.error.flatten() }, '[Order] invalid create order body');
      throw new ValidationError('Invalid order request', zodIssues(bodyParse.error));
    }

    const idemKey = (req.header('Idempotency-Key') || '').trim();
    if (idemKey) {
      const existingOrderId = idempotency.get(idemKey);
      if (existingOrderId) {
        const existing = await orderService.getOrder(existingOrderId);
        res.status(200).json({ orderId: existingOrderId, status: existing.status, idempotent: true });
        return;
      }
    }

    const order = await orderService.placeOrder(bodyParse.data);
    if (idemKey) idempotency.set(idemKey, order.orderId);
    res.status(201).json({ orderId: order.orderId, status: order.status });
  };

  const getOrder = async (req: Request, res: Response): Promise<void> => {
    const { orderService } = requireDeps();
    const orderId = String(req.params.id || '').trim();
    const order = await orderService.getOrder(orderId);
    res.status(200).json(ok(order));
  };

  return { createOrder, getOrder };
}
