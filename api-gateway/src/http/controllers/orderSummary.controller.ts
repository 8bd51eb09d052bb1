import type { Request, Response } from 'express';
import { logger, NotFoundError, ok } from 'saga-messaging';
import type { OrderSummaryAggregator } from '../../summary/orderSummaryAggregator';
import { correlationIdOf } from '../middleware/correlationId';

export function createOrderSummaryController(aggregator: OrderSummaryAggregator) {
  const getOrderSummary = async (req: Request, res: Response): Promise<void> => {
    const orderId = String(req.params.orderId).trim();
    const correlationId = correlationIdOf(res);
    logger.info({ orderId, correlationId }, '[Gateway] aggregating order summary');

    const summary = await aggregator.getSummary(orderId, correlationId);
    if (!summary) throw new NotFoundError(`Order with id ${orderId} not found.`);
    res.status(200).json(ok(summary));
  };

  return { getOrderSummary };
}
