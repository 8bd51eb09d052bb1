import { OrderCancelledV1, OrderCancelledV1Schema, QueueHandler, QUEUES } from 'saga-messaging';
import type { EventLog } from '../repositories/eventsRepo';
import type { OrdersRepository } from '../repositories/ordersRepo';
import { applyTerminalStatus } from './applyTerminalStatus';

export const ORCHESTRATOR_ACTOR = 'orchestrator';

/** Compensation: a cancelled saga moves the order to CANCELLED with the failure reason. */
export function orderCancelledHandler(orders: OrdersRepository, events: EventLog): QueueHandler<OrderCancelledV1> {
  return {
    queue: QUEUES.ORDER_COMPENSATION,
    schema: OrderCancelledV1Schema,
    async handle(event, { tx, log }) {
      const { orderId, reason, failedItems } = event.payload;
      log.info({ orderId, reason, failedItems: failedItems.length }, '[Order] compensating cancelled order');
      await applyTerminalStatus(orders, { orderId, target: 'CANCELLED', actor: ORCHESTRATOR_ACTOR, reason }, tx, log);
      await events.append(event, tx);
    },
  };
}
