import { OrderConfirmedV1, OrderConfirmedV1Schema, QueueHandler, QUEUES } from 'saga-messaging';
import type { EventLog } from '../repositories/eventsRepo';
import type { OrdersRepository } from '../repositories/ordersRepo';
import { applyTerminalStatus } from './applyTerminalStatus';
import { ORCHESTRATOR_ACTOR } from './orderCancelledHandler';

export function orderConfirmedHandler(orders: OrdersRepository, events: EventLog): QueueHandler<OrderConfirmedV1> {
  return {
    queue: QUEUES.ORDER_CONFIRMATION,
    schema: OrderConfirmedV1Schema,
    async handle(event, { tx, log }) {
      await applyTerminalStatus(orders, { orderId: event.payload.orderId, target: 'CONFIRMED', actor: ORCHESTRATOR_ACTOR }, tx, log);
      await events.append(event, tx);
    },
  };
}
