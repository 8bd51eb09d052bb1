import { Logger, PersistenceError, TxContext } from 'saga-messaging';
import { canTransition, isTerminal, OrderNotFoundError, OrderStatus } from '../domain/order';
import type { OrdersRepository } from '../repositories/ordersRepo';

export type TerminalOutcome = 'applied' | 'already_applied' | 'conflict';

export interface TerminalTransition {
  orderId: string;
  target: Extract<OrderStatus, 'CONFIRMED' | 'CANCELLED'>;
  actor: string;
  reason?: string;
}

/**
 * Moves an order into a terminal status. Re-applying the same status is a
 * no-op and the other terminal status is never overwritten. Throws when the
 * order is unknown or the write lost a race to a non-terminal change, so the
 * delivery is retried.
 */
export async function applyTerminalStatus(
  orders: OrdersRepository,
  transition: TerminalTransition,
  tx: TxContext,
  log: Logger
): Promise<TerminalOutcome> {
  const { orderId, target } = transition;
  const order = await orders.getById(orderId, tx);
  if (!order) throw new OrderNotFoundError(orderId);

  if (order.status === target) {
    log.info({ orderId, status: target }, '[Order] status already applied');
    return 'already_applied';
  }
  if (!canTransition(order.status, target)) {
    log.warn({ orderId, current: order.status, requested: target }, '[Order] terminal status is sticky, ignoring');
    return 'conflict';
  }

  const applied = await orders.compareAndSetStatus(
    orderId,
    order.status,
    {
      status: target,
      actor: transition.actor,
      ...(transition.reason ? { reason: transition.reason } : {}),
      at: new Date().toISOString(),
    },
    tx
  );
  if (!applied) {
    const latest = await orders.getById(orderId, tx);
    if (latest && isTerminal(latest.status)) {
      log.warn({ orderId, current: latest.status, requested: target }, '[Order] lost race to a terminal status');
      return latest.status === target ? 'already_applied' : 'conflict';
    }
    throw new PersistenceError(`Failed to set order ${orderId} to ${target}`);
  }

  log.info({ orderId, from: order.status, to: target }, '[Order] status updated');
  return 'applied';
}
