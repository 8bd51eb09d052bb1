import type { Options } from 'amqplib';
import { EXCHANGES, ROUTES, Route } from '../events';
import { TopologyError, errorMessage } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('mq.topology');

export const DEAD_LETTER_EXCHANGE = 'saga.dlx';

/** Every consumer queue and the single route it is bound to. */
export const QUEUES = {
  ORCHESTRATOR_ORDER_PLACED: 'orchestrator.order-placed',
  ORCHESTRATOR_STOCK_RESERVED: 'orchestrator.stock-reserved',
  ORCHESTRATOR_STOCK_FAILED: 'orchestrator.stock-failed',
  INVENTORY_RESERVATION_REQUESTED: 'inventory.reservation-requested',
  ORDER_COMPENSATION: 'order.compensation',
  ORDER_CONFIRMATION: 'order.confirmation',
  NOTIFICATION_ORDER_CONFIRMED: 'notification.order-confirmed',
  NOTIFICATION_ORDER_CANCELLED: 'notification.order-cancelled',
} as const;
export type QueueName = (typeof QUEUES)[keyof typeof QUEUES];

export const QUEUE_BINDINGS: { [Q in QueueName]: Route } = {
  'orchestrator.order-placed': ROUTES.OrderPlaced,
  'orchestrator.stock-reserved': ROUTES.StockReservationSucceeded,
  'orchestrator.stock-failed': ROUTES.StockReservationFailed,
  'inventory.reservation-requested': ROUTES.StockReservationRequested,
  'order.compensation': ROUTES.OrderCancelled,
  'order.confirmation': ROUTES.OrderConfirmed,
  'notification.order-confirmed': ROUTES.OrderConfirmed,
  'notification.order-cancelled': ROUTES.OrderCancelled,
};

export const retryQueueOf = (queue: string): string => `${queue}.retry`;
export const parkingQueueOf = (queue: string): string => `${queue}.dlq`;

/** The declaration calls topology needs; an amqplib channel satisfies it. */
export interface TopologyChannel {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
}

export interface TopologyOptions {
  /** How long a failed message waits in `<queue>.retry` before it returns. */
  retryDelayMs: number;
}

const isPreconditionFailed = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 406;

async function declare(resource: string, op: () => Promise<unknown>): Promise<void> {
  try {
    await op();
  } catch (err) {
    if (isPreconditionFailed(err)) {
      throw new TopologyError(`Broker refused declaration of ${resource}: ${errorMessage(err)}`, resource);
    }
    throw err;
  }
}

/**
 * Declares exchanges, the dead-letter exchange and, for each queue, the main
 * queue with its retry and parking queues and its binding. Safe to run on
 * every start: identical declarations are no-ops on the broker. A conflicting
 * declaration surfaces as TopologyError and must stop the process.
 */
export async function declareTopology(
  ch: TopologyChannel,
  queues: readonly QueueName[],
  options: TopologyOptions
): Promise<void> {
  for (const exchange of Object.values(EXCHANGES)) {
    await declare(`exchange:${exchange}`, () => ch.assertExchange(exchange, 'topic', { durable: true }));
  }
  await declare(`exchange:${DEAD_LETTER_EXCHANGE}`, () =>
    ch.assertExchange(DEAD_LETTER_EXCHANGE, 'direct', { durable: true })
  );

  for (const queue of queues) {
    const route = QUEUE_BINDINGS[queue];
    const parking = parkingQueueOf(queue);
    const retry = retryQueueOf(queue);

    await declare(`queue:${parking}`, () => ch.assertQueue(parking, { durable: true }));
    await declare(`binding:${parking}`, () => ch.bindQueue(parking, DEAD_LETTER_EXCHANGE, parking));

    // Expired retries go back to the main queue through the default exchange.
    await declare(`queue:${retry}`, () =>
      ch.assertQueue(retry, {
        durable: true,
        arguments: {
          'x-message-ttl': options.retryDelayMs,
          'x-dead-letter-exchange': '',
          'x-dead-letter-routing-key': queue,
        },
      })
    );

    await declare(`queue:${queue}`, () =>
      ch.assertQueue(queue, {
        durable: true,
        arguments: {
          'x-dead-letter-exchange': DEAD_LETTER_EXCHANGE,
          'x-dead-letter-routing-key': parking,
        },
      })
    );
    await declare(`binding:${queue}`, () => ch.bindQueue(queue, route.exchange, route.routingKey));
  }

  log.info({ queues }, '[MQ] topology declared');
}
