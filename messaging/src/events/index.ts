import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  OrderCancelledV1,
  OrderCancelledV1Schema,
  OrderConfirmedV1,
  OrderConfirmedV1Schema,
  OrderPlacedV1,
  OrderPlacedV1Schema,
} from './schemas/orders';
import {
  StockReservationFailedV1,
  StockReservationFailedV1Schema,
  StockReservationRequestedV1,
  StockReservationRequestedV1Schema,
  StockReservationSucceededV1,
  StockReservationSucceededV1Schema,
} from './schemas/stock';

export * from './schemas/common';
export * from './schemas/orders';
export * from './schemas/stock';

export type SagaEvent =
  | OrderPlacedV1
  | OrderConfirmedV1
  | OrderCancelledV1
  | StockReservationRequestedV1
  | StockReservationSucceededV1
  | StockReservationFailedV1;

export type EventType = SagaEvent['type'];
export type EventOf<T extends EventType> = Extract<SagaEvent, { type: T }>;
export type PayloadOf<T extends EventType> = EventOf<T>['payload'];

export interface Envelope<T extends string, P> {
  eventId: string;
  type: T;
  version: 1;
  correlationId: string;
  occurredAtUtc: string;
  producer: string;
  payload: P;
}

// One topic exchange per bounded context.
export const EXCHANGES = {
  ORDERS: 'orders',
  INVENTORY: 'inventory',
} as const;
export type ExchangeName = (typeof EXCHANGES)[keyof typeof EXCHANGES];

export interface Route {
  exchange: ExchangeName;
  routingKey: string;
}

export const ROUTES: { [K in EventType]: Route } = {
  OrderPlaced: { exchange: EXCHANGES.ORDERS, routingKey: 'order.placed' },
  OrderConfirmed: { exchange: EXCHANGES.ORDERS, routingKey: 'order.confirmed' },
  OrderCancelled: { exchange: EXCHANGES.ORDERS, routingKey: 'order.cancelled' },
  StockReservationRequested: { exchange: EXCHANGES.INVENTORY, routingKey: 'stock.reservation.requested' },
  StockReservationSucceeded: { exchange: EXCHANGES.INVENTORY, routingKey: 'stock.reserved' },
  StockReservationFailed: { exchange: EXCHANGES.INVENTORY, routingKey: 'stock.reservation.failed' },
};

export const EVENT_SCHEMAS: { [K in EventType]: z.ZodType<EventOf<K>, z.ZodTypeDef, unknown> } = {
  OrderPlaced: OrderPlacedV1Schema,
  OrderConfirmed: OrderConfirmedV1Schema,
  OrderCancelled: OrderCancelledV1Schema,
  StockReservationRequested: StockReservationRequestedV1Schema,
  StockReservationSucceeded: StockReservationSucceededV1Schema,
  StockReservationFailed: StockReservationFailedV1Schema,
};

export const SagaEventSchema = z.discriminatedUnion('type', [
  OrderPlacedV1Schema,
  OrderConfirmedV1Schema,
  OrderCancelledV1Schema,
  StockReservationRequestedV1Schema,
  StockReservationSucceededV1Schema,
  StockReservationFailedV1Schema,
]);

export const routeFor = (type: EventType): Route => ROUTES[type];

export function createEvent<T extends EventType>(
  type: T,
  correlationId: string,
  payload: PayloadOf<T>,
  producer: string,
  now: Date = new Date()
): Envelope<T, PayloadOf<T>> {
  return {
    eventId: uuidv4(),
    type,
    version: 1,
    correlationId,
    occurredAtUtc: now.toISOString(),
    producer,
    payload,
  };
}

/** Builds the next event of a saga instance; the correlation id is carried over unchanged. */
export function nextEvent<T extends EventType>(
  cause: { correlationId: string },
  type: T,
  payload: PayloadOf<T>,
  producer: string
): Envelope<T, PayloadOf<T>> {
  return createEvent(type, cause.correlationId, payload, producer);
}
