import {
  nextEvent,
  OrderPlacedV1,
  OrderSnapshot,
  SagaEvent,
  StockReservationFailedV1,
  StockReservationSucceededV1,
} from 'saga-messaging';

export type SagaStep = 'RESERVATION_PENDING' | 'CONFIRMED' | 'CANCELLED';

export interface SagaRecord {
  sagaId: string;
  step: SagaStep;
  /** Id of the event that caused the current step. */
  lastEventId: string;
  /** The event emitted for the current step, re-sent on a duplicate delivery. */
  lastEmitted: SagaEvent;
  version: number;
  snapshot: OrderSnapshot;
  createdAt: string;
  updatedAt: string;
}

export type SagaInput = OrderPlacedV1 | StockReservationSucceededV1 | StockReservationFailedV1;

export type TransitionDecision =
  | { kind: 'advance'; to: SagaStep; emit: SagaEvent }
  | { kind: 'replay'; emit: SagaEvent }
  | { kind: 'ignore'; reason: string };

export interface DecideOptions {
  producer: string;
  defaultCancelReason: string;
}

/**
 * The saga's transition table. Pure apart from event id generation: reads
 * the current record (null before OrderPlaced) and the incoming event, and
 * says what to do.
 */
export function decide(record: SagaRecord | null, event: SagaInput, options: DecideOptions): TransitionDecision {
  if (record && record.lastEventId === event.eventId) {
    return { kind: 'replay', emit: record.lastEmitted };
  }

  switch (event.type) {
    case 'OrderPlaced': {
      if (record) return { kind: 'ignore', reason: `saga already started (step ${record.step})` };
      const { orderId, userId, items } = event.payload;
      return {
        kind: 'advance',
        to: 'RESERVATION_PENDING',
        emit: nextEvent(event, 'StockReservationRequested', { orderId, userId, items }, options.producer),
      };
    }

    case 'StockReservationSucceeded': {
      if (!record) return { kind: 'ignore', reason: 'no saga for this order yet' };
      if (record.step !== 'RESERVATION_PENDING') return { kind: 'ignore', reason: `saga is ${record.step}` };
      return {
        kind: 'advance',
        to: 'CONFIRMED',
        emit: nextEvent(event, 'OrderConfirmed', record.snapshot, options.producer),
      };
    }

    case 'StockReservationFailed': {
      if (!record) return { kind: 'ignore', reason: 'no saga for this order yet' };
      if (record.step !== 'RESERVATION_PENDING') return { kind: 'ignore', reason: `saga is ${record.step}` };
      return {
        kind: 'advance',
        to: 'CANCELLED',
        emit: nextEvent(
          event,
          'OrderCancelled',
          {
            ...record.snapshot,
            reason: event.payload.reason || options.defaultCancelReason,
            failedItems: event.payload.failedItems,
          },
          options.producer
        ),
      };
    }
  }
}
