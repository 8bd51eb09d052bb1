import { nextEvent, QueueHandler, QUEUES, StockReservationRequestedV1, StockReservationRequestedV1Schema } from 'saga-messaging';
import type { ReservationService } from '../reservations/reservationService';

/** Answers every reservation request with exactly one Succeeded or Failed event. */
export function reservationRequestedHandler(
  reservations: ReservationService,
  producer: string
): QueueHandler<StockReservationRequestedV1> {
  return {
    queue: QUEUES.INVENTORY_RESERVATION_REQUESTED,
    schema: StockReservationRequestedV1Schema,
    async handle(event, { tx, emit }) {
      const { orderId, userId, items } = event.payload;
      const { outcome } = await reservations.reserve({ orderId, requestEventId: event.eventId, items }, tx);
      if (outcome.success) {
        emit(nextEvent(event, 'StockReservationSucceeded', { orderId, userId, items: outcome.reservedItems }, producer));
      } else {
        emit(
          nextEvent(
            event,
            'StockReservationFailed',
            { orderId, userId, reason: outcome.reason, failedItems: outcome.failedItems },
            producer
          )
        );
      }
    },
  };
}
