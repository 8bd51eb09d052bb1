import { z } from 'zod';
import { EventEnvelopeBaseV1, FailedLineSchema, OrderLineSchema } from './common';

export const StockReservationRequestedV1Schema = EventEnvelopeBaseV1.extend({
  type: z.literal('StockReservationRequested'),
  payload: z.object({
    orderId: z.string().min(1),
    userId: z.string().min(1),
    items: z.array(OrderLineSchema),
  }),
});
export type StockReservationRequestedV1 = z.infer<typeof StockReservationRequestedV1Schema>;

export const StockReservationSucceededV1Schema = EventEnvelopeBaseV1.extend({
  type: z.literal('StockReservationSucceeded'),
  payload: z.object({
    orderId: z.string().min(1),
    userId: z.string().min(1),
    items: z.array(OrderLineSchema),
  }),
});
export type StockReservationSucceededV1 = z.infer<typeof StockReservationSucceededV1Schema>;

export const StockReservationFailedV1Schema = EventEnvelopeBaseV1.extend({
  type: z.literal('StockReservationFailed'),
  payload: z.object({
    orderId: z.string().min(1),
    userId: z.string().min(1),
    reason: z.string().min(1),
    failedItems: z.array(FailedLineSchema),
  }),
});
export type StockReservationFailedV1 = z.infer<typeof StockReservationFailedV1Schema>;
