import { z } from 'zod';
import { CustomerContactSchema, EventEnvelopeBaseV1, FailedLineSchema, OrderLineSchema } from './common';

const OrderSnapshotSchema = CustomerContactSchema.extend({
  orderId: z.string().min(1),
  userId: z.string().min(1),
  items: z.array(OrderLineSchema).min(1),
  total: z.number().nonnegative(),
});
export type OrderSnapshot = z.infer<typeof OrderSnapshotSchema>;

export const OrderPlacedV1Schema = EventEnvelopeBaseV1.extend({
  type: z.literal('OrderPlaced'),
  payload: OrderSnapshotSchema,
});
export type OrderPlacedV1 = z.infer<typeof OrderPlacedV1Schema>;

export const OrderConfirmedV1Schema = EventEnvelopeBaseV1.extend({
  type: z.literal('OrderConfirmed'),
  payload: OrderSnapshotSchema,
});
export type OrderConfirmedV1 = z.infer<typeof OrderConfirmedV1Schema>;

export const OrderCancelledV1Schema = EventEnvelopeBaseV1.extend({
  type: z.literal('OrderCancelled'),
  payload: OrderSnapshotSchema.extend({
    reason: z.string().min(1),
    failedItems: z.array(FailedLineSchema),
  }),
});
export type OrderCancelledV1 = z.infer<typeof OrderCancelledV1Schema>;
