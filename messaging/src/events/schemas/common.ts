import { z } from 'zod';

export const EventEnvelopeBaseV1 = z.object({
  eventId: z.string().uuid(),
  type: z.string().min(1),
  version: z.literal(1),
  correlationId: z.string().min(1),
  occurredAtUtc: z.string().datetime(),
  producer: z.string().min(1),
});

export type EventEnvelopeBaseV1 = z.infer<typeof EventEnvelopeBaseV1>;

export const OrderLineSchema = z.object({
  productId: z.string().min(1),
  quantity: z.number().int().positive(),
  unitPrice: z.number().nonnegative(),
});
export type OrderLine = z.infer<typeof OrderLineSchema>;

export const FailedLineSchema = z.object({
  productId: z.string().min(1),
  requested: z.number().int().nonnegative(),
  available: z.number().int().nonnegative(),
  reason: z.string().min(1),
});
export type FailedLine = z.infer<typeof FailedLineSchema>;

export const CustomerContactSchema = z.object({
  customerName: z.string().min(1),
  customerEmail: z.string().email().optional(),
  phoneNumber: z.string().min(1).optional(),
});
export type CustomerContact = z.infer<typeof CustomerContactSchema>;
