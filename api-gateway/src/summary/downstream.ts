import { z } from 'zod';

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({ success: z.literal(true), data, message: z.string().optional() });

export const OrderViewSchema = z.object({
  orderId: z.string(),
  userId: z.string(),
  status: z.string(),
  customerName: z.string(),
  customerEmail: z.string().optional(),
  phoneNumber: z.string().optional(),
  items: z.array(z.object({ productId: z.string(), quantity: z.number(), unitPrice: z.number() })),
  total: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type OrderView = z.infer<typeof OrderViewSchema>;

export const ProductViewSchema = z.object({
  productId: z.string(),
  name: z.string(),
  stock: z.number(),
});

export const UserProfileSchema = z.object({
  userId: z.string(),
  fullName: z.string(),
  email: z.string().optional(),
  phoneNumber: z.string().optional(),
});

export const PaymentViewSchema = z.object({
  paymentId: z.string(),
  status: z.string(),
  method: z.string(),
  paidAt: z.string().nullable().optional(),
  reference: z.string().nullable().optional(),
});

export const OrderEnvelope = envelope(OrderViewSchema);
export const ProductsEnvelope = envelope(z.array(ProductViewSchema));
export const UserEnvelope = envelope(UserProfileSchema);
export const PaymentEnvelope = envelope(PaymentViewSchema);
