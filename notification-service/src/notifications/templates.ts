import type { OrderCancelledV1, OrderConfirmedV1 } from 'saga-messaging';

export interface RenderedMessage {
  subject: string;
  content: string;
}

export function orderConfirmedMessage({ orderId, customerName, total }: OrderConfirmedV1['payload']): RenderedMessage {
  return {
    subject: `Your order ${orderId} is confirmed`,
    content: `Hi ${customerName}, your order ${orderId} totalling ${total.toFixed(2)} is confirmed and being prepared.`,
  };
}

export function orderCancelledMessage({ orderId, customerName, reason }: OrderCancelledV1['payload']): RenderedMessage {
  return {
    subject: `Your order ${orderId} was cancelled`,
    content: `Hi ${customerName}, we could not complete your order ${orderId}: ${reason}.`,
  };
}
