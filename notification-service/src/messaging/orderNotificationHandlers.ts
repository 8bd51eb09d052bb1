import {
  HandlerContext,
  OrderCancelledV1,
  OrderCancelledV1Schema,
  OrderConfirmedV1,
  OrderConfirmedV1Schema,
  OrderSnapshot,
  QueueHandler,
  QUEUES,
} from 'saga-messaging';
import type { NotificationType } from '../domain/notification';
import type { NotificationService } from '../notifications/notificationService';
import { orderCancelledMessage, orderConfirmedMessage, RenderedMessage } from '../notifications/templates';

export const dedupeKeyFor = (type: NotificationType, orderId: string): string => `${type}:${orderId}`;

async function notifyCustomer(
  service: NotificationService,
  type: NotificationType,
  order: OrderSnapshot,
  message: RenderedMessage,
  createdBy: string,
  { tx, log }: HandlerContext
): Promise<void> {
  const result = await service.create(
    {
      userId: order.userId,
      channel: 'email',
      type,
      ...message,
      recipients: order.customerEmail ? [{ kind: 'to', email: order.customerEmail }] : [],
      dedupeKey: dedupeKeyFor(type, order.orderId),
      createdBy,
    },
    tx
  );
  if (result.kind === 'rejected') {
    log.warn({ orderId: order.orderId, type, errors: result.errors }, '[Notification] customer notification not created');
  }
}

export function orderConfirmedNotificationHandler(service: NotificationService, producer: string): QueueHandler<OrderConfirmedV1> {
  return {
    queue: QUEUES.NOTIFICATION_ORDER_CONFIRMED,
    schema: OrderConfirmedV1Schema,
    handle: (event, ctx) =>
      notifyCustomer(service, 'order_confirmed', event.payload, orderConfirmedMessage(event.payload), producer, ctx),
  };
}

export function orderCancelledNotificationHandler(service: NotificationService, producer: string): QueueHandler<OrderCancelledV1> {
  return {
    queue: QUEUES.NOTIFICATION_ORDER_CANCELLED,
    schema: OrderCancelledV1Schema,
    handle: (event, ctx) =>
      notifyCustomer(service, 'order_cancelled', event.payload, orderCancelledMessage(event.payload), producer, ctx),
  };
}
