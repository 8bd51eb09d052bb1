import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createEvent, createLogger, CustomerContactSchema, EventPublisher, OrderLineSchema } from 'saga-messaging';
import { Order, OrderNotFoundError, orderTotal, toSnapshot } from '../domain/order';
import type { EventLog } from '../repositories/eventsRepo';
import type { OrdersRepository } from '../repositories/ordersRepo';

const log = createLogger('orders');

export const CreateOrderSchema = CustomerContactSchema.extend({
  userId: z.string().min(1),
  items: z.array(OrderLineSchema).min(1),
});
export type CreateOrderInput = z.infer<typeof CreateOrderSchema>;

export interface OrderServiceDeps {
  orders: OrdersRepository;
  events: EventLog;
  publisher: EventPublisher;
  serviceName: string;
}

export class OrderService {
  constructor(private readonly deps: OrderServiceDeps) {}

  /**
   * Persists a PLACED order, logs and publishes OrderPlaced. The order id is
   * also the saga's correlation id. If the publish fails the order stays
   * PLACED and the logged event can be replayed.
   */
  async placeOrder(input: CreateOrderInput): Promise<Order> {
    const { orders, events, publisher, serviceName } = this.deps;
    const now = new Date().toISOString();
    const orderId = `ord_${uuidv4()}`;
    const order: Order = {
      orderId,
      userId: input.userId,
      customerName: input.customerName,
      ...(input.customerEmail ? { customerEmail: input.customerEmail } : {}),
      ...(input.phoneNumber ? { phoneNumber: input.phoneNumber } : {}),
      items: input.items,
      total: orderTotal(input.items),
      status: 'PLACED',
      statusHistory: [{ status: 'PLACED', actor: input.userId, at: now }],
      createdAt: now,
      updatedAt: now,
    };

    await orders.create(order);
    const event = createEvent('OrderPlaced', orderId, toSnapshot(order), serviceName);
    await events.append(event);
    await publisher.publishEvent(event);
    log.info({ orderId, correlationId: orderId, total: order.total }, '[Order] order placed');
    return order;
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.deps.orders.getById(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    return order;
  }
}
