import { NotFoundError, OrderLine, OrderSnapshot } from 'saga-messaging';

export type OrderStatus = 'PLACED' | 'RESERVATION_PENDING' | 'CONFIRMED' | 'CANCELLED';

// Terminal statuses share the top rank; neither can move to the other.
export const STATUS_RANK: Record<OrderStatus, number> = {
  PLACED: 0,
  RESERVATION_PENDING: 1,
  CONFIRMED: 2,
  CANCELLED: 2,
};

export const isTerminal = (status: OrderStatus): boolean => STATUS_RANK[status] === 2;

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  !isTerminal(from) && STATUS_RANK[to] > STATUS_RANK[from];

export interface StatusChange {
  status: OrderStatus;
  actor: string;
  reason?: string;
  at: string;
}

export interface Order {
  orderId: string;
  userId: string;
  customerName: string;
  customerEmail?: string;
  phoneNumber?: string;
  items: OrderLine[];
  total: number;
  status: OrderStatus;
  statusHistory: StatusChange[];
  createdAt: string;
  updatedAt: string;
}

export const orderTotal = (items: OrderLine[]): number =>
  Math.round(items.reduce((sum, it) => sum + it.quantity * it.unitPrice, 0) * 100) / 100;

export function toSnapshot(order: Order): OrderSnapshot {
  return {
    orderId: order.orderId,
    userId: order.userId,
    customerName: order.customerName,
    ...(order.customerEmail ? { customerEmail: order.customerEmail } : {}),
    ...(order.phoneNumber ? { phoneNumber: order.phoneNumber } : {}),
    items: order.items,
    total: order.total,
  };
}

export class OrderNotFoundError extends NotFoundError {
  constructor(readonly orderId: string) {
    super(`Order ${orderId} not found`);
  }
}
