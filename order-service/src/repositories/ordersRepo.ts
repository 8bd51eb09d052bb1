import { Collection, Db } from 'mongodb';
import { BreakerSettings, isDuplicateKeyError, TxContext, withBreaker } from 'saga-messaging';
import type { Order, OrderStatus, StatusChange } from '../domain/order';

export interface OrdersRepository {
  /** Inserts the order; an existing order with the same id is returned instead. */
  create(order: Order, tx?: TxContext): Promise<Order>;
  getById(orderId: string, tx?: TxContext): Promise<Order | null>;
  /** Moves the order to `change.status` only if it is still in `expected`. */
  compareAndSetStatus(orderId: string, expected: OrderStatus, change: StatusChange, tx?: TxContext): Promise<boolean>;
}

export class MongoOrdersRepository implements OrdersRepository {
  private readonly col: Collection<Order>;
  private readonly insert: (order: Order, tx: TxContext) => Promise<Order>;
  private readonly casStatus: (orderId: string, expected: OrderStatus, change: StatusChange, tx: TxContext) => Promise<boolean>;

  constructor(db: Db, breaker: BreakerSettings) {
    this.col = db.collection<Order>('orders');
    this.insert = withBreaker('db.orders.create', (order: Order, tx: TxContext) => this.insertOrder(order, tx), breaker);
    this.casStatus = withBreaker(
      'db.orders.updateStatus',
      async (orderId: string, expected: OrderStatus, change: StatusChange, tx: TxContext) => {
        const res = await this.col.updateOne(
          { orderId, status: expected },
          { $set: { status: change.status, updatedAt: change.at }, $push: { statusHistory: change } },
          { session: tx.session }
        );
        return res.modifiedCount === 1;
      },
      breaker
    );
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ orderId: 1 }, { unique: true });
    await this.col.createIndex({ userId: 1, createdAt: -1 });
  }

  create(order: Order, tx: TxContext = {}): Promise<Order> {
    return this.insert(order, tx);
  }

  async getById(orderId: string, tx: TxContext = {}): Promise<Order | null> {
    const doc = await this.col.findOne({ orderId }, { session: tx.session });
    if (!doc) return null;
    const { _id, ...order } = doc;
    return order;
  }

  compareAndSetStatus(orderId: string, expected: OrderStatus, change: StatusChange, tx: TxContext = {}): Promise<boolean> {
    return this.casStatus(orderId, expected, change, tx);
  }

  private async insertOrder(order: Order, tx: TxContext): Promise<Order> {
    try {
      // insertOne adds _id to the document it is given
      await this.col.insertOne({ ...order }, { session: tx.session });
      return order;
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        const existing = await this.getById(order.orderId, tx);
        if (existing) return existing;
      }
      throw err;
    }
  }
}

export class MemoryOrdersRepository implements OrdersRepository {
  private readonly orders = new Map<string, Order>();

  async create(order: Order): Promise<Order> {
    const existing = this.orders.get(order.orderId);
    if (existing) return structuredClone(existing);
    this.orders.set(order.orderId, structuredClone(order));
    return structuredClone(order);
  }

  async getById(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  async compareAndSetStatus(orderId: string, expected: OrderStatus, change: StatusChange): Promise<boolean> {
    const order = this.orders.get(orderId);
    if (!order || order.status !== expected) return false;
    order.status = change.status;
    order.updatedAt = change.at;
    order.statusHistory.push({ ...change });
    return true;
  }
}
