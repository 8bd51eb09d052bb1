import { ClientSession, Collection, Db } from 'mongodb';
import { BreakerSettings, createLogger, OrderLine, PersistenceError, TxContext, withBreaker } from 'saga-messaging';
import { aggregateLines, Product, ReservationLine, ReservationOutcome, shortfalls } from '../domain/product';

const log = createLogger('inventory.repo');

export const RESERVATION_FAILED_REASON = 'insufficient stock';
export const NO_ITEMS_REASON = 'no items provided';

export interface InventoryRepository {
  getByIds(productIds: readonly string[], tx?: TxContext): Promise<Product[]>;
  setStock(productId: string, stock: number, name?: string): Promise<Product>;
  /** Inserts products that do not exist yet; existing stock is left alone. */
  seed(products: readonly Omit<Product, 'updatedAt'>[]): Promise<number>;
  /**
   * Reserves every line or none. Business failures come back as a value;
   * a thrown error means the store could not tell and the caller should retry.
   */
  reserveAll(items: readonly OrderLine[], tx?: TxContext): Promise<ReservationOutcome>;
  /** Gives back stock taken by a successful `reserveAll`. */
  release(items: readonly OrderLine[], tx?: TxContext): Promise<void>;
}

const emptyRequest = (): ReservationOutcome => ({ success: false, reason: NO_ITEMS_REASON, failedItems: [] });

export class MongoInventoryRepository implements InventoryRepository {
  private readonly col: Collection<Product>;
  private readonly guardedReserve: (items: readonly OrderLine[], tx: TxContext) => Promise<ReservationOutcome>;

  constructor(db: Db, breaker: BreakerSettings) {
    this.col = db.collection<Product>('products');
    // A timeout would reject while the guarded writes keep running
    this.guardedReserve = withBreaker(
      'db.products.reserve',
      (items: readonly OrderLine[], tx: TxContext) => this.reserve(items, tx),
      { ...breaker, timeout: false }
    );
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ productId: 1 }, { unique: true });
  }

  async getByIds(productIds: readonly string[], tx: TxContext = {}): Promise<Product[]> {
    const docs = await this.col.find({ productId: { $in: [...productIds] } }, { session: tx.session }).toArray();
    return docs.map(({ _id, ...product }) => product);
  }

  async setStock(productId: string, stock: number, name?: string): Promise<Product> {
    const updatedAt = new Date().toISOString();
    const doc = await this.col.findOneAndUpdate(
      { productId },
      {
        $set: { stock, updatedAt, ...(name ? { name } : {}) },
        $setOnInsert: name ? {} : { name: productId },
      },
      { upsert: true, returnDocument: 'after' }
    );
    if (!doc) throw new PersistenceError(`Stock update for ${productId} returned no document`);
    const { _id, ...product } = doc;
    return product;
  }

  async seed(products: readonly Omit<Product, 'updatedAt'>[]): Promise<number> {
    if (products.length === 0) return 0;
    const updatedAt = new Date().toISOString();
    const res = await this.col.bulkWrite(
      products.map((p) => ({
        updateOne: {
          filter: { productId: p.productId },
          update: { $setOnInsert: { ...p, updatedAt } },
          upsert: true,
        },
      }))
    );
    return res.upsertedCount;
  }

  reserveAll(items: readonly OrderLine[], tx: TxContext = {}): Promise<ReservationOutcome> {
    return this.guardedReserve(items, tx);
  }

  async release(items: readonly OrderLine[], tx: TxContext = {}): Promise<void> {
    const updatedAt = new Date().toISOString();
    for (const { productId, quantity } of aggregateLines(items)) {
      await this.col.updateOne({ productId }, { $inc: { stock: quantity }, $set: { updatedAt } }, { session: tx.session });
    }
  }

  private async reserve(items: readonly OrderLine[], tx: TxContext): Promise<ReservationOutcome> {
    const lines = aggregateLines(items);
    if (lines.length === 0) return emptyRequest();

    const found = await this.getByIds(
      lines.map((l) => l.productId),
      tx
    );
    const stock = new Map(found.map((p) => [p.productId, p.stock]));
    const failedItems = shortfalls(lines, (id) => stock.get(id));
    if (failedItems.length > 0) {
      return { success: false, reason: RESERVATION_FAILED_REASON, failedItems };
    }

    const applied: ReservationLine[] = [];
    const updatedAt = new Date().toISOString();
    try {
      for (const line of lines) {
        const res = await this.col.updateOne(
          { productId: line.productId, stock: { $gte: line.quantity } },
          { $inc: { stock: -line.quantity }, $set: { updatedAt } },
          { session: tx.session }
        );
        if (res.modifiedCount !== 1) {
          // Stock moved between the read and the guarded write
          throw new PersistenceError(`Stock for ${line.productId} changed during reservation`);
        }
        applied.push(line);
      }
    } catch (err) {
      await this.undo(applied, tx.session);
      throw err;
    }
    return { success: true, reservedItems: [...items] };
  }

  private async undo(applied: readonly ReservationLine[], session: ClientSession | undefined): Promise<void> {
    // Inside a transaction the abort rolls everything back
    if (session?.inTransaction()) return;
    if (applied.length === 0) return;
    try {
      for (const line of applied) {
        await this.col.updateOne({ productId: line.productId }, { $inc: { stock: line.quantity } });
      }
      log.warn({ restored: applied.length }, '[Inventory] partial reservation rolled back');
    } catch (err) {
      log.error({ err, applied }, '[Inventory] could not roll back partial reservation');
    }
  }
}

export class MemoryInventoryRepository implements InventoryRepository {
  private readonly products = new Map<string, Product>();

  async getByIds(productIds: readonly string[]): Promise<Product[]> {
    return productIds.flatMap((id) => {
      const product = this.products.get(id);
      return product ? [{ ...product }] : [];
    });
  }

  async setStock(productId: string, stock: number, name?: string): Promise<Product> {
    const existing = this.products.get(productId);
    const product: Product = {
      productId,
      name: name ?? existing?.name ?? productId,
      stock,
      updatedAt: new Date().toISOString(),
    };
    this.products.set(productId, product);
    return { ...product };
  }

  async seed(products: readonly Omit<Product, 'updatedAt'>[]): Promise<number> {
    let inserted = 0;
    for (const p of products) {
      if (this.products.has(p.productId)) continue;
      this.products.set(p.productId, { ...p, updatedAt: new Date().toISOString() });
      inserted++;
    }
    return inserted;
  }

  async reserveAll(items: readonly OrderLine[]): Promise<ReservationOutcome> {
    // Check and decrement run without an await in between
    const lines = aggregateLines(items);
    if (lines.length === 0) return emptyRequest();

    const failedItems = shortfalls(lines, (id) => this.products.get(id)?.stock);
    if (failedItems.length > 0) {
      return { success: false, reason: RESERVATION_FAILED_REASON, failedItems };
    }
    const updatedAt = new Date().toISOString();
    for (const { productId, quantity } of lines) {
      const product = this.products.get(productId);
      if (product) this.products.set(productId, { ...product, stock: product.stock - quantity, updatedAt });
    }
    return { success: true, reservedItems: [...items] };
  }

  async release(items: readonly OrderLine[]): Promise<void> {
    const updatedAt = new Date().toISOString();
    for (const { productId, quantity } of aggregateLines(items)) {
      const product = this.products.get(productId);
      if (product) this.products.set(productId, { ...product, stock: product.stock + quantity, updatedAt });
    }
  }
}
