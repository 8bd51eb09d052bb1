import { Collection, Db } from 'mongodb';
import { isDuplicateKeyError, TxContext } from 'saga-messaging';
import type { ReservationOutcome } from '../domain/product';

/**
 * One record per order. A PENDING record is the claim of the delivery that
 * is reserving stock; COMPLETED carries the outcome every later delivery replays.
 */
export interface ReservationRecord {
  orderId: string;
  /** Id of the request event whose delivery claimed the order. */
  requestEventId: string;
  status: 'PENDING' | 'COMPLETED';
  outcome: ReservationOutcome | null;
  createdAt: string;
}

export interface ReservationsRepository {
  get(orderId: string, tx?: TxContext): Promise<ReservationRecord | null>;
  /** Inserts a PENDING record; false when the order already has one. */
  claim(orderId: string, requestEventId: string, tx?: TxContext): Promise<boolean>;
  /** Stores the outcome on a PENDING record; false when there is no claim to complete. */
  complete(orderId: string, outcome: ReservationOutcome, tx?: TxContext): Promise<boolean>;
  /** Drops a PENDING record so the next delivery can claim again. */
  release(orderId: string, tx?: TxContext): Promise<void>;
}

export class MongoReservationsRepository implements ReservationsRepository {
  private readonly col: Collection<ReservationRecord>;

  constructor(db: Db) {
    this.col = db.collection<ReservationRecord>('reservations');
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ orderId: 1 }, { unique: true });
  }

  async get(orderId: string, tx: TxContext = {}): Promise<ReservationRecord | null> {
    const doc = await this.col.findOne({ orderId }, { session: tx.session });
    if (!doc) return null;
    const { _id, ...record } = doc;
    return record;
  }

  async claim(orderId: string, requestEventId: string, tx: TxContext = {}): Promise<boolean> {
    try {
      await this.col.insertOne(
        { orderId, requestEventId, status: 'PENDING', outcome: null, createdAt: new Date().toISOString() },
        { session: tx.session }
      );
      return true;
    } catch (err) {
      if (isDuplicateKeyError(err)) return false;
      throw err;
    }
  }

  async complete(orderId: string, outcome: ReservationOutcome, tx: TxContext = {}): Promise<boolean> {
    const res = await this.col.updateOne(
      { orderId, status: 'PENDING' },
      { $set: { status: 'COMPLETED', outcome } },
      { session: tx.session }
    );
    return res.modifiedCount === 1;
  }

  async release(orderId: string, tx: TxContext = {}): Promise<void> {
    await this.col.deleteOne({ orderId, status: 'PENDING' }, { session: tx.session });
  }
}

export class MemoryReservationsRepository implements ReservationsRepository {
  private readonly records = new Map<string, ReservationRecord>();

  async get(orderId: string): Promise<ReservationRecord | null> {
    const record = this.records.get(orderId);
    return record ? structuredClone(record) : null;
  }

  async claim(orderId: string, requestEventId: string): Promise<boolean> {
    if (this.records.has(orderId)) return false;
    this.records.set(orderId, { orderId, requestEventId, status: 'PENDING', outcome: null, createdAt: new Date().toISOString() });
    return true;
  }

  async complete(orderId: string, outcome: ReservationOutcome): Promise<boolean> {
    const record = this.records.get(orderId);
    if (!record || record.status !== 'PENDING') return false;
    this.records.set(orderId, { ...record, status: 'COMPLETED', outcome: structuredClone(outcome) });
    return true;
  }

  async release(orderId: string): Promise<void> {
    if (this.records.get(orderId)?.status === 'PENDING') this.records.delete(orderId);
  }
}
