import { Collection, Db } from 'mongodb';
import { BreakerSettings, isDuplicateKeyError, SagaEvent, TxContext, withBreaker } from 'saga-messaging';
import type { SagaRecord, SagaStep } from './transitions';

export interface SagaAdvance {
  step: SagaStep;
  lastEventId: string;
  lastEmitted: SagaEvent;
  updatedAt: string;
}

export interface SagaStateRepository {
  get(sagaId: string, tx?: TxContext): Promise<SagaRecord | null>;
  /** Returns false when a record for the saga already exists. */
  insert(record: SagaRecord, tx?: TxContext): Promise<boolean>;
  /** Applies `next` only if the record is still at `expectedStep` and `expectedVersion`. */
  compareAndSwap(
    sagaId: string,
    expectedStep: SagaStep,
    expectedVersion: number,
    next: SagaAdvance,
    tx?: TxContext
  ): Promise<boolean>;
}

export class MongoSagaStateRepository implements SagaStateRepository {
  private readonly col: Collection<SagaRecord>;
  private readonly guardedInsert: (record: SagaRecord, tx: TxContext) => Promise<boolean>;
  private readonly guardedCas: (
    sagaId: string,
    expectedStep: SagaStep,
    expectedVersion: number,
    next: SagaAdvance,
    tx: TxContext
  ) => Promise<boolean>;

  constructor(db: Db, breaker: BreakerSettings) {
    this.col = db.collection<SagaRecord>('saga_state');
    this.guardedInsert = withBreaker(
      'db.saga.insert',
      async (record: SagaRecord, tx: TxContext) => {
        try {
          await this.col.insertOne({ ...record }, { session: tx.session });
          return true;
        } catch (err) {
          if (isDuplicateKeyError(err)) return false;
          throw err;
        }
      },
      breaker
    );
    this.guardedCas = withBreaker(
      'db.saga.cas',
      async (sagaId: string, expectedStep: SagaStep, expectedVersion: number, next: SagaAdvance, tx: TxContext) => {
        const res = await this.col.updateOne(
          { sagaId, step: expectedStep, version: expectedVersion },
          { $set: { ...next, version: expectedVersion + 1 } },
          { session: tx.session }
        );
        return res.modifiedCount === 1;
      },
      breaker
    );
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ sagaId: 1 }, { unique: true });
  }

  async get(sagaId: string, tx: TxContext = {}): Promise<SagaRecord | null> {
    const doc = await this.col.findOne({ sagaId }, { session: tx.session });
    if (!doc) return null;
    const { _id, ...record } = doc;
    return record;
  }

  insert(record: SagaRecord, tx: TxContext = {}): Promise<boolean> {
    return this.guardedInsert(record, tx);
  }

  compareAndSwap(
    sagaId: string,
    expectedStep: SagaStep,
    expectedVersion: number,
    next: SagaAdvance,
    tx: TxContext = {}
  ): Promise<boolean> {
    return this.guardedCas(sagaId, expectedStep, expectedVersion, next, tx);
  }
}

export class MemorySagaStateRepository implements SagaStateRepository {
  private readonly records = new Map<string, SagaRecord>();

  async get(sagaId: string): Promise<SagaRecord | null> {
    const record = this.records.get(sagaId);
    return record ? structuredClone(record) : null;
  }

  async insert(record: SagaRecord): Promise<boolean> {
    if (this.records.has(record.sagaId)) return false;
    this.records.set(record.sagaId, structuredClone(record));
    return true;
  }

  async compareAndSwap(sagaId: string, expectedStep: SagaStep, expectedVersion: number, next: SagaAdvance): Promise<boolean> {
    const record = this.records.get(sagaId);
    if (!record || record.step !== expectedStep || record.version !== expectedVersion) return false;
    this.records.set(sagaId, { ...record, ...structuredClone(next), version: expectedVersion + 1 });
    return true;
  }
}
