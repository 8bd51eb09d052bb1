import { Collection, Db, Filter } from 'mongodb';
import { BreakerSettings, EventType, isDuplicateKeyError, SagaEvent, TxContext, withBreaker } from 'saga-messaging';

export interface EventLogFilter {
  type?: EventType;
  orderId?: string;
  /** Inclusive ISO-8601 bounds on occurredAtUtc. */
  from?: string;
  to?: string;
}

/** Append-only log of the events this service produced or consumed, keyed by eventId. */
export interface EventLog {
  append(event: SagaEvent, tx?: TxContext): Promise<void>;
  findByEventId(eventId: string): Promise<SagaEvent | null>;
  find(filter: EventLogFilter): AsyncIterable<SagaEvent>;
}

export class MongoEventsRepo implements EventLog {
  private readonly col: Collection<SagaEvent>;
  private readonly insert: (event: SagaEvent, tx: TxContext) => Promise<void>;

  constructor(db: Db, breaker: BreakerSettings) {
    this.col = db.collection<SagaEvent>('events');
    this.insert = withBreaker(
      'db.events.append',
      async (event: SagaEvent, tx: TxContext) => {
        try {
          await this.col.insertOne({ ...event }, { session: tx.session });
        } catch (err) {
          // Duplicate eventId → idempotent no-op
          if (isDuplicateKeyError(err)) return;
          throw err;
        }
      },
      breaker
    );
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ eventId: 1 }, { unique: true });
    await this.col.createIndex({ 'payload.orderId': 1, occurredAtUtc: 1 });
  }

  append(event: SagaEvent, tx: TxContext = {}): Promise<void> {
    return this.insert(event, tx);
  }

  async findByEventId(eventId: string): Promise<SagaEvent | null> {
    return this.col.findOne({ eventId }, { projection: { _id: 0 } });
  }

  async *find(filter: EventLogFilter): AsyncIterable<SagaEvent> {
    const query: Filter<SagaEvent> = {};
    if (filter.type) query.type = filter.type;
    if (filter.orderId) query['payload.orderId'] = filter.orderId;
    if (filter.from || filter.to) {
      // occurredAtUtc is an ISO-8601 string; lexical order is time order.
      query.occurredAtUtc = {
        ...(filter.from ? { $gte: filter.from } : {}),
        ...(filter.to ? { $lte: filter.to } : {}),
      };
    }
    const cursor = this.col.find(query, { projection: { _id: 0 } }).sort({ occurredAtUtc: 1, eventId: 1 });
    for await (const doc of cursor) yield doc;
  }
}

export class MemoryEventsRepo implements EventLog {
  private readonly events = new Map<string, SagaEvent>();

  async append(event: SagaEvent): Promise<void> {
    if (!this.events.has(event.eventId)) this.events.set(event.eventId, structuredClone(event));
  }

  async findByEventId(eventId: string): Promise<SagaEvent | null> {
    return this.events.get(eventId) ?? null;
  }

  async *find(filter: EventLogFilter): AsyncIterable<SagaEvent> {
    const matches = [...this.events.values()]
      .filter((e) => !filter.type || e.type === filter.type)
      .filter((e) => !filter.orderId || e.payload.orderId === filter.orderId)
      .filter((e) => !filter.from || e.occurredAtUtc >= filter.from)
      .filter((e) => !filter.to || e.occurredAtUtc <= filter.to)
      .sort((a, b) => a.occurredAtUtc.localeCompare(b.occurredAtUtc) || a.eventId.localeCompare(b.eventId));
    for (const e of matches) yield e;
  }
}
