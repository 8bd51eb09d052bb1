import { Collection, Db, Filter } from 'mongodb';
import { BreakerSettings, isDuplicateKeyError, TxContext, withBreaker } from 'saga-messaging';
import { DeliveryAttempt, MAX_RETRIES, Notification, NotificationUpdate } from '../domain/notification';

export interface NotificationsRepository {
  /** Inserts the notification unless its dedupe key is taken; the holder of the key is returned then. */
  create(notification: Notification, tx?: TxContext): Promise<{ notification: Notification; created: boolean }>;
  getById(id: string): Promise<Notification | null>;
  listByUser(userId: string, take: number, skip: number): Promise<Notification[]>;
  /** Active notifications that are due, PENDING or FAILED with retries left, oldest first. */
  dueBatch(now: Date, take: number, skip: number): Promise<Notification[]>;
  countSentSince(userId: string, since: Date, tx?: TxContext): Promise<number>;
  /** Applies the patch and, when given, appends the attempt. False if the id is unknown. */
  update(id: string, patch: NotificationUpdate, attempt?: DeliveryAttempt): Promise<boolean>;
}

const retryable = (n: Notification): boolean =>
  n.status === 'PENDING' || (n.status === 'FAILED' && n.retryCount < MAX_RETRIES);

export class MongoNotificationsRepository implements NotificationsRepository {
  private readonly col: Collection<Notification>;
  private readonly guardedUpdate: (id: string, patch: NotificationUpdate, attempt?: DeliveryAttempt) => Promise<boolean>;

  constructor(db: Db, breaker: BreakerSettings) {
    this.col = db.collection<Notification>('notifications');
    this.guardedUpdate = withBreaker(
      'db.notifications.update',
      async (id: string, patch: NotificationUpdate, attempt?: DeliveryAttempt) => {
        const res = await this.col.updateOne(
          { id },
          {
            $set: { ...patch, updatedAt: new Date().toISOString() },
            ...(attempt ? { $push: { attempts: attempt } } : {}),
          }
        );
        return res.matchedCount === 1;
      },
      breaker
    );
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ id: 1 }, { unique: true });
    await this.col.createIndex({ userId: 1, createdAt: -1 });
    await this.col.createIndex({ status: 1, isActive: 1, createdAt: 1 });
    await this.col.createIndex(
      { dedupeKey: 1 },
      { unique: true, partialFilterExpression: { dedupeKey: { $exists: true } } }
    );
  }

  async create(notification: Notification, tx: TxContext = {}): Promise<{ notification: Notification; created: boolean }> {
    try {
      await this.col.insertOne({ ...notification }, { session: tx.session });
      return { notification, created: true };
    } catch (err) {
      if (isDuplicateKeyError(err) && notification.dedupeKey) {
        const existing = await this.col.findOne({ dedupeKey: notification.dedupeKey }, { session: tx.session });
        if (existing) {
          const { _id, ...held } = existing;
          return { notification: held, created: false };
        }
      }
      throw err;
    }
  }

  async getById(id: string): Promise<Notification | null> {
    const doc = await this.col.findOne({ id });
    if (!doc) return null;
    const { _id, ...notification } = doc;
    return notification;
  }

  async listByUser(userId: string, take: number, skip: number): Promise<Notification[]> {
    const docs = await this.col.find({ userId }).sort({ createdAt: -1 }).skip(skip).limit(take).toArray();
    return docs.map(({ _id, ...n }) => n);
  }

  async dueBatch(now: Date, take: number, skip: number): Promise<Notification[]> {
    const filter: Filter<Notification> = {
      isActive: true,
      $and: [
        { $or: [{ status: 'PENDING' }, { status: 'FAILED', retryCount: { $lt: MAX_RETRIES } }] },
        { $or: [{ scheduledAt: null }, { scheduledAt: { $lte: now.toISOString() } }] },
      ],
    };
    const docs = await this.col.find(filter).sort({ createdAt: 1 }).skip(skip).limit(take).toArray();
    return docs.map(({ _id, ...n }) => n);
  }

  countSentSince(userId: string, since: Date, tx: TxContext = {}): Promise<number> {
    return this.col.countDocuments(
      { userId, status: 'SENT', createdAt: { $gte: since.toISOString() } },
      { session: tx.session }
    );
  }

  update(id: string, patch: NotificationUpdate, attempt?: DeliveryAttempt): Promise<boolean> {
    return this.guardedUpdate(id, patch, attempt);
  }
}

export class MemoryNotificationsRepository implements NotificationsRepository {
  private readonly rows: Notification[] = [];

  async create(notification: Notification): Promise<{ notification: Notification; created: boolean }> {
    const held = notification.dedupeKey ? this.rows.find((n) => n.dedupeKey === notification.dedupeKey) : undefined;
    if (held) return { notification: structuredClone(held), created: false };
    this.rows.push(structuredClone(notification));
    return { notification: structuredClone(notification), created: true };
  }

  async getById(id: string): Promise<Notification | null> {
    const row = this.rows.find((n) => n.id === id);
    return row ? structuredClone(row) : null;
  }

  async listByUser(userId: string, take: number, skip: number): Promise<Notification[]> {
    return this.rows
      .filter((n) => n.userId === userId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(skip, skip + take)
      .map((n) => structuredClone(n));
  }

  async dueBatch(now: Date, take: number, skip: number): Promise<Notification[]> {
    const cutoff = now.toISOString();
    return this.rows
      .filter((n) => n.isActive && retryable(n) && (n.scheduledAt === null || n.scheduledAt <= cutoff))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(skip, skip + take)
      .map((n) => structuredClone(n));
  }

  async countSentSince(userId: string, since: Date): Promise<number> {
    const from = since.toISOString();
    return this.rows.filter((n) => n.userId === userId && n.status === 'SENT' && n.createdAt >= from).length;
  }

  async update(id: string, patch: NotificationUpdate, attempt?: DeliveryAttempt): Promise<boolean> {
    const row = this.rows.find((n) => n.id === id);
    if (!row) return false;
    Object.assign(row, patch, { updatedAt: new Date().toISOString() });
    if (attempt) row.attempts.push({ ...attempt });
    return true;
  }
}
