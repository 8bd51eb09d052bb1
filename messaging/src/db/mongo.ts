import { ClientSession, Db, MongoClient } from 'mongodb';
import { createLogger } from '../logger';
import type { TxContext, UnitOfWork, UnitOfWorkFactory } from '../mq/unitOfWork';

const log = createLogger('mongo');

export interface Mongo {
  client: MongoClient;
  db: Db;
}

function getDbNameFromUri(uri: string, fallback: string): string {
  const withoutQuery = uri.split('?')[0] ?? uri;
  const afterScheme = withoutQuery.replace(/^mongodb(\+srv)?:\/\//, '');
  const slash = afterScheme.indexOf('/');
  if (slash === -1) return fallback;
  return afterScheme.substring(slash + 1) || fallback;
}

export async function connectMongo(uri: string, fallbackDb: string): Promise<Mongo> {
  const client = new MongoClient(uri);
  await client.connect();
  const db = client.db(getDbNameFromUri(uri, fallbackDb));
  log.info({ db: db.databaseName }, '[Mongo] connected');
  return { client, db };
}

export async function closeMongo(mongo: Mongo | null): Promise<void> {
  if (!mongo) return;
  try {
    await mongo.client.close();
  } catch (err) {
    log.warn({ err }, '[Mongo] error while closing');
  }
}

export const isDuplicateKeyError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && (err.code === 11000 || err.code === 11001);

/**
 * One client session per delivery. With transactions enabled (replica set or
 * mongos) every repository write that receives `tx` joins the transaction;
 * without them the session only scopes the writes.
 */
export class MongoUnitOfWork implements UnitOfWork {
  readonly tx: TxContext;

  constructor(private readonly session: ClientSession, private readonly transactional: boolean) {
    if (transactional) session.startTransaction();
    this.tx = transactional ? { session } : {};
  }

  async commit(): Promise<void> {
    if (this.transactional && this.session.inTransaction()) await this.session.commitTransaction();
  }

  async abort(): Promise<void> {
    if (this.transactional && this.session.inTransaction()) await this.session.abortTransaction();
  }

  async release(): Promise<void> {
    await this.session.endSession();
  }
}

export function mongoUnitOfWorkFactory(client: MongoClient, transactional: boolean): UnitOfWorkFactory {
  return async () => new MongoUnitOfWork(client.startSession(), transactional);
}
