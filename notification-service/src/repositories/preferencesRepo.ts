import { Collection, Db } from 'mongodb';
import type { UserPreference } from '../domain/preference';

export interface PreferencesRepository {
  get(userId: string): Promise<UserPreference | null>;
  upsert(preference: UserPreference): Promise<UserPreference>;
}

export class MongoPreferencesRepository implements PreferencesRepository {
  private readonly col: Collection<UserPreference>;

  constructor(db: Db) {
    this.col = db.collection<UserPreference>('user_preferences');
  }

  async ensureIndexes(): Promise<void> {
    await this.col.createIndex({ userId: 1 }, { unique: true });
  }

  async get(userId: string): Promise<UserPreference | null> {
    const doc = await this.col.findOne({ userId });
    if (!doc) return null;
    const { _id, ...preference } = doc;
    return preference;
  }

  async upsert(preference: UserPreference): Promise<UserPreference> {
    await this.col.replaceOne({ userId: preference.userId }, { ...preference }, { upsert: true });
    return preference;
  }
}

export class MemoryPreferencesRepository implements PreferencesRepository {
  private readonly prefs = new Map<string, UserPreference>();

  async get(userId: string): Promise<UserPreference | null> {
    const pref = this.prefs.get(userId);
    return pref ? { ...pref } : null;
  }

  async upsert(preference: UserPreference): Promise<UserPreference> {
    this.prefs.set(preference.userId, { ...preference });
    return { ...preference };
  }
}
