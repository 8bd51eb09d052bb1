/**
 * Remembers which event ids a queue has already handled, so a redelivered
 * message is acknowledged without running its handler again.
 */
export interface ProcessedEventStore {
  has(key: string): Promise<boolean>;
  mark(key: string): Promise<void>;
}

export const processedKey = (queue: string, eventId: string): string => `processed:${queue}:${eventId}`;

export class MemoryProcessedEventStore implements ProcessedEventStore {
  // Insertion order is expiry order: every entry gets the same ttl and a re-mark moves the key to the end
  private readonly entries = new Map<string, number>();

  constructor(private readonly ttlMs = 24 * 60 * 60 * 1000) {}

  get size(): number {
    return this.entries.size;
  }

  async has(key: string): Promise<boolean> {
    this.prune(Date.now());
    return this.entries.has(key);
  }

  async mark(key: string): Promise<void> {
    const now = Date.now();
    this.prune(now);
    this.entries.delete(key);
    this.entries.set(key, now + this.ttlMs);
  }

  private prune(now: number): void {
    for (const [key, expiresAt] of this.entries) {
      if (expiresAt >= now) return;
      this.entries.delete(key);
    }
  }
}
