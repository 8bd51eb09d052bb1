/**
 * Remembers which order an `Idempotency-Key` produced. Process-local; a
 * restarted or second instance does not see earlier keys.
 */
export class IdempotencyCache {
  private readonly entries = new Map<string, { orderId: string; expiresAt: number }>();

  constructor(private readonly ttlMs: number, private readonly now: () => number = Date.now) {}

  get(key: string): string | null {
    const rec = this.entries.get(key);
    if (!rec) return null;
    if (rec.expiresAt < this.now()) {
      this.entries.delete(key);
      return null;
    }
    return rec.orderId;
  }

  set(key: string, orderId: string): void {
    this.entries.set(key, { orderId, expiresAt: this.now() + this.ttlMs });
  }
}
