export type QueueOrder = 'oldest-first' | 'newest-first';

export interface RateLimitPolicy {
  permitLimit: number;
  windowMs: number;
  /** Requests that may wait for the next window once the permits are gone. */
  queueLimit: number;
  queueOrder: QueueOrder;
}

export interface Lease {
  acquired: boolean;
  /** Time until the current window ends, for Retry-After. */
  retryAfterMs: number;
}

interface Waiter {
  resolve(lease: Lease): void;
}

/**
 * Counts permits per fixed window. When the window is spent, up to
 * `queueLimit` callers wait for the next one; newest-first evicts the oldest
 * waiter when the queue is full, oldest-first rejects the newcomer.
 */
export class FixedWindowLimiter {
  private permits: number;
  private windowEndsAt = 0;
  private readonly queue: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly policy: RateLimitPolicy) {
    this.permits = policy.permitLimit;
  }

  acquire(): Promise<Lease> {
    this.replenishIfDue(Date.now());

    if (this.permits > 0 && this.queue.length === 0) {
      this.permits--;
      return Promise.resolve({ acquired: true, retryAfterMs: 0 });
    }

    if (this.policy.queueLimit <= 0) return Promise.resolve(this.rejection());

    if (this.queue.length >= this.policy.queueLimit) {
      if (this.policy.queueOrder === 'oldest-first') return Promise.resolve(this.rejection());
      this.queue.shift()?.resolve(this.rejection());
    }

    return new Promise<Lease>((resolve) => {
      this.queue.push({ resolve });
      this.scheduleReplenish();
    });
  }

  /** True when nothing is waiting and the window has lapsed, so the limiter holds no state worth keeping. */
  isIdle(now = Date.now()): boolean {
    return this.queue.length === 0 && now >= this.windowEndsAt;
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    for (const waiter of this.queue.splice(0)) waiter.resolve(this.rejection());
  }

  private rejection(): Lease {
    return { acquired: false, retryAfterMs: Math.max(0, this.windowEndsAt - Date.now()) };
  }

  private replenishIfDue(now: number): void {
    if (now < this.windowEndsAt) return;
    this.windowEndsAt = now + this.policy.windowMs;
    this.permits = this.policy.permitLimit;
    this.drain();
  }

  private drain(): void {
    while (this.permits > 0 && this.queue.length > 0) {
      const waiter = this.policy.queueOrder === 'oldest-first' ? this.queue.shift() : this.queue.pop();
      if (!waiter) break;
      this.permits--;
      waiter.resolve({ acquired: true, retryAfterMs: 0 });
    }
  }

  private scheduleReplenish(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.replenishIfDue(Date.now());
      if (this.queue.length > 0) this.scheduleReplenish();
    }, Math.max(0, this.windowEndsAt - Date.now()));
    this.timer.unref();
  }
}
