import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryProcessedEventStore } from './store';

describe('MemoryProcessedEventStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('remembers keys until their ttl runs out', async () => {
    const store = new MemoryProcessedEventStore(1000);
    await store.mark('processed:q:e-1');

    vi.advanceTimersByTime(1000);
    expect(await store.has('processed:q:e-1')).toBe(true);

    vi.advanceTimersByTime(1);
    expect(await store.has('processed:q:e-1')).toBe(false);
  });

  it('drops expired keys when new ones are marked', async () => {
    const store = new MemoryProcessedEventStore(1000);
    await store.mark('processed:q:e-1');
    await store.mark('processed:q:e-2');
    vi.advanceTimersByTime(600);
    await store.mark('processed:q:e-3');

    vi.advanceTimersByTime(500);
    await store.mark('processed:q:e-4');

    expect(store.size).toBe(2);
    expect(await store.has('processed:q:e-3')).toBe(true);
  });

  it('extends the ttl of a key that is marked again', async () => {
    const store = new MemoryProcessedEventStore(1000);
    await store.mark('processed:q:e-1');
    await store.mark('processed:q:e-2');
    vi.advanceTimersByTime(600);
    await store.mark('processed:q:e-1');

    vi.advanceTimersByTime(500);

    expect(await store.has('processed:q:e-2')).toBe(false);
    expect(await store.has('processed:q:e-1')).toBe(true);
    expect(store.size).toBe(1);
  });
});
