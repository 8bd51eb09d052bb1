import { describe, expect, it } from 'vitest';
import { runDispatcher } from './dispatcher';

describe('runDispatcher', () => {
  it('processes batches until the signal aborts', async () => {
    const controller = new AbortController();
    const takes: number[] = [];
    const processor = {
      async processQueueBatch(take: number) {
        takes.push(take);
        if (takes.length === 2) controller.abort();
        return { processed: 0, sent: 0, failed: 0, deferred: 0 };
      },
    };

    await runDispatcher(processor, { intervalMs: 1, batchSize: 25 }, controller.signal);

    expect(takes).toEqual([25, 25]);
  });

  it('does not start a batch once already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await runDispatcher(
      {
        async processQueueBatch() {
          calls++;
          return { processed: 0, sent: 0, failed: 0, deferred: 0 };
        },
      },
      { intervalMs: 60_000, batchSize: 50 },
      controller.signal
    );

    expect(calls).toBe(0);
  });
});
