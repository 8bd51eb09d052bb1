import { createLogger, sleep } from 'saga-messaging';
import type { DispatchSummary } from '../notifications/notificationService';

const log = createLogger('dispatcher');

export interface BatchProcessor {
  processQueueBatch(take: number, skip?: number): Promise<DispatchSummary>;
}

export interface DispatcherOptions {
  intervalMs: number;
  batchSize: number;
}

/** Runs one batch, sleeps, and repeats until the signal aborts. */
export async function runDispatcher(processor: BatchProcessor, options: DispatcherOptions, signal: AbortSignal): Promise<void> {
  log.info(options, '[Dispatcher] started');
  while (!signal.aborted) {
    await processor.processQueueBatch(options.batchSize);
    await sleep(options.intervalMs, signal);
  }
  log.info('[Dispatcher] stopped');
}
