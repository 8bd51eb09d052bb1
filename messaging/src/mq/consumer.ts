import type { z } from 'zod';
import type { SagaEvent } from '../events';
import { errorMessage } from '../errors';
import { createLogger, Logger } from '../logger';
import { ProcessedEventStore, processedKey } from '../processed/store';
import { parkingQueueOf, QueueName, retryQueueOf } from './topology';
import { attemptOf, EventPublisher, InboundMessage, Subscriber, Subscription } from './transport';
import type { TxContext, UnitOfWork, UnitOfWorkFactory } from './unitOfWork';

export interface HandlerContext {
  uow: UnitOfWork;
  tx: TxContext;
  log: Logger;
  correlationId: string;
  signal: AbortSignal;
  /** Queues an event; it is published only after the unit of work commits. */
  emit(event: SagaEvent): void;
}

export interface ConsumedEvent {
  eventId: string;
  type: string;
  correlationId: string;
}

export interface QueueHandler<E extends ConsumedEvent> {
  queue: QueueName;
  schema: z.ZodType<E, z.ZodTypeDef, unknown>;
  handle(event: E, ctx: HandlerContext): Promise<void>;
}

export interface ConsumerRuntimeDeps {
  subscriber: Subscriber;
  publisher: EventPublisher;
  processed: ProcessedEventStore;
  unitOfWork: UnitOfWorkFactory;
  maxRetries: number;
  prefetch: number;
  logger?: Logger;
}

interface Registration {
  queue: QueueName;
  deliver(msg: InboundMessage): Promise<void>;
}

/**
 * Runs one receive loop per registered queue. A delivery is parsed, checked
 * against the queue's schema and the processed-event store, then handled
 * inside a fresh unit of work. Events the handler emits are published after
 * commit; the delivery is acked last. Failures go to `<queue>.retry` until the
 * retry budget is spent, then to `<queue>.dlq`.
 */
export class ConsumerRuntime {
  private readonly registrations: Registration[] = [];
  private readonly subscriptions: Subscription[] = [];
  private controller = new AbortController();
  private readonly log: Logger;

  constructor(private readonly deps: ConsumerRuntimeDeps) {
    this.log = deps.logger ?? createLogger('consumer');
  }

  register<E extends ConsumedEvent>(handler: QueueHandler<E>): this {
    if (this.registrations.some((r) => r.queue === handler.queue)) {
      throw new Error(`A handler is already registered for ${handler.queue}`);
    }
    this.registrations.push({ queue: handler.queue, deliver: (msg) => this.process(handler, msg) });
    return this;
  }

  get queues(): QueueName[] {
    return this.registrations.map((r) => r.queue);
  }

  get running(): boolean {
    return this.subscriptions.length > 0;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.controller = new AbortController();
    for (const reg of this.registrations) {
      const sub = await this.deps.subscriber.subscribe(reg.queue, reg.deliver, { prefetch: this.deps.prefetch });
      this.subscriptions.push(sub);
    }
    this.log.info({ queues: this.queues }, '[Consumer] started');
  }

  /** Cancels every consumer; deliveries still in flight are requeued, not finished. */
  async stop(): Promise<void> {
    this.controller.abort();
    const subs = this.subscriptions.splice(0);
    for (const sub of subs) {
      try {
        await sub.cancel();
      } catch (err) {
        this.log.warn({ err }, '[Consumer] cancel failed');
      }
    }
    this.log.info('[Consumer] stopped');
  }

  private async process<E extends ConsumedEvent>(handler: QueueHandler<E>, msg: InboundMessage): Promise<void> {
    const signal = this.controller.signal;
    if (signal.aborted) return msg.nack(true);

    const attempt = attemptOf(msg.headers);
    let raw: unknown;
    try {
      raw = JSON.parse(msg.body.toString('utf8'));
    } catch (err) {
      return this.park(msg, `malformed JSON: ${errorMessage(err)}`);
    }

    const parsed = handler.schema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ queue: msg.queue, details: parsed.error.flatten() }, '[Consumer] invalid envelope → DLQ');
      return this.park(msg, 'schema validation failed');
    }
    const event = parsed.data;
    const log = this.log.child({
      queue: msg.queue,
      eventId: event.eventId,
      type: event.type,
      correlationId: event.correlationId,
      attempt,
    });

    const key = processedKey(msg.queue, event.eventId);
    let uow: UnitOfWork | null = null;
    let committed = false;
    try {
      if (await this.deps.processed.has(key)) {
        log.info('[Consumer] already processed, acking');
        return msg.ack();
      }

      uow = await this.deps.unitOfWork();
      const emitted: SagaEvent[] = [];
      await handler.handle(event, {
        uow,
        tx: uow.tx,
        log,
        correlationId: event.correlationId,
        signal,
        emit: (next) => {
          emitted.push(next);
        },
      });
      if (signal.aborted) throw new Error('consumer stopped');
      await uow.commit();
      committed = true;

      for (const next of emitted) {
        await this.deps.publisher.publishEvent(next);
        log.info({ emitted: next.type, emittedId: next.eventId }, '[Consumer] published');
      }
      await this.deps.processed.mark(key);
      msg.ack();
    } catch (err) {
      if (uow && !committed) await this.abortQuietly(uow, log);
      if (signal.aborted) {
        log.warn('[Consumer] abandoned on shutdown, requeueing');
        return msg.nack(true);
      }
      log.error({ err }, '[Consumer] handler failed');
      await this.retryOrPark(msg, attempt, errorMessage(err), log);
    } finally {
      if (uow) await this.releaseQuietly(uow, log);
    }
  }

  private async retryOrPark(msg: InboundMessage, attempt: number, reason: string, log: Logger): Promise<void> {
    const next = attempt + 1;
    if (next > this.deps.maxRetries) {
      log.error({ attempts: next }, '[Consumer] retries exhausted → DLQ');
      return this.park(msg, reason);
    }
    try {
      await this.deps.publisher.publish('', retryQueueOf(msg.queue), msg.body, {
        correlationId: msg.correlationId,
        messageId: msg.messageId,
        headers: { ...msg.headers, 'x-attempt': next, 'x-last-error': reason },
      });
      log.warn({ nextAttempt: next }, '[Consumer] scheduled retry');
      msg.ack();
    } catch (err) {
      log.error({ err }, '[Consumer] retry publish failed, requeueing');
      msg.nack(true);
    }
  }

  private async park(msg: InboundMessage, reason: string): Promise<void> {
    try {
      await this.deps.publisher.publish('', parkingQueueOf(msg.queue), msg.body, {
        correlationId: msg.correlationId,
        messageId: msg.messageId,
        headers: { ...msg.headers, 'x-parked-reason': reason },
      });
      msg.ack();
    } catch (err) {
      // Rejecting without requeue dead-letters to the same parking queue.
      this.log.error({ err, queue: msg.queue }, '[Consumer] park publish failed, rejecting');
      msg.nack(false);
    }
  }

  private async abortQuietly(uow: UnitOfWork, log: Logger): Promise<void> {
    try {
      await uow.abort();
    } catch (err) {
      log.warn({ err }, '[Consumer] abort failed');
    }
  }

  private async releaseQuietly(uow: UnitOfWork, log: Logger): Promise<void> {
    try {
      await uow.release();
    } catch (err) {
      log.warn({ err }, '[Consumer] release failed');
    }
  }
}
