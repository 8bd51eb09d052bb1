import {
  ConsumerRuntime,
  HandlerContext,
  OrderPlacedV1Schema,
  PersistenceError,
  QUEUES,
  StockReservationFailedV1Schema,
  StockReservationSucceededV1Schema,
} from 'saga-messaging';
import type { SagaStateRepository } from './sagaStateRepo';
import { decide, DecideOptions, SagaInput, TransitionDecision } from './transitions';

/**
 * Drives each order's saga from its state record. Every transition is a
 * compare-and-swap on that record inside the delivery's unit of work, so two
 * deliveries racing on one saga cannot both advance it; the loser is retried
 * and then sees the winner's state.
 */
export class Orchestrator {
  constructor(private readonly sagas: SagaStateRepository, private readonly options: DecideOptions) {}

  async handle(event: SagaInput, ctx: HandlerContext): Promise<TransitionDecision> {
    const { tx, log } = ctx;
    const sagaId = event.correlationId;
    const record = await this.sagas.get(sagaId, tx);
    const decision = decide(record, event, this.options);

    switch (decision.kind) {
      case 'ignore':
        log.warn({ sagaId, step: record?.step, reason: decision.reason }, `[Orchestrator] ignoring ${event.type}`);
        return decision;

      case 'replay':
        log.info({ sagaId, step: record?.step, emitted: decision.emit.type }, '[Orchestrator] duplicate delivery, re-emitting');
        ctx.emit(decision.emit);
        return decision;

      case 'advance': {
        const now = new Date().toISOString();
        let applied = false;
        if (record) {
          applied = await this.sagas.compareAndSwap(
            sagaId,
            record.step,
            record.version,
            { step: decision.to, lastEventId: event.eventId, lastEmitted: decision.emit, updatedAt: now },
            tx
          );
        } else if (event.type === 'OrderPlaced') {
          applied = await this.sagas.insert(
            {
              sagaId,
              step: decision.to,
              lastEventId: event.eventId,
              lastEmitted: decision.emit,
              version: 1,
              snapshot: event.payload,
              createdAt: now,
              updatedAt: now,
            },
            tx
          );
        }
        if (!applied) {
          throw new PersistenceError(`Saga ${sagaId} changed concurrently while applying ${event.type}`);
        }
        log.info(
          { sagaId, from: record?.step ?? 'PLACED', to: decision.to, emitted: decision.emit.type },
          '[Orchestrator] saga advanced'
        );
        ctx.emit(decision.emit);
        return decision;
      }
    }
  }

  register(runtime: ConsumerRuntime): void {
    const run = async (event: SagaInput, ctx: HandlerContext) => {
      await this.handle(event, ctx);
    };
    runtime
      .register({ queue: QUEUES.ORCHESTRATOR_ORDER_PLACED, schema: OrderPlacedV1Schema, handle: run })
      .register({ queue: QUEUES.ORCHESTRATOR_STOCK_RESERVED, schema: StockReservationSucceededV1Schema, handle: run })
      .register({ queue: QUEUES.ORCHESTRATOR_STOCK_FAILED, schema: StockReservationFailedV1Schema, handle: run });
  }
}
