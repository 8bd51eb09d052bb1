import type { OrderSnapshot, SagaEvent } from '../events';
import { createLogger } from '../logger';
import type { HandlerContext } from '../mq/consumer';
import { NoopUnitOfWork } from '../mq/unitOfWork';

export function sampleSnapshot(orderId: string, overrides: Partial<OrderSnapshot> = {}): OrderSnapshot {
  return {
    orderId,
    userId: 'user-1',
    customerName: 'Test Customer',
    customerEmail: 'customer@example.com',
    items: [
      { productId: 'p-1', quantity: 2, unitPrice: 10 },
      { productId: 'p-2', quantity: 1, unitPrice: 5 },
    ],
    total: 25,
    ...overrides,
  };
}

/** A handler context outside the consumer runtime; emitted events are collected. */
export function handlerContext(correlationId: string): HandlerContext & { emitted: SagaEvent[] } {
  const uow = new NoopUnitOfWork();
  const emitted: SagaEvent[] = [];
  return {
    uow,
    tx: uow.tx,
    log: createLogger('test'),
    correlationId,
    signal: new AbortController().signal,
    emitted,
    emit: (event) => {
      emitted.push(event);
    },
  };
}
