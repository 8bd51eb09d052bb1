import { describe, expect, it } from 'vitest';
import { TopologyError } from '../errors';
import { createEvent } from '../events';
import { InMemoryBroker } from '../testing/memoryBroker';
import { sampleSnapshot } from '../testing/fixtures';
import { declareTopology, QUEUES, TopologyChannel } from './topology';

describe('declareTopology', () => {
  it('declares the main, retry and parking queue of each consumer', async () => {
    const broker = new InMemoryBroker();
    await declareTopology(broker, [QUEUES.ORDER_COMPENSATION], { retryDelayMs: 5000 });

    expect(broker.bindingsOf('order.compensation')).toEqual([{ exchange: 'orders', pattern: 'order.cancelled' }]);
    expect(broker.queueArguments('order.compensation.retry')).toEqual({
      'x-message-ttl': 5000,
      'x-dead-letter-exchange': '',
      'x-dead-letter-routing-key': 'order.compensation',
    });
    expect(broker.queueArguments('order.compensation')).toEqual({
      'x-dead-letter-exchange': 'saga.dlx',
      'x-dead-letter-routing-key': 'order.compensation.dlq',
    });
    expect(broker.bindingsOf('order.compensation.dlq')).toEqual([
      { exchange: 'saga.dlx', pattern: 'order.compensation.dlq' },
    ]);
  });

  it('is a no-op when run again with the same parameters', async () => {
    const broker = new InMemoryBroker();
    await declareTopology(broker, [QUEUES.ORDER_COMPENSATION], { retryDelayMs: 5000 });
    await declareTopology(broker, [QUEUES.ORDER_COMPENSATION], { retryDelayMs: 5000 });

    expect(broker.bindingsOf('order.compensation')).toHaveLength(1);
  });

  it('fails with TopologyError when the broker refuses a conflicting declaration', async () => {
    const broker = new InMemoryBroker();
    await declareTopology(broker, [QUEUES.ORDER_COMPENSATION], { retryDelayMs: 5000 });

    const rerun = declareTopology(broker, [QUEUES.ORDER_COMPENSATION], { retryDelayMs: 1000 });
    await expect(rerun).rejects.toBeInstanceOf(TopologyError);
    await expect(rerun).rejects.toMatchObject({ resource: 'queue:order.compensation.retry' });
  });

  it('passes other broker errors through unchanged', async () => {
    const boom = new Error('connection reset');
    const channel: TopologyChannel = {
      assertExchange: async () => {
        throw boom;
      },
      assertQueue: async () => ({}),
      bindQueue: async () => ({}),
    };

    await expect(declareTopology(channel, [], { retryDelayMs: 1 })).rejects.toBe(boom);
  });

  it('routes one event to every queue bound to its routing key', async () => {
    const broker = new InMemoryBroker();
    await declareTopology(
      broker,
      [QUEUES.ORDER_COMPENSATION, QUEUES.NOTIFICATION_ORDER_CANCELLED, QUEUES.ORDER_CONFIRMATION],
      { retryDelayMs: 5000 }
    );
    const event = createEvent(
      'OrderCancelled',
      'ord-1',
      { ...sampleSnapshot('ord-1'), reason: 'insufficient stock', failedItems: [] },
      'test'
    );

    await broker.publishEvent(event);

    expect(broker.messages('order.compensation')).toEqual([event]);
    expect(broker.messages('notification.order-cancelled')).toEqual([event]);
    expect(broker.messages('order.confirmation')).toEqual([]);
  });
});
