import { beforeEach, describe, expect, it } from 'vitest';
import { createEvent, PersistenceError } from 'saga-messaging';
import { handlerContext } from 'saga-messaging/testing';
import { MemoryInventoryRepository } from '../repositories/inventoryRepo';
import { MemoryReservationsRepository } from '../repositories/reservationsRepo';
import { ReservationService } from '../reservations/reservationService';
import { reservationRequestedHandler } from './reservationRequestedHandler';

const items = [
  { productId: 'p-1', quantity: 2, unitPrice: 10 },
  { productId: 'p-2', quantity: 1, unitPrice: 5 },
];

const request = (orderId: string) =>
  createEvent('StockReservationRequested', orderId, { orderId, userId: 'user-1', items }, 'orchestrator-service');

describe('reservationRequestedHandler', () => {
  let inventory: MemoryInventoryRepository;
  let reservations: MemoryReservationsRepository;
  let handler: ReturnType<typeof reservationRequestedHandler>;

  beforeEach(async () => {
    inventory = new MemoryInventoryRepository();
    reservations = new MemoryReservationsRepository();
    await inventory.seed([
      { productId: 'p-1', name: 'Laptop', stock: 5 },
      { productId: 'p-2', name: 'Mouse', stock: 1 },
    ]);
    handler = reservationRequestedHandler(new ReservationService(inventory, reservations), 'inventory-service');
  });

  it('emits StockReservationSucceeded with the reserved items', async () => {
    const ctx = handlerContext('ord-1');

    await handler.handle(request('ord-1'), ctx);

    expect(ctx.emitted).toEqual([
      expect.objectContaining({
        type: 'StockReservationSucceeded',
        correlationId: 'ord-1',
        producer: 'inventory-service',
        payload: { orderId: 'ord-1', userId: 'user-1', items },
      }),
    ]);
  });

  it('emits StockReservationFailed with the short lines', async () => {
    await inventory.setStock('p-2', 0);
    const ctx = handlerContext('ord-2');

    await handler.handle(request('ord-2'), ctx);

    expect(ctx.emitted).toEqual([
      expect.objectContaining({
        type: 'StockReservationFailed',
        correlationId: 'ord-2',
        payload: {
          orderId: 'ord-2',
          userId: 'user-1',
          reason: 'insufficient stock',
          failedItems: [{ productId: 'p-2', requested: 1, available: 0, reason: 'Insufficient stock' }],
        },
      }),
    ]);
    expect((await inventory.getByIds(['p-1']))[0]?.stock).toBe(5);
  });

  it('replays the recorded outcome for a redelivered request without reserving twice', async () => {
    const event = request('ord-3');
    const first = handlerContext('ord-3');
    const second = handlerContext('ord-3');

    await handler.handle(event, first);
    await handler.handle(event, second);

    expect(second.emitted.map((e) => e.type)).toEqual(['StockReservationSucceeded']);
    expect(second.emitted[0]?.payload).toEqual(first.emitted[0]?.payload);
    expect((await inventory.getByIds(['p-1']))[0]?.stock).toBe(3);
  });

  const stockOf = async (productId: string) => (await inventory.getByIds([productId]))[0]?.stock;

  it('retries while another delivery holds the claim, leaving stock alone', async () => {
    const claim = reservations.claim.bind(reservations);
    reservations.claim = async () => false;
    const event = request('ord-4');

    await expect(handler.handle(event, handlerContext('ord-4'))).rejects.toBeInstanceOf(PersistenceError);
    expect(await stockOf('p-1')).toBe(5);

    reservations.claim = claim;
    const retry = handlerContext('ord-4');
    await handler.handle(event, retry);

    expect(retry.emitted.map((e) => e.type)).toEqual(['StockReservationSucceeded']);
    expect(await stockOf('p-1')).toBe(3);
  });

  it('reserves once when the same request is delivered twice concurrently', async () => {
    const event = request('ord-5');
    const contexts = [handlerContext('ord-5'), handlerContext('ord-5')];

    const results = await Promise.allSettled(contexts.map((ctx) => handler.handle(event, ctx)));
    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(PersistenceError);
        await handler.handle(event, contexts[i] ?? handlerContext('ord-5'));
      }
    }

    expect(await stockOf('p-1')).toBe(3);
    expect(await stockOf('p-2')).toBe(0);
    expect(contexts.map((ctx) => ctx.emitted.map((e) => e.type))).toEqual([
      ['StockReservationSucceeded'],
      ['StockReservationSucceeded'],
    ]);
  });

  it('gives the stock back when the outcome cannot be recorded', async () => {
    const complete = reservations.complete.bind(reservations);
    reservations.complete = async () => {
      throw new Error('write failed');
    };
    const event = request('ord-6');

    await expect(handler.handle(event, handlerContext('ord-6'))).rejects.toThrow('write failed');
    expect(await stockOf('p-1')).toBe(5);
    expect(await stockOf('p-2')).toBe(1);
    expect(await reservations.get('ord-6')).toBeNull();

    reservations.complete = complete;
    await handler.handle(event, handlerContext('ord-6'));

    expect(await stockOf('p-1')).toBe(3);
    expect(await stockOf('p-2')).toBe(0);
  });

  it('gives the stock back when the claim was lost before recording', async () => {
    reservations.complete = async () => false;

    await expect(handler.handle(request('ord-7'), handlerContext('ord-7'))).rejects.toBeInstanceOf(PersistenceError);

    expect(await stockOf('p-1')).toBe(5);
    expect(await stockOf('p-2')).toBe(1);
  });

  it('releases the claim when the stock store fails', async () => {
    const reserveAll = inventory.reserveAll.bind(inventory);
    inventory.reserveAll = async () => {
      throw new Error('store unavailable');
    };
    const event = request('ord-8');

    await expect(handler.handle(event, handlerContext('ord-8'))).rejects.toThrow('store unavailable');

    inventory.reserveAll = reserveAll;
    const retry = handlerContext('ord-8');
    await handler.handle(event, retry);

    expect(retry.emitted.map((e) => e.type)).toEqual(['StockReservationSucceeded']);
    expect(await stockOf('p-1')).toBe(3);
  });
});
