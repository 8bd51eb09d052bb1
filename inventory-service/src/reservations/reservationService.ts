import { createLogger, Logger, OrderLine, PersistenceError, TxContext } from 'saga-messaging';
import type { ReservationOutcome } from '../domain/product';
import type { InventoryRepository } from '../repositories/inventoryRepo';
import type { ReservationsRepository } from '../repositories/reservationsRepo';

export interface ReservationRequest {
  orderId: string;
  requestEventId: string;
  items: readonly OrderLine[];
}

export interface ReservationResult {
  outcome: ReservationOutcome;
  /** True when the outcome was read back from an earlier reservation of the same order. */
  replayed: boolean;
}

/**
 * Reserves stock at most once per order. A delivery first claims the order;
 * only the claim holder touches stock, and it gives the stock and the claim
 * back when its outcome cannot be stored.
 */
export class ReservationService {
  private readonly log: Logger;

  constructor(
    private readonly inventory: InventoryRepository,
    private readonly reservations: ReservationsRepository,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger('reservations');
  }

  async reserve(request: ReservationRequest, tx: TxContext = {}): Promise<ReservationResult> {
    const { orderId } = request;
    const recorded = await this.recordedOutcome(orderId, tx);
    if (recorded) return recorded;

    if (!(await this.reservations.claim(orderId, request.requestEventId, tx))) {
      const winner = await this.recordedOutcome(orderId, tx);
      if (winner) return winner;
      // Claimed by a delivery still in flight (or one that stopped before finishing)
      throw new PersistenceError(`Reservation for order ${orderId} is in progress`);
    }

    let outcome: ReservationOutcome;
    try {
      outcome = await this.inventory.reserveAll(request.items, tx);
    } catch (err) {
      await this.releaseClaim(orderId, tx);
      throw err;
    }

    try {
      if (!(await this.reservations.complete(orderId, outcome, tx))) {
        throw new PersistenceError(`Reservation claim for order ${orderId} was lost`);
      }
    } catch (err) {
      if (outcome.success) await this.restoreStock(orderId, outcome.reservedItems, tx);
      await this.releaseClaim(orderId, tx);
      throw err;
    }

    if (outcome.success) {
      this.log.info({ orderId, lines: outcome.reservedItems.length }, '[Inventory] stock reserved');
    } else {
      this.log.warn({ orderId, reason: outcome.reason, failedItems: outcome.failedItems }, '[Inventory] reservation failed');
    }
    return { outcome, replayed: false };
  }

  private async recordedOutcome(orderId: string, tx: TxContext): Promise<ReservationResult | null> {
    const existing = await this.reservations.get(orderId, tx);
    if (existing?.status !== 'COMPLETED' || !existing.outcome) return null;
    this.log.info({ orderId, success: existing.outcome.success }, '[Inventory] order already reserved, replaying outcome');
    return { outcome: existing.outcome, replayed: true };
  }

  private async restoreStock(orderId: string, items: readonly OrderLine[], tx: TxContext): Promise<void> {
    try {
      await this.inventory.release(items, tx);
      this.log.warn({ orderId }, '[Inventory] outcome not recorded, stock restored');
    } catch (err) {
      this.log.error({ err, orderId, items }, '[Inventory] could not restore stock');
    }
  }

  private async releaseClaim(orderId: string, tx: TxContext): Promise<void> {
    try {
      await this.reservations.release(orderId, tx);
    } catch (err) {
      this.log.error({ err, orderId }, '[Inventory] could not release reservation claim');
    }
  }
}
