import type { FailedLine, OrderLine } from 'saga-messaging';

export interface Product {
  productId: string;
  name: string;
  stock: number;
  updatedAt: string;
}

export const INSUFFICIENT_STOCK = 'Insufficient stock';
export const PRODUCT_NOT_FOUND = 'Product not found';

export type ReservationOutcome =
  | { success: true; reservedItems: OrderLine[] }
  | { success: false; reason: string; failedItems: FailedLine[] };

export interface ReservationLine {
  productId: string;
  quantity: number;
}

/** Sums the quantities of lines that name the same product, keeping first-seen order. */
export function aggregateLines(items: readonly ReservationLine[]): ReservationLine[] {
  const totals = new Map<string, number>();
  for (const { productId, quantity } of items) {
    totals.set(productId, (totals.get(productId) ?? 0) + quantity);
  }
  return [...totals].map(([productId, quantity]) => ({ productId, quantity }));
}

/** Every line that cannot be served from `stockOf`; an empty result means all of them can. */
export function shortfalls(lines: readonly ReservationLine[], stockOf: (productId: string) => number | undefined): FailedLine[] {
  const failed: FailedLine[] = [];
  for (const { productId, quantity } of lines) {
    const available = stockOf(productId);
    if (available === undefined) {
      failed.push({ productId, requested: quantity, available: 0, reason: PRODUCT_NOT_FOUND });
    } else if (available < quantity) {
      failed.push({ productId, requested: quantity, available, reason: INSUFFICIENT_STOCK });
    }
  }
  return failed;
}
