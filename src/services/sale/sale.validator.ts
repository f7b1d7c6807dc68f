import { Product, ProductLookup } from '../../types/sales';

export type SaleRejectionReason = 'NO_EVENT_SELECTED' | 'EMPTY_BASKET' | 'INSUFFICIENT_STOCK';

export interface StockChecker extends ProductLookup {
  canSell(product: Product, quantity: number): boolean;
}

export type BasketCheck =
  | { ok: true; eventId: string }
  | { ok: false; reason: SaleRejectionReason; productId?: string };

/**
 * Decide whether the whole basket can be sold against the selected event.
 *
 * All or nothing: one line that fails its stock check rejects the sale.
 * Lines whose product no longer exists are ignored.
 */
export function validateBasket(
  catalog: StockChecker,
  basket: ReadonlyMap<string, number>,
  eventId: string | null
): BasketCheck {
  if (eventId === null) {
    return { ok: false, reason: 'NO_EVENT_SELECTED' };
  }
  if (basket.size === 0) {
    return { ok: false, reason: 'EMPTY_BASKET' };
  }

  for (const [productId, quantity] of basket) {
    const product = catalog.findProduct(productId);
    if (product && !catalog.canSell(product, quantity)) {
      return { ok: false, reason: 'INSUFFICIENT_STOCK', productId };
    }
  }

  return { ok: true, eventId };
}
