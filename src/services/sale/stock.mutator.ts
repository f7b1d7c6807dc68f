import { Product, ProductLookup } from '../../types/sales';

export interface StockDecrementer extends ProductLookup {
  decrementStock(product: Product, quantity: number): void;
}

/**
 * Take a validated basket out of stock, one decrement per line.
 * Bundles expand to their managed components inside the catalog.
 */
export function applyStockDecrements(
  catalog: StockDecrementer,
  basket: ReadonlyMap<string, number>
): void {
  for (const [productId, quantity] of basket) {
    const product = catalog.findProduct(productId);
    if (product) {
      catalog.decrementStock(product, quantity);
    }
  }
}
