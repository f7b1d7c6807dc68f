/**
 * Summary Service
 *
 * Read-only per-event figures derived from the ledger and the current
 * catalog. Revenue always uses today's prices.
 */

import { ProductSummary, Transaction } from '../../types/sales';
import { CatalogService } from '../catalog/catalog.service';
import { LedgerStore } from '../ledger/ledger.store';

export class SummaryService {
  constructor(
    private readonly catalog: CatalogService,
    private readonly ledger: LedgerStore
  ) {}

  /**
   * One row per product sold at the event that is still in the catalog,
   * sorted by product name
   */
  summarize(eventId: string): ProductSummary[] {
    const totals = new Map<string, { count: number; total: number }>();

    for (const transaction of this.ledger.listByEvent(eventId)) {
      for (const item of transaction.items) {
        const entry = totals.get(item.productId) ?? { count: 0, total: 0 };
        entry.count += item.quantity;
        const product = this.catalog.findProduct(item.productId);
        if (product) {
          entry.total += item.quantity * product.price;
        }
        totals.set(item.productId, entry);
      }
    }

    const rows: ProductSummary[] = [];
    for (const [productId, { count, total }] of totals) {
      const product = this.catalog.findProduct(productId);
      if (!product) {
        continue;
      }
      rows.push({
        productId,
        productName: product.name,
        count,
        total,
        remainingStock: product.inventoryManaged ? this.catalog.availableStock(product) : null,
      });
    }

    return rows.sort((a, b) => a.productName.localeCompare(b.productName));
  }

  eventTotal(eventId: string): number {
    return this.summarize(eventId).reduce((sum, row) => sum + row.total, 0);
  }

  /**
   * Value of one sale at current prices; items whose product is gone count zero
   */
  transactionTotal(transaction: Transaction): number {
    return transaction.items.reduce((sum, item) => {
      const product = this.catalog.findProduct(item.productId);
      return product ? sum + item.quantity * product.price : sum;
    }, 0);
  }
}
