/**
 * Sale Service
 *
 * Commits the basket of a sale session as one ledger transaction.
 *
 * Commit sequence:
 * 1. validate the basket against the catalog and the selected event
 * 2. record the transaction and take its items out of stock (no await in
 *    between, so no other request sees one without the other)
 * 3. persist the ledger, then the catalog
 * 4. append the transaction's rows to the export
 * 5. reset the session
 *
 * A rejected sale leaves the ledger, the stock and the session untouched.
 */

import { v4 as uuid } from 'uuid';

import {
  addLogContext,
  createServiceLogger,
  saleItemsTotal,
  salesCommittedTotal,
  salesRejectedTotal,
} from '../../observability';
import { Transaction } from '../../types/sales';
import { CatalogService } from '../catalog/catalog.service';
import { EventService } from '../event/event.service';
import { ExportService } from '../export/export.service';
import { LedgerStore } from '../ledger/ledger.store';
import { SaleSession } from './sale.session';
import { SaleRejectionReason, validateBasket } from './sale.validator';
import { applyStockDecrements } from './stock.mutator';

const log = createServiceLogger('sale');

export type SaleOutcome =
  | { status: 'committed'; transaction: Transaction }
  | { status: 'rejected'; reason: SaleRejectionReason; productId?: string };

export interface SaleServiceDeps {
  catalog: CatalogService;
  events: EventService;
  ledger: LedgerStore;
  exporter: ExportService;
  now?: () => Date;
}

export class SaleService {
  private readonly catalog: CatalogService;
  private readonly events: EventService;
  private readonly ledger: LedgerStore;
  private readonly exporter: ExportService;
  private readonly now: () => Date;

  constructor(deps: SaleServiceDeps) {
    this.catalog = deps.catalog;
    this.events = deps.events;
    this.ledger = deps.ledger;
    this.exporter = deps.exporter;
    this.now = deps.now ?? (() => new Date());
  }

  async commitSale(session: SaleSession): Promise<SaleOutcome> {
    const basket = new Map(session.getBasket());
    const check = validateBasket(this.catalog, basket, this.events.getSelectedId());

    if (!check.ok) {
      salesRejectedTotal.inc({ reason: check.reason });
      log.info({ reason: check.reason, productId: check.productId }, 'Sale rejected');
      return { status: 'rejected', reason: check.reason, productId: check.productId };
    }

    const transaction: Transaction = {
      id: uuid(),
      date: this.now(),
      items: Array.from(basket, ([productId, quantity]) => ({ id: uuid(), productId, quantity })),
      ...session.getProfile(),
      eventId: check.eventId,
    };

    this.ledger.record(transaction);
    applyStockDecrements(this.catalog, basket);
    addLogContext({ transactionId: transaction.id, eventId: transaction.eventId });

    await this.ledger.save();
    await this.catalog.save();
    await this.exporter.appendTransaction(transaction);

    session.clear();

    salesCommittedTotal.inc();
    saleItemsTotal.inc(transaction.items.reduce((sum, item) => sum + item.quantity, 0));
    log.info(
      { transactionId: transaction.id, eventId: transaction.eventId, items: transaction.items.length },
      'Sale committed'
    );

    return { status: 'committed', transaction };
  }
}
