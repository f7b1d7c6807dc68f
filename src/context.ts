/**
 * Application context
 *
 * Wires the services around one blob store and loads their saved state.
 * Every piece of mutable state lives on the context, so separate contexts
 * (tests, several stores) never share anything.
 */

import { ExportLocale } from './config';
import { CatalogService } from './services/catalog';
import { EventService } from './services/event';
import { ExportService } from './services/export';
import { LedgerStore } from './services/ledger';
import { SaleService, SaleSession } from './services/sale';
import { SummaryService } from './services/summary';
import { BlobStore } from './storage';

export interface PosContext {
  store: BlobStore;
  catalog: CatalogService;
  events: EventService;
  ledger: LedgerStore;
  exporter: ExportService;
  sales: SaleService;
  summary: SummaryService;
  /** The session of the single register this process serves */
  session: SaleSession;
}

export interface PosContextOptions {
  seedDefaults?: boolean;
  exportLocale?: ExportLocale;
  now?: () => Date;
}

export async function createPosContext(
  store: BlobStore,
  options: PosContextOptions = {}
): Promise<PosContext> {
  const catalog = new CatalogService(store);
  const events = new EventService(store);
  const exporter = new ExportService(store, catalog, events, { locale: options.exportLocale });
  const ledger = new LedgerStore(store, exporter);

  await catalog.load(options.seedDefaults);
  await events.load();
  await ledger.load();

  return {
    store,
    catalog,
    events,
    ledger,
    exporter,
    sales: new SaleService({ catalog, events, ledger, exporter, now: options.now }),
    summary: new SummaryService(catalog, ledger),
    session: new SaleSession(),
  };
}
