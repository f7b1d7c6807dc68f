/**
 * Export Service
 *
 * Maintains the flat text rendering of the ledger. New sales are appended;
 * edits and deletions regenerate the whole file so historical rows match the
 * ledger as it now stands.
 */

import { config, ExportLocale } from '../../config';
import { createServiceLogger, exportWritesTotal } from '../../observability';
import { BlobStore, persistBlob } from '../../storage';
import { ProductLookup, Transaction } from '../../types/sales';
import {
  EventNameLookup,
  formatHeader,
  formatRow,
  transactionRows,
} from './export.format';
import { EXPORT_LABELS, ExportLabels } from './export.labels';

const log = createServiceLogger('export');

export interface ExportServiceOptions {
  blobKey?: string;
  locale?: ExportLocale;
}

export class ExportService {
  private readonly blobKey: string;
  private readonly labels: ExportLabels;

  constructor(
    private readonly store: BlobStore,
    private readonly products: ProductLookup,
    private readonly events: EventNameLookup,
    options: ExportServiceOptions = {}
  ) {
    this.blobKey = options.blobKey ?? config.storage.keys.export;
    this.labels = EXPORT_LABELS[options.locale ?? config.export.locale];
  }

  renderHeader(): string {
    return formatHeader(this.labels);
  }

  renderTransaction(transaction: Transaction): string {
    return transactionRows(transaction, this.products, this.events, this.labels)
      .map(formatRow)
      .join('');
  }

  /**
   * Header plus every resolvable item, in ledger order
   */
  render(transactions: readonly Transaction[]): string {
    return this.renderHeader() + transactions.map((t) => this.renderTransaction(t)).join('');
  }

  /**
   * Append one sale's rows, writing the header first when no export exists
   */
  async appendTransaction(transaction: Transaction): Promise<boolean> {
    const rows = this.renderTransaction(transaction);

    return persistBlob(this.store, this.blobKey, async (store) => {
      const exists = (await store.get(this.blobKey)) !== null;
      await store.append(this.blobKey, exists ? rows : this.renderHeader() + rows);
      exportWritesTotal.inc({ mode: 'append' });
      log.debug({ transactionId: transaction.id, created: !exists }, 'Export rows appended');
    });
  }

  /**
   * Regenerate the whole export from the given ledger
   */
  async rewriteAll(transactions: readonly Transaction[]): Promise<boolean> {
    const text = this.render(transactions);

    return persistBlob(this.store, this.blobKey, async (store) => {
      await store.put(this.blobKey, text);
      exportWritesTotal.inc({ mode: 'rewrite' });
      log.debug({ transactions: transactions.length }, 'Export rewritten');
    });
  }

  /**
   * Current export text, or null when nothing has been exported yet
   */
  async read(): Promise<string | null> {
    return this.store.get(this.blobKey);
  }
}
