/**
 * Ledger Store
 *
 * Ordered, in-memory record of every sale, persisted as a full snapshot after
 * each change. Edits and deletions also regenerate the export, because rows
 * already on the export surface no longer match the ledger.
 *
 * Lookups are first-match linear scans; ids are assumed unique.
 */

import { config } from '../../config';
import { createServiceLogger } from '../../observability';
import { BlobStore, decodeLedger, encodeLedger, persistBlob } from '../../storage';
import { Transaction } from '../../types/sales';

const log = createServiceLogger('ledger');

export interface LedgerRewriter {
  rewriteAll(transactions: readonly Transaction[]): Promise<boolean>;
}

export class LedgerStore {
  private transactions: Transaction[] = [];

  constructor(
    private readonly store: BlobStore,
    private readonly exporter: LedgerRewriter,
    private readonly blobKey: string = config.storage.keys.transactions
  ) {}

  async load(): Promise<void> {
    const raw = await this.store.get(this.blobKey);
    const decoded = raw === null ? null : decodeLedger(raw);

    if (raw !== null && decoded === null) {
      log.warn({ blob: this.blobKey }, 'Ledger blob could not be decoded; starting empty');
    }

    this.transactions = decoded ?? [];
    log.info({ transactions: this.transactions.length }, 'Ledger loaded');
  }

  async save(): Promise<boolean> {
    const encoded = encodeLedger(this.transactions);
    return persistBlob(this.store, this.blobKey, (store) => store.put(this.blobKey, encoded));
  }

  list(): readonly Transaction[] {
    return this.transactions;
  }

  listByEvent(eventId: string): Transaction[] {
    return this.transactions.filter((transaction) => transaction.eventId === eventId);
  }

  find(id: string): Transaction | undefined {
    return this.transactions.find((transaction) => transaction.id === id);
  }

  /**
   * Add to the end of the ledger without persisting. The sale commit uses
   * this so the ledger and stock change together before any write starts.
   */
  record(transaction: Transaction): void {
    this.transactions.push(transaction);
  }

  async append(transaction: Transaction): Promise<void> {
    this.record(transaction);
    await this.save();
  }

  /**
   * Swap the record with this id for a new one, keeping its position and id.
   * Resolves false, without writing anything, when the id is unknown.
   */
  async replace(id: string, transaction: Transaction): Promise<boolean> {
    const index = this.transactions.findIndex((candidate) => candidate.id === id);
    if (index < 0) {
      return false;
    }

    this.transactions[index] = { ...transaction, id };
    log.info({ transactionId: id }, 'Transaction replaced');

    await this.save();
    await this.exporter.rewriteAll(this.transactions);
    return true;
  }

  async deleteOne(id: string): Promise<boolean> {
    const index = this.transactions.findIndex((candidate) => candidate.id === id);
    if (index < 0) {
      return false;
    }

    this.transactions.splice(index, 1);
    log.info({ transactionId: id }, 'Transaction deleted');

    await this.save();
    await this.exporter.rewriteAll(this.transactions);
    return true;
  }

  async deleteAll(): Promise<number> {
    const removed = this.transactions.length;
    this.transactions = [];
    log.info({ removed }, 'Ledger cleared');

    await this.save();
    await this.exporter.rewriteAll(this.transactions);
    return removed;
  }
}
