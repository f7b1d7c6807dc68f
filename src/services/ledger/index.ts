/**
 * Ledger Module
 *
 * The ordered record of committed sales and the HTTP surface for browsing
 * and correcting it.
 */

export { LedgerStore, LedgerRewriter } from './ledger.store';
export { applyTransactionEdit, TransactionEdit, ItemQuantityEdit, EditResult } from './ledger.edit';
export { TransactionController, TransactionRouteDeps } from './ledger.controller';
export { createTransactionRoutes } from './ledger.routes';
