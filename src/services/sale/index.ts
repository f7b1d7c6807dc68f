/**
 * Sale Module
 *
 * Basket session, basket validation, stock decrements and the commit that
 * ties them to the ledger.
 */

export { SaleService, SaleOutcome, SaleServiceDeps } from './sale.service';
export { SaleSession, BasketLine, MAX_LINE_QUANTITY } from './sale.session';
export { validateBasket, SaleRejectionReason, BasketCheck, StockChecker } from './sale.validator';
export { applyStockDecrements, StockDecrementer } from './stock.mutator';
export { SaleController } from './sale.controller';
export { createSessionRoutes, createSaleRoutes, SaleRouteDeps } from './sale.routes';
