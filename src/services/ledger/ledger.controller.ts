/**
 * Transaction Controller
 *
 * Browses and corrects recorded sales. Amounts are shown at current catalog
 * prices; items whose product was deleted show no name and count zero.
 */

import { Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';

import { ApiError } from '../../middlewares/errorHandler';
import { Transaction } from '../../types/sales';
import { CatalogService } from '../catalog/catalog.service';
import { EventService } from '../event/event.service';
import { SummaryService } from '../summary/summary.service';
import { applyTransactionEdit, TransactionEdit } from './ledger.edit';
import { LedgerStore } from './ledger.store';

export interface TransactionRouteDeps {
  ledger: LedgerStore;
  catalog: CatalogService;
  events: EventService;
  summary: SummaryService;
}

export class TransactionController {
  constructor(private readonly deps: TransactionRouteDeps) {}

  private toTransactionDTO(transaction: Transaction) {
    const { catalog, events, summary } = this.deps;

    return {
      ...transaction,
      eventName: events.eventName(transaction.eventId),
      items: transaction.items.map((item) => {
        const product = catalog.findProduct(item.productId);
        return {
          ...item,
          productName: product?.name ?? null,
          unitPrice: product?.price ?? null,
          amount: product ? product.price * item.quantity : 0,
        };
      }),
      total: summary.transactionTotal(transaction),
    };
  }

  private requireTransaction(id: string): Transaction {
    const transaction = this.deps.ledger.find(id);
    if (!transaction) {
      throw ApiError.notFound('Transaction');
    }
    return transaction;
  }

  /**
   * GET /transactions?eventId=
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { eventId } = matchedData(req, { locations: ['query'] });
      const transactions =
        typeof eventId === 'string' ? this.deps.ledger.listByEvent(eventId) : this.deps.ledger.list();

      res.status(200).json({
        success: true,
        data: {
          transactions: transactions.map((transaction) => this.toTransactionDTO(transaction)),
          count: transactions.length,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /transactions/:id
   */
  async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const transaction = this.requireTransaction(req.params.id);

      res.status(200).json({ success: true, data: { transaction: this.toTransactionDTO(transaction) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Correct item quantities or customer attributes of a recorded sale.
   * Stock is not adjusted.
   * PUT /transactions/:id
   */
  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const current = this.requireTransaction(req.params.id);
      const edit: TransactionEdit = matchedData(req, { locations: ['body'] });

      const result = applyTransactionEdit(current, edit);
      if (!result.ok) {
        throw ApiError.validationError('Unknown sale items', {
          items: result.unknownItemIds.map((id) => `Item ${id} is not part of this sale`),
        });
      }

      await this.deps.ledger.replace(current.id, result.transaction);
      const updated = this.requireTransaction(current.id);

      res.status(200).json({ success: true, data: { transaction: this.toTransactionDTO(updated) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /transactions/:id
   */
  async remove(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const removed = await this.deps.ledger.deleteOne(req.params.id);
      if (!removed) {
        throw ApiError.notFound('Transaction');
      }

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /transactions
   */
  async removeAll(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const removed = await this.deps.ledger.deleteAll();

      res.status(200).json({ success: true, data: { removed } });
    } catch (error) {
      next(error);
    }
  }
}
