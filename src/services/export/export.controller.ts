import { Request, Response, NextFunction } from 'express';

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { LedgerStore } from '../ledger/ledger.store';
import { ExportService } from './export.service';

export class ExportController {
  constructor(
    private readonly exporter: ExportService,
    private readonly ledger: LedgerStore
  ) {}

  /**
   * Download the export as CSV
   * GET /export
   */
  async download(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const text = await this.exporter.read();
      if (text === null) {
        throw ApiError.notFound('Export');
      }

      res
        .status(200)
        .attachment(config.export.downloadFilename)
        .type('text/csv; charset=utf-8')
        .send(text);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Regenerate the export from the ledger as it stands
   * POST /export/rebuild
   */
  async rebuild(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const transactions = this.ledger.list();
      const written = await this.exporter.rewriteAll(transactions);

      res.status(200).json({
        success: true,
        data: { written, transactions: transactions.length },
      });
    } catch (error) {
      next(error);
    }
  }
}
