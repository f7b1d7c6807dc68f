import { Router, Request, Response, NextFunction } from 'express';

import { LedgerStore } from '../ledger/ledger.store';
import { ExportController } from './export.controller';
import { ExportService } from './export.service';

export const createExportRoutes = (exporter: ExportService, ledger: LedgerStore): Router => {
  const router = Router();
  const controller = new ExportController(exporter, ledger);

  // GET /export - CSV download
  router.get('/', (req: Request, res: Response, next: NextFunction) =>
    controller.download(req, res, next)
  );

  // POST /export/rebuild - Rewrite the export from the ledger
  router.post('/rebuild', (req: Request, res: Response, next: NextFunction) =>
    controller.rebuild(req, res, next)
  );

  return router;
};
