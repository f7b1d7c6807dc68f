import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';
import { TransactionController, TransactionRouteDeps } from './ledger.controller';
import {
  listTransactionsValidation,
  transactionIdValidation,
  updateTransactionValidation,
} from './ledger.validation';

export const createTransactionRoutes = (deps: TransactionRouteDeps): Router => {
  const router = Router();
  const controller = new TransactionController(deps);

  // GET /transactions - Ledger, optionally for one event
  router.get(
    '/',
    listTransactionsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.list(req, res, next)
  );

  // DELETE /transactions - Clear the ledger
  router.delete('/', (req: Request, res: Response, next: NextFunction) =>
    controller.removeAll(req, res, next)
  );

  // GET /transactions/:id
  router.get(
    '/:id',
    transactionIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getById(req, res, next)
  );

  // PUT /transactions/:id - Correct a recorded sale
  router.put(
    '/:id',
    updateTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.update(req, res, next)
  );

  // DELETE /transactions/:id
  router.delete(
    '/:id',
    transactionIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.remove(req, res, next)
  );

  return router;
};
