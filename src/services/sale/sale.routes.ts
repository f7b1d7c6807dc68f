import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';
import { CatalogService } from '../catalog/catalog.service';
import { EventService } from '../event/event.service';
import { SaleController } from './sale.controller';
import { SaleService } from './sale.service';
import { SaleSession } from './sale.session';
import {
  basketProductValidation,
  profileFieldsValidation,
  setQuantityValidation,
} from './sale.validation';

export interface SaleRouteDeps {
  session: SaleSession;
  catalog: CatalogService;
  events: EventService;
  sales: SaleService;
}

const controllerFor = (deps: SaleRouteDeps): SaleController =>
  new SaleController(deps.session, deps.catalog, deps.events, deps.sales);

/**
 * Routes for the register's in-progress sale
 */
export const createSessionRoutes = (deps: SaleRouteDeps): Router => {
  const router = Router();
  const controller = controllerFor(deps);

  // GET /session - Basket, total and customer profile
  router.get('/', (req: Request, res: Response, next: NextFunction) =>
    controller.getSession(req, res, next)
  );

  // PUT /session/basket/:productId - Set a line quantity
  router.put(
    '/basket/:productId',
    setQuantityValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.setQuantity(req, res, next)
  );

  // POST /session/basket/:productId/toggle - Add one or drop the line
  router.post(
    '/basket/:productId/toggle',
    basketProductValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.toggleLine(req, res, next)
  );

  // DELETE /session/basket/:productId - Drop a line
  router.delete(
    '/basket/:productId',
    basketProductValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.removeLine(req, res, next)
  );

  // PUT /session/profile - Update customer attributes
  router.put(
    '/profile',
    profileFieldsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.updateProfile(req, res, next)
  );

  // DELETE /session - Start over
  router.delete('/', (req: Request, res: Response, next: NextFunction) =>
    controller.reset(req, res, next)
  );

  return router;
};

export const createSaleRoutes = (deps: SaleRouteDeps): Router => {
  const router = Router();
  const controller = controllerFor(deps);

  // POST /sales - Commit the current session
  router.post('/', (req: Request, res: Response, next: NextFunction) =>
    controller.commit(req, res, next)
  );

  return router;
};
