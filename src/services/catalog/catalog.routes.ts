import { Router, Request, Response, NextFunction } from 'express';

import { validateRequest } from '../../middlewares/validateRequest';
import { CatalogController } from './catalog.controller';
import { CatalogService } from './catalog.service';
import {
  createBundleValidation,
  createProductValidation,
  productIdValidation,
  updateProductValidation,
} from './catalog.validation';

export const createCatalogRoutes = (catalog: CatalogService): Router => {
  const router = Router();
  const controller = new CatalogController(catalog);

  // GET /products - List the catalog
  router.get('/', (req: Request, res: Response, next: NextFunction) =>
    controller.list(req, res, next)
  );

  // POST /products - Add a simple product
  router.post(
    '/',
    createProductValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.create(req, res, next)
  );

  // POST /products/bundles - Add a bundle
  router.post(
    '/bundles',
    createBundleValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.createBundle(req, res, next)
  );

  // GET /products/:id
  router.get(
    '/:id',
    productIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getById(req, res, next)
  );

  // PATCH /products/:id - Edit a product
  router.patch(
    '/:id',
    updateProductValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.update(req, res, next)
  );

  // DELETE /products/:id - Remove a product
  router.delete(
    '/:id',
    productIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.remove(req, res, next)
  );

  return router;
};
