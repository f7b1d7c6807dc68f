/**
 * Catalog Module
 *
 * Products, bundles and the stock rules a sale is checked against.
 */

export {
  CatalogService,
  CreateProductDTO,
  CreateBundleDTO,
  UpdateProductDTO,
} from './catalog.service';

export { CatalogController } from './catalog.controller';

export { createCatalogRoutes } from './catalog.routes';
