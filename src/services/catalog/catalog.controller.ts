import { Request, Response, NextFunction } from 'express';

import { ApiError } from '../../middlewares/errorHandler';
import { Product } from '../../types/sales';
import { CatalogService, UpdateProductDTO } from './catalog.service';

interface ProductDTO {
  id: string;
  kind: Product['kind'];
  name: string;
  price: number;
  imageRef: string | null;
  inventoryManaged: boolean;
  stock?: number;
  componentIds?: string[];
  componentNames?: string[];
  availableStock: number | null;
}

export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  private toProductDTO(product: Product): ProductDTO {
    const dto: ProductDTO = {
      id: product.id,
      kind: product.kind,
      name: product.name,
      price: product.price,
      imageRef: product.imageRef,
      inventoryManaged: product.inventoryManaged,
      availableStock: this.catalog.availableStock(product),
    };
    if (product.kind === 'bundle') {
      dto.componentIds = product.componentIds;
      dto.componentNames = this.catalog.componentNames(product);
    } else {
      dto.stock = product.stock;
    }
    return dto;
  }

  /**
   * List products in catalog order
   * GET /products
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.status(200).json({
        success: true,
        data: {
          products: this.catalog.listProducts().map((product) => this.toProductDTO(product)),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /products/:id
   */
  async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const product = this.catalog.findProduct(req.params.id);
      if (!product) {
        throw ApiError.notFound('Product');
      }

      res.status(200).json({ success: true, data: { product: this.toProductDTO(product) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Create a simple product
   * POST /products
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { name, price, imageRef, inventoryManaged, stock } = req.body;

      const product = await this.catalog.addProduct({
        name,
        price,
        imageRef,
        inventoryManaged,
        stock,
      });

      res.status(201).json({ success: true, data: { product: this.toProductDTO(product) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Create a bundle of existing products
   * POST /products/bundles
   */
  async createBundle(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { name, price, imageRef, inventoryManaged, componentIds } = req.body;

      const bundle = await this.catalog.addBundle({
        name,
        price,
        imageRef,
        inventoryManaged,
        componentIds,
      });

      res.status(201).json({ success: true, data: { product: this.toProductDTO(bundle) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /products/:id
   */
  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { name, price, imageRef, inventoryManaged, stock, componentIds } = req.body;
      const patch: UpdateProductDTO = { name, price, imageRef, inventoryManaged, stock, componentIds };

      const product = await this.catalog.updateProduct(req.params.id, patch);
      if (!product) {
        throw ApiError.notFound('Product');
      }

      res.status(200).json({ success: true, data: { product: this.toProductDTO(product) } });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /products/:id
   */
  async remove(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const removed = await this.catalog.removeProduct(req.params.id);
      if (!removed) {
        throw ApiError.notFound('Product');
      }

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }
}
