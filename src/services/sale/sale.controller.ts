import { Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';

import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode } from '../../types/errors';
import { CustomerProfile } from '../../types/sales';
import { CatalogService } from '../catalog/catalog.service';
import { EventService } from '../event/event.service';
import { SaleOutcome, SaleService } from './sale.service';
import { SaleSession } from './sale.session';

type Rejection = Extract<SaleOutcome, { status: 'rejected' }>;

export class SaleController {
  constructor(
    private readonly session: SaleSession,
    private readonly catalog: CatalogService,
    private readonly events: EventService,
    private readonly sales: SaleService
  ) {}

  private sessionView() {
    const lines = this.session.lines().map(({ productId, quantity }) => {
      const product = this.catalog.findProduct(productId);
      return {
        productId,
        productName: product?.name ?? null,
        unitPrice: product?.price ?? 0,
        quantity,
        subtotal: product ? product.price * quantity : 0,
      };
    });

    return {
      selectedEvent: this.events.getSelectedEvent(),
      lines,
      total: this.session.totalPrice(this.catalog),
      profile: this.session.getProfile(),
    };
  }

  private rejectionError(rejection: Rejection): ApiError {
    switch (rejection.reason) {
      case 'NO_EVENT_SELECTED':
        return new ApiError(ErrorCode.NO_EVENT_SELECTED, 'Select an event before recording a sale');
      case 'EMPTY_BASKET':
        return new ApiError(ErrorCode.EMPTY_BASKET, 'The basket is empty');
      case 'INSUFFICIENT_STOCK': {
        const name = rejection.productId
          ? this.catalog.findProduct(rejection.productId)?.name
          : undefined;
        return new ApiError(
          ErrorCode.INSUFFICIENT_STOCK,
          name ? `Insufficient stock for ${name}` : 'Insufficient stock'
        );
      }
    }
  }

  /**
   * GET /session
   */
  async getSession(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.status(200).json({ success: true, data: this.sessionView() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Set the quantity of one basket line; zero or less removes it
   * PUT /session/basket/:productId
   */
  async setQuantity(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { productId } = req.params;
      if (!this.catalog.findProduct(productId)) {
        throw ApiError.notFound('Product');
      }

      this.session.setQuantity(productId, req.body.quantity);

      res.status(200).json({ success: true, data: this.sessionView() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Add one of a product, or drop its line when already in the basket
   * POST /session/basket/:productId/toggle
   */
  async toggleLine(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { productId } = req.params;
      if (!this.catalog.findProduct(productId)) {
        throw ApiError.notFound('Product');
      }

      this.session.toggleProduct(productId);

      res.status(200).json({ success: true, data: this.sessionView() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /session/basket/:productId
   */
  async removeLine(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      this.session.removeProduct(req.params.productId);

      res.status(200).json({ success: true, data: this.sessionView() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /session/profile
   */
  async updateProfile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const patch: Partial<CustomerProfile> = matchedData(req, { locations: ['body'] });
      this.session.updateProfile(patch);

      res.status(200).json({ success: true, data: this.sessionView() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Empty the basket and restore the default profile
   * DELETE /session
   */
  async reset(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      this.session.clear();

      res.status(200).json({ success: true, data: this.sessionView() });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Commit the session as a sale
   * POST /sales
   */
  async commit(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const total = this.session.totalPrice(this.catalog);
      const outcome = await this.sales.commitSale(this.session);
      if (outcome.status === 'rejected') {
        throw this.rejectionError(outcome);
      }

      res.status(201).json({
        success: true,
        data: {
          transaction: outcome.transaction,
          total,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
