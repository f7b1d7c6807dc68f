/**
 * Sale Session
 *
 * The in-progress sale: a basket of product quantities and the customer
 * profile that will be stamped on the transaction. Each caller owns its own
 * session; nothing here is shared or persisted.
 */

import { CustomerProfile, ProductLookup, defaultCustomerProfile } from '../../types/sales';

export const MAX_LINE_QUANTITY = 99;

export interface BasketLine {
  productId: string;
  quantity: number;
}

export class SaleSession {
  private readonly basket = new Map<string, number>();
  private profile: CustomerProfile = defaultCustomerProfile();

  getBasket(): ReadonlyMap<string, number> {
    return this.basket;
  }

  /**
   * Basket lines in the order products were first added
   */
  lines(): BasketLine[] {
    return Array.from(this.basket, ([productId, quantity]) => ({ productId, quantity }));
  }

  isEmpty(): boolean {
    return this.basket.size === 0;
  }

  /**
   * Set a line's quantity. Zero or less removes the line; anything else is
   * clamped to 1..MAX_LINE_QUANTITY.
   */
  setQuantity(productId: string, quantity: number): void {
    if (quantity <= 0) {
      this.basket.delete(productId);
      return;
    }
    this.basket.set(productId, Math.min(MAX_LINE_QUANTITY, Math.max(1, Math.floor(quantity))));
  }

  removeProduct(productId: string): void {
    this.basket.delete(productId);
  }

  /**
   * Tap behaviour of a product card: add one, or drop the line if present
   */
  toggleProduct(productId: string): void {
    if ((this.basket.get(productId) ?? 0) > 0) {
      this.basket.delete(productId);
    } else {
      this.basket.set(productId, 1);
    }
  }

  getProfile(): CustomerProfile {
    return { ...this.profile };
  }

  updateProfile(patch: Partial<CustomerProfile>): CustomerProfile {
    this.profile = { ...this.profile, ...patch };
    return this.getProfile();
  }

  /**
   * Empty the basket and restore the default profile
   */
  clear(): void {
    this.basket.clear();
    this.profile = defaultCustomerProfile();
  }

  /**
   * Basket value at catalog prices; lines for missing products count zero
   */
  totalPrice(products: ProductLookup): number {
    let total = 0;
    for (const [productId, quantity] of this.basket) {
      const product = products.findProduct(productId);
      if (product) {
        total += quantity * product.price;
      }
    }
    return total;
  }
}
