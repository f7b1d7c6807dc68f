/**
 * Catalog Service
 *
 * Owns the product list and answers the stock questions a sale depends on.
 * Bundles have no stock of their own: availability and decrements go through
 * their inventory-managed components. Component ids that no longer resolve
 * are skipped, never treated as errors.
 */

import { v4 as uuid } from 'uuid';

import { config } from '../../config';
import { createServiceLogger } from '../../observability';
import { BlobStore, decodeCatalog, encodeCatalog, persistBlob } from '../../storage';
import { BundleProduct, Product, SimpleProduct, isBundle } from '../../types/sales';

const log = createServiceLogger('catalog');

export interface CreateProductDTO {
  name: string;
  price: number;
  imageRef?: string | null;
  inventoryManaged?: boolean;
  stock?: number;
}

export interface CreateBundleDTO {
  name: string;
  price: number;
  componentIds: string[];
  imageRef?: string | null;
  inventoryManaged?: boolean;
}

export interface UpdateProductDTO {
  name?: string;
  price?: number;
  imageRef?: string | null;
  inventoryManaged?: boolean;
  /** Simple products only */
  stock?: number;
  /** Bundles only */
  componentIds?: string[];
}

const DEFAULT_PRODUCTS: ReadonlyArray<Pick<SimpleProduct, 'name' | 'price'>> = [
  { name: 'Sample Book A', price: 500 },
  { name: 'Sample Book B', price: 700 },
  { name: 'Goods Set', price: 1200 },
];

/**
 * Stock a component contributes to its bundle. A bundle nested inside another
 * bundle carries no stock and counts as empty.
 */
const componentStock = (component: Product): number =>
  component.kind === 'simple' ? component.stock : 0;

export class CatalogService {
  private products: Product[] = [];

  constructor(
    private readonly store: BlobStore,
    private readonly blobKey: string = config.storage.keys.products
  ) {}

  /**
   * Load the saved catalog. A missing or unreadable blob yields the sample
   * products when seeding is enabled, otherwise an empty catalog.
   */
  async load(seedDefaults: boolean = config.catalog.seedDefaults): Promise<void> {
    const raw = await this.store.get(this.blobKey);
    const decoded = raw === null ? null : decodeCatalog(raw);

    if (raw !== null && decoded === null) {
      log.warn({ blob: this.blobKey }, 'Catalog blob could not be decoded; starting fresh');
    }

    if (decoded) {
      this.products = decoded;
    } else {
      this.products = seedDefaults
        ? DEFAULT_PRODUCTS.map(({ name, price }) => this.buildSimple({ name, price }))
        : [];
    }

    log.info({ products: this.products.length }, 'Catalog loaded');
  }

  async save(): Promise<boolean> {
    const encoded = encodeCatalog(this.products);
    return persistBlob(this.store, this.blobKey, (store) => store.put(this.blobKey, encoded));
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  listProducts(): readonly Product[] {
    return this.products;
  }

  /**
   * First product with the id, if any
   */
  findProduct(id: string): Product | undefined {
    return this.products.find((product) => product.id === id);
  }

  /**
   * Names of the bundle's components that still exist, in bundle order
   */
  componentNames(bundle: BundleProduct): string[] {
    return bundle.componentIds.flatMap((id) => {
      const component = this.findProduct(id);
      return component ? [component.name] : [];
    });
  }

  private managedComponents(bundle: BundleProduct): Product[] {
    return bundle.componentIds.flatMap((id) => {
      const component = this.findProduct(id);
      return component && component.inventoryManaged ? [component] : [];
    });
  }

  // ===========================================================================
  // Stock
  // ===========================================================================

  /**
   * Units that can be sold right now, or null when the product is not
   * inventory managed.
   *
   * A bundle offers the minimum stock over its managed components, or 0 when
   * none of its components are managed.
   */
  availableStock(product: Product): number | null {
    if (!product.inventoryManaged) {
      return null;
    }
    if (!isBundle(product)) {
      return product.stock;
    }
    const stocks = this.managedComponents(product).map(componentStock);
    return stocks.length > 0 ? Math.min(...stocks) : 0;
  }

  canSell(product: Product, quantity: number): boolean {
    if (!product.inventoryManaged) {
      return true;
    }
    if (!isBundle(product)) {
      return product.stock >= quantity;
    }
    return this.managedComponents(product).every(
      (component) => componentStock(component) >= quantity
    );
  }

  /**
   * Remove sold units from stock, flooring at zero.
   * Only called after canSell has approved the quantity.
   */
  decrementStock(product: Product, quantity: number): void {
    if (!product.inventoryManaged) {
      return;
    }

    const targets = isBundle(product)
      ? this.managedComponents(product).map((component) => component.id)
      : [product.id];

    for (const id of targets) {
      const index = this.products.findIndex((candidate) => candidate.id === id);
      const target = index >= 0 ? this.products[index] : undefined;
      if (target && target.kind === 'simple' && target.inventoryManaged) {
        this.products[index] = { ...target, stock: Math.max(0, target.stock - quantity) };
      }
    }
  }

  // ===========================================================================
  // Management
  // ===========================================================================

  private buildSimple(dto: CreateProductDTO): SimpleProduct {
    return {
      id: uuid(),
      kind: 'simple',
      name: dto.name,
      price: dto.price,
      imageRef: dto.imageRef ?? null,
      inventoryManaged: dto.inventoryManaged ?? false,
      stock: dto.stock ?? 0,
    };
  }

  async addProduct(dto: CreateProductDTO): Promise<SimpleProduct> {
    const product = this.buildSimple(dto);
    this.products.push(product);
    log.debug({ productId: product.id, name: product.name }, 'Product added');
    await this.save();
    return product;
  }

  async addBundle(dto: CreateBundleDTO): Promise<BundleProduct> {
    const bundle: BundleProduct = {
      id: uuid(),
      kind: 'bundle',
      name: dto.name,
      price: dto.price,
      imageRef: dto.imageRef ?? null,
      inventoryManaged: dto.inventoryManaged ?? false,
      componentIds: [...dto.componentIds],
    };
    this.products.push(bundle);
    log.debug({ productId: bundle.id, components: bundle.componentIds.length }, 'Bundle added');
    await this.save();
    return bundle;
  }

  /**
   * Apply a partial edit. Fields that do not belong to the product's kind are
   * ignored. Resolves null when the id is unknown.
   */
  async updateProduct(id: string, patch: UpdateProductDTO): Promise<Product | null> {
    const index = this.products.findIndex((product) => product.id === id);
    if (index < 0) {
      return null;
    }

    const current = this.products[index];
    const shared = {
      name: patch.name ?? current.name,
      price: patch.price ?? current.price,
      imageRef: patch.imageRef !== undefined ? patch.imageRef : current.imageRef,
      inventoryManaged: patch.inventoryManaged ?? current.inventoryManaged,
    };

    const updated: Product =
      current.kind === 'bundle'
        ? { ...current, ...shared, componentIds: patch.componentIds ?? current.componentIds }
        : { ...current, ...shared, stock: patch.stock ?? current.stock };

    this.products[index] = updated;
    await this.save();
    return updated;
  }

  /**
   * Hard delete. Bundles and past sales that reference the product keep the
   * dangling id.
   */
  async removeProduct(id: string): Promise<boolean> {
    const index = this.products.findIndex((product) => product.id === id);
    if (index < 0) {
      return false;
    }
    this.products.splice(index, 1);
    log.debug({ productId: id }, 'Product removed');
    await this.save();
    return true;
  }
}
