/**
 * Unit tests for CatalogService
 *
 * Stock rules for simple products and bundles, catalog management and
 * persistence through an in-memory blob store.
 */

import { CatalogService } from '../../../src/services/catalog/catalog.service';
import { MemoryBlobStore, decodeCatalog } from '../../../src/storage';
import { BundleProduct, SimpleProduct } from '../../../src/types/sales';
import { FailingBlobStore } from '../../helpers';

const simple = (overrides: Partial<SimpleProduct> & { id: string }): SimpleProduct => ({
  kind: 'simple',
  name: overrides.id,
  price: 100,
  imageRef: null,
  inventoryManaged: true,
  stock: 10,
  ...overrides,
});

const bundle = (overrides: Partial<BundleProduct> & { id: string }): BundleProduct => ({
  kind: 'bundle',
  name: overrides.id,
  price: 300,
  imageRef: null,
  inventoryManaged: true,
  componentIds: [],
  ...overrides,
});

const loadCatalog = async (
  products: Array<SimpleProduct | BundleProduct>,
  store: MemoryBlobStore = new MemoryBlobStore()
): Promise<{ catalog: CatalogService; store: MemoryBlobStore }> => {
  await store.put('products.json', JSON.stringify({ products }));
  const catalog = new CatalogService(store);
  await catalog.load(false);
  return { catalog, store };
};

describe('CatalogService', () => {
  describe('load', () => {
    it('should seed three unmanaged sample products when no catalog is stored', async () => {
      const catalog = new CatalogService(new MemoryBlobStore());

      await catalog.load(true);

      const products = catalog.listProducts();
      expect(products.map((p) => [p.name, p.price])).toEqual([
        ['Sample Book A', 500],
        ['Sample Book B', 700],
        ['Goods Set', 1200],
      ]);
      expect(products.every((p) => p.kind === 'simple' && !p.inventoryManaged)).toBe(true);
    });

    it('should start empty when seeding is disabled', async () => {
      const catalog = new CatalogService(new MemoryBlobStore());

      await catalog.load(false);

      expect(catalog.listProducts()).toHaveLength(0);
    });

    it('should restore a stored catalog in order', async () => {
      const { catalog } = await loadCatalog([simple({ id: 'a' }), simple({ id: 'b' })]);

      expect(catalog.listProducts().map((p) => p.id)).toEqual(['a', 'b']);
    });

    it('should fall back to defaults when the stored catalog is unreadable', async () => {
      const store = new MemoryBlobStore();
      await store.put('products.json', '{not json');
      const catalog = new CatalogService(store);

      await catalog.load(true);

      expect(catalog.listProducts()).toHaveLength(3);
    });
  });

  describe('availableStock', () => {
    it('should return null for unmanaged products', async () => {
      const { catalog } = await loadCatalog([simple({ id: 'a', inventoryManaged: false })]);

      expect(catalog.availableStock(simple({ id: 'a', inventoryManaged: false }))).toBeNull();
    });

    it('should return the stock of a managed simple product', async () => {
      const a = simple({ id: 'a', stock: 4 });
      const { catalog } = await loadCatalog([a]);

      expect(catalog.availableStock(a)).toBe(4);
    });

    it('should return the minimum over managed components of a bundle', async () => {
      const x = bundle({ id: 'x', componentIds: ['a', 'b', 'c'] });
      const { catalog } = await loadCatalog([
        simple({ id: 'a', stock: 5 }),
        simple({ id: 'b', stock: 2 }),
        simple({ id: 'c', stock: 0, inventoryManaged: false }),
        x,
      ]);

      expect(catalog.availableStock(x)).toBe(2);
    });

    it('should return 0 for a managed bundle without managed components', async () => {
      const x = bundle({ id: 'x', componentIds: ['a', 'missing'] });
      const { catalog } = await loadCatalog([simple({ id: 'a', inventoryManaged: false }), x]);

      expect(catalog.availableStock(x)).toBe(0);
    });

    it('should ignore component ids that no longer resolve', async () => {
      const x = bundle({ id: 'x', componentIds: ['missing', 'a'] });
      const { catalog } = await loadCatalog([simple({ id: 'a', stock: 7 }), x]);

      expect(catalog.availableStock(x)).toBe(7);
    });
  });

  describe('canSell', () => {
    it('should always allow unmanaged products', async () => {
      const a = simple({ id: 'a', inventoryManaged: false, stock: 0 });
      const { catalog } = await loadCatalog([a]);

      expect(catalog.canSell(a, 50)).toBe(true);
    });

    it('should compare quantity against stock for managed simple products', async () => {
      const a = simple({ id: 'a', stock: 10 });
      const { catalog } = await loadCatalog([a]);

      expect(catalog.canSell(a, 10)).toBe(true);
      expect(catalog.canSell(a, 11)).toBe(false);
    });

    it('should require every managed component to cover the quantity', async () => {
      const x = bundle({ id: 'x', componentIds: ['a', 'b'] });
      const { catalog } = await loadCatalog([
        simple({ id: 'a', stock: 10 }),
        simple({ id: 'b', stock: 3 }),
        x,
      ]);

      expect(catalog.canSell(x, 3)).toBe(true);
      expect(catalog.canSell(x, 4)).toBe(false);
    });

    it('should allow a managed bundle whose components are all unmanaged', async () => {
      const x = bundle({ id: 'x', componentIds: ['a'] });
      const { catalog } = await loadCatalog([simple({ id: 'a', inventoryManaged: false }), x]);

      expect(catalog.canSell(x, 5)).toBe(true);
    });
  });

  describe('decrementStock', () => {
    it('should reduce a managed simple product and floor at zero', async () => {
      const a = simple({ id: 'a', stock: 2 });
      const { catalog } = await loadCatalog([a]);

      catalog.decrementStock(a, 5);

      expect(catalog.findProduct('a')).toMatchObject({ stock: 0 });
    });

    it('should reduce only the managed components of a bundle', async () => {
      const x = bundle({ id: 'x', componentIds: ['a', 'b'] });
      const { catalog } = await loadCatalog([
        simple({ id: 'a', stock: 10 }),
        simple({ id: 'b', stock: 10, inventoryManaged: false }),
        x,
      ]);

      catalog.decrementStock(x, 3);

      expect(catalog.findProduct('a')).toMatchObject({ stock: 7 });
      expect(catalog.findProduct('b')).toMatchObject({ stock: 10 });
    });

    it('should skip a removed component when selling a bundle', async () => {
      const x = bundle({ id: 'x', componentIds: ['a', 'b'] });
      const { catalog } = await loadCatalog([
        simple({ id: 'a', stock: 3 }),
        simple({ id: 'b', stock: 10 }),
        x,
      ]);
      await catalog.removeProduct('a');

      expect(catalog.canSell(x, 10)).toBe(true);
      expect(catalog.canSell(x, 11)).toBe(false);
      expect(() => catalog.decrementStock(x, 2)).not.toThrow();
      expect(catalog.findProduct('b')).toMatchObject({ stock: 8 });
      expect(catalog.findProduct('a')).toBeUndefined();
    });

    it('should leave stock alone for unmanaged products', async () => {
      const a = simple({ id: 'a', stock: 4, inventoryManaged: false });
      const { catalog } = await loadCatalog([a]);

      catalog.decrementStock(a, 3);

      expect(catalog.findProduct('a')).toMatchObject({ stock: 4 });
    });
  });

  describe('management', () => {
    it('should add a product and persist the catalog', async () => {
      const { catalog, store } = await loadCatalog([]);

      const product = await catalog.addProduct({
        name: 'Poster',
        price: 800,
        inventoryManaged: true,
        stock: 12,
      });

      expect(product).toMatchObject({ kind: 'simple', name: 'Poster', stock: 12, imageRef: null });
      const raw = await store.get('products.json');
      expect(raw === null ? null : decodeCatalog(raw)).toEqual([product]);
    });

    it('should add a bundle with its components', async () => {
      const { catalog } = await loadCatalog([simple({ id: 'a', name: 'Book A' })]);

      const created = await catalog.addBundle({ name: 'Set', price: 900, componentIds: ['a'] });

      expect(created).toMatchObject({ kind: 'bundle', componentIds: ['a'], inventoryManaged: false });
      expect(catalog.componentNames(created)).toEqual(['Book A']);
    });

    it('should edit a product without changing its kind', async () => {
      const { catalog } = await loadCatalog([simple({ id: 'a', stock: 3 })]);

      const updated = await catalog.updateProduct('a', { price: 250, componentIds: ['b'] });

      expect(updated).toEqual(simple({ id: 'a', stock: 3, price: 250 }));
    });

    it('should resolve null when editing an unknown product', async () => {
      const { catalog } = await loadCatalog([]);

      await expect(catalog.updateProduct('nope', { price: 1 })).resolves.toBeNull();
    });

    it('should leave bundles pointing at a removed product', async () => {
      const x = bundle({ id: 'x', componentIds: ['a', 'b'] });
      const { catalog } = await loadCatalog([
        simple({ id: 'a', name: 'Book A' }),
        simple({ id: 'b', name: 'Book B' }),
        x,
      ]);

      await expect(catalog.removeProduct('a')).resolves.toBe(true);
      await expect(catalog.removeProduct('a')).resolves.toBe(false);

      expect(catalog.findProduct('x')).toMatchObject({ componentIds: ['a', 'b'] });
      expect(catalog.componentNames(x)).toEqual(['Book B']);
    });

    it('should keep in-memory changes when the store rejects writes', async () => {
      const catalog = new CatalogService(new FailingBlobStore());
      await catalog.load(false);

      await catalog.addProduct({ name: 'Badge', price: 300 });

      expect(catalog.listProducts().map((p) => p.name)).toEqual(['Badge']);
      await expect(catalog.save()).resolves.toBe(false);
    });
  });
});
