/**
 * Unit tests for FileBlobStore
 *
 * Runs against a temporary directory.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { FileBlobStore } from '../../../src/storage';

describe('FileBlobStore', () => {
  let dataDir: string;
  let store: FileBlobStore;

  beforeEach(async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-store-'));
    dataDir = path.join(root, 'data');
    store = new FileBlobStore(dataDir);
  });

  afterEach(async () => {
    await fs.rm(path.dirname(dataDir), { recursive: true, force: true });
  });

  it('should create the data directory on connect', async () => {
    expect(store.isReady()).toBe(false);

    await store.connect();

    expect(store.isReady()).toBe(true);
    await expect(fs.stat(dataDir)).resolves.toBeDefined();
  });

  it('should resolve null for a key never written', async () => {
    await store.connect();

    await expect(store.get('products.json')).resolves.toBeNull();
  });

  it('should reject read errors other than a missing file', async () => {
    await store.connect();
    await fs.mkdir(path.join(dataDir, 'products.json'));

    await expect(store.get('products.json')).rejects.toMatchObject({ code: 'EISDIR' });
  });

  it('should replace the whole value on put', async () => {
    await store.connect();

    await store.put('products.json', 'first');
    await store.put('products.json', 'second');

    await expect(store.get('products.json')).resolves.toBe('second');
    await expect(fs.readdir(dataDir)).resolves.toEqual(['products.json']);
  });

  it('should append to a file, creating it when absent', async () => {
    await store.connect();

    await store.append('sales.csv', 'header\n');
    await store.append('sales.csv', 'row\n');

    await expect(store.get('sales.csv')).resolves.toBe('header\nrow\n');
  });

  it('should keep keys inside the data directory', () => {
    expect(store.resolve('../outside.json')).toBe(path.join(dataDir, 'outside.json'));
  });
});
