import { StorageDriver } from '../config';

/**
 * Keyed blob persistence used by the catalog, event registry, ledger and
 * export surface. Values are opaque UTF-8 strings.
 */
export interface BlobStore {
  readonly driver: StorageDriver;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isReady(): boolean;
  /** Resolves null when nothing has been stored under the key */
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
  /** Appends to the stored value, creating it when absent */
  append(key: string, value: string): Promise<void>;
}

/**
 * In-process store. Backs the test suite and the `memory` driver.
 */
export class MemoryBlobStore implements BlobStore {
  readonly driver = 'memory' as const;
  private readonly blobs = new Map<string, string>();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  isReady(): boolean {
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.blobs.get(key) ?? null;
  }

  async put(key: string, value: string): Promise<void> {
    this.blobs.set(key, value);
  }

  async append(key: string, value: string): Promise<void> {
    this.blobs.set(key, (this.blobs.get(key) ?? '') + value);
  }
}
