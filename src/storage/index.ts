import { config } from '../config';
import { BlobStore, MemoryBlobStore } from './blobStore';
import { FileBlobStore } from './fileBlobStore';
import { MongoBlobStore } from './mongoBlobStore';
import { RedisBlobStore } from './redisBlobStore';

export { BlobStore, MemoryBlobStore } from './blobStore';
export { FileBlobStore } from './fileBlobStore';
export { RedisBlobStore } from './redisBlobStore';
export { MongoBlobStore } from './mongoBlobStore';
export { persistBlob } from './persist';
export * from './codec';

/**
 * Build the blob store selected by STORAGE_DRIVER
 */
export const createBlobStore = (storage = config.storage): BlobStore => {
  switch (storage.driver) {
    case 'file':
      return new FileBlobStore(storage.dataDir);
    case 'redis':
      return new RedisBlobStore(storage.redisKeyPrefix);
    case 'mongo':
      return new MongoBlobStore();
    case 'memory':
      return new MemoryBlobStore();
  }
};
