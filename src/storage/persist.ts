import { createServiceLogger, persistenceFailuresTotal } from '../observability';
import { BlobStore } from './blobStore';

const log = createServiceLogger('storage');

/**
 * Write a blob, tolerating failure.
 *
 * In-memory state is already updated when this runs and is never rolled back;
 * a failed write is logged and counted, and the caller carries on. Resolves
 * whether the write reached the store.
 */
export async function persistBlob(
  store: BlobStore,
  key: string,
  write: (store: BlobStore) => Promise<void>
): Promise<boolean> {
  try {
    await write(store);
    return true;
  } catch (error) {
    persistenceFailuresTotal.inc({ blob: key });
    log.warn({ err: error, blob: key, driver: store.driver }, 'Blob write failed; keeping in-memory state');
    return false;
  }
}
