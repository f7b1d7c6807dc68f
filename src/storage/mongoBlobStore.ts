import { connectDatabase, disconnectDatabase, getDatabaseStatus } from '../config/database';
import { BlobRecord } from '../models';
import { BlobStore } from './blobStore';

/**
 * One document per key in the `blobs` collection.
 */
export class MongoBlobStore implements BlobStore {
  readonly driver = 'mongo' as const;

  async connect(): Promise<void> {
    await connectDatabase();
  }

  async disconnect(): Promise<void> {
    await disconnectDatabase();
  }

  isReady(): boolean {
    return getDatabaseStatus().connected;
  }

  async get(key: string): Promise<string | null> {
    const record = await BlobRecord.findOne({ key }).lean();
    return record ? record.value : null;
  }

  async put(key: string, value: string): Promise<void> {
    await BlobRecord.updateOne({ key }, { $set: { value } }, { upsert: true });
  }

  async append(key: string, value: string): Promise<void> {
    // Aggregation-pipeline update so the concatenation happens server side
    await BlobRecord.updateOne(
      { key },
      [{ $set: { value: { $concat: [{ $ifNull: ['$value', ''] }, value] } } }],
      { upsert: true }
    );
  }
}
