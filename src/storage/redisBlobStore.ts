import { connectRedis, disconnectRedis, getRedisClient, isRedisConnected } from '../config/redis';
import { BlobStore } from './blobStore';

/**
 * One string key per blob, namespaced by a prefix.
 */
export class RedisBlobStore implements BlobStore {
  readonly driver = 'redis' as const;

  constructor(private readonly keyPrefix: string) {}

  async connect(): Promise<void> {
    await connectRedis();
  }

  async disconnect(): Promise<void> {
    await disconnectRedis();
  }

  isReady(): boolean {
    return isRedisConnected();
  }

  private redisKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async get(key: string): Promise<string | null> {
    return getRedisClient().get(this.redisKey(key));
  }

  async put(key: string, value: string): Promise<void> {
    await getRedisClient().set(this.redisKey(key), value);
  }

  async append(key: string, value: string): Promise<void> {
    await getRedisClient().append(this.redisKey(key), value);
  }
}
