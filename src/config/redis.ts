/**
 * Redis connection for the `redis` blob store driver.
 *
 * One client per process, created on first use and connected explicitly at
 * start-up. Blob keys are namespaced by the store, not by the client.
 */

import Redis from 'ioredis';
import { config } from './index';
import { logger } from '../observability';

const MAX_RECONNECT_ATTEMPTS = 3;

let redisClient: Redis | null = null;

const createRedisClient = (): Redis => {
  const client = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    connectTimeout: config.redis.connectTimeout,
    maxRetriesPerRequest: config.redis.maxRetriesPerRequest,
    lazyConnect: true,
    retryStrategy: (attempt: number) => {
      if (attempt > MAX_RECONNECT_ATTEMPTS) {
        logger.error({ attempt }, 'Redis reconnect attempts exhausted');
        return null;
      }
      logger.warn({ attempt }, 'Redis reconnecting');
      return Math.min(attempt * 100, 3000);
    },
  });

  client.on('error', (err) => logger.error({ err }, 'Redis client error'));
  client.on('ready', () =>
    logger.info({ host: config.redis.host, port: config.redis.port }, 'Redis ready')
  );
  client.on('end', () => logger.info('Redis connection closed'));

  return client;
};

export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = createRedisClient();
  }
  return redisClient;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready' || client.status === 'connecting') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (!redisClient) {
    return;
  }
  const client = redisClient;
  redisClient = null;
  await client.quit();
};

export const isRedisConnected = (): boolean => redisClient?.status === 'ready';
