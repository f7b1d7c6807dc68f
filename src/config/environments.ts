/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, STORAGE_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const dir = STORAGE_CONFIG.dataDir;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// STORAGE CONFIGURATION
// =============================================================================

export type StorageDriver = 'file' | 'redis' | 'mongo' | 'memory';

const STORAGE_DRIVERS: readonly StorageDriver[] = ['file', 'redis', 'mongo', 'memory'];

const parseStorageDriver = (value: string | undefined): StorageDriver => {
  const found = STORAGE_DRIVERS.find((driver) => driver === value);
  if (found) {
    return found;
  }
  return isTest ? 'memory' : 'file';
};

/**
 * Blob store settings
 *
 * The key names double as file names for the file driver.
 */
export const STORAGE_CONFIG = {
  driver: parseStorageDriver(process.env.STORAGE_DRIVER),
  dataDir: process.env.DATA_DIR || './data',
  redisKeyPrefix: process.env.REDIS_KEY_PREFIX || 'booth-ledger:',
  keys: {
    products: process.env.PRODUCTS_BLOB_KEY || 'products.json',
    events: process.env.EVENTS_BLOB_KEY || 'events.json',
    transactions: process.env.TRANSACTIONS_BLOB_KEY || 'transactions.json',
    export: process.env.EXPORT_BLOB_KEY || 'sales.csv',
  },
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment (mongo driver only)
 */
export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/booth-ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/booth-ledger';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 10 : 5,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

export const REDIS_PASSWORD = process.env.REDIS_PASSWORD || undefined;

/**
 * Redis configuration object (redis driver only)
 */
export const REDIS_CONFIG = {
  host: REDIS_HOST,
  port: REDIS_PORT,
  password: REDIS_PASSWORD,
  maxRetriesPerRequest: isProduction ? 5 : 3,
  connectTimeout: isProduction ? 10000 : 5000,
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '100kb',
  port: parseInt(process.env.PORT || '3000', 10),
};

// =============================================================================
// EXPORT CONFIGURATION
// =============================================================================

export type ExportLocale = 'en' | 'ja';

const parseExportLocale = (value: string | undefined): ExportLocale =>
  value === 'ja' ? 'ja' : 'en';

/**
 * Sales export settings
 * - locale picks the header and enumeration labels written to each row
 */
export const EXPORT_CONFIG = {
  locale: parseExportLocale(process.env.EXPORT_LOCALE),
  downloadFilename: process.env.EXPORT_DOWNLOAD_FILENAME || 'sales.csv',
};

// =============================================================================
// CATALOG CONFIGURATION
// =============================================================================

export const CATALOG_CONFIG = {
  // Seed sample products when no catalog has been saved yet
  seedDefaults: process.env.SEED_DEFAULT_CATALOG
    ? process.env.SEED_DEFAULT_CATALOG === 'true'
    : !isTest,
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate environment variables required by the selected storage driver
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required: Record<StorageDriver, string[]> = {
    file: ['DATA_DIR'],
    redis: ['REDIS_HOST'],
    mongo: ['MONGODB_URI'],
    memory: [],
  };

  const missing = required[STORAGE_CONFIG.driver].filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  storageDriver: STORAGE_CONFIG.driver,
  exportLocale: EXPORT_CONFIG.locale,
});
