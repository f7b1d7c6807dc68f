import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  STORAGE_CONFIG,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_CONFIG,
  API_CONFIG,
  EXPORT_CONFIG,
  CATALOG_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * This consolidates all environment-specific settings.
 * Import this for general app configuration needs.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // Blob store
  storage: STORAGE_CONFIG,

  // MongoDB (mongo driver)
  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  // Redis (redis driver)
  redis: REDIS_CONFIG,

  // Sales export
  export: EXPORT_CONFIG,

  // Catalog
  catalog: CATALOG_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};

export type AppConfig = typeof config;
