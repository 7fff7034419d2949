/**
 * migrascope Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Run records, collector and log backfill
export * from './metrics/index.js';

// Source classification
export * from './classifier/index.js';

// Persistent store
export * from './store/index.js';

// Configuration
export {
  loadConfig,
  getConfig,
  resetConfig,
  ConfigurationError,
  type MigrascopeConfig,
} from './config/index.js';

// Logging
export { logger, createLogger } from './utils/index.js';
