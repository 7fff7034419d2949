/**
 * Configuration Module
 *
 * Reads store location, schema version and query defaults from
 * environment variables with validation and defaults.
 */

import { z } from 'zod';
import { SCHEMA_VERSION } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Error thrown when environment configuration fails validation.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
  readonly validationErrors: string[];

  constructor(validationErrors: string[]) {
    super(`Configuration validation failed: ${validationErrors.join('; ')}`);
    this.validationErrors = validationErrors;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  /** SQLite file holding run records */
  dbPath: z.string().min(1).default('.migrascope/migrations.db'),
  /** Version tag written on new records and rows */
  schemaVersion: z.string().min(1).default(SCHEMA_VERSION),
  /** Default row limit for listings (1 - 10000) */
  queryLimit: z.coerce.number().int().min(1).max(10000).default(100),
});

export type MigrascopeConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): MigrascopeConfig {
  const raw = {
    dbPath: process.env['MIGRASCOPE_DB_PATH'],
    schemaVersion: process.env['MIGRASCOPE_SCHEMA_VERSION'],
    queryLimit: process.env['MIGRASCOPE_QUERY_LIMIT'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new ConfigurationError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  log.debug(
    {
      dbPath: result.data.dbPath,
      schemaVersion: result.data.schemaVersion,
      queryLimit: result.data.queryLimit,
    },
    'Configuration loaded'
  );

  return result.data;
}

let configInstance: MigrascopeConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): MigrascopeConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
