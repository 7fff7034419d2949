import { getConfig } from '../config/index.js';
import { RunStore } from '../store/index.js';

/**
 * Open the run store configured through the environment.
 */
export function openRunStore(): RunStore {
  const config = getConfig();
  return new RunStore({
    dbPath: config.dbPath,
    schemaVersion: config.schemaVersion,
    defaultLimit: config.queryLimit,
  });
}
