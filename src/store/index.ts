/**
 * Persistent aggregate store module.
 *
 * Provides:
 * - RunStore: SQLite-backed storage with lookup, filtered listing and aggregates
 * - Percentile helpers used for duration statistics
 */

export {
  RunStore,
  ADDITIVE_COLUMNS,
  DEFAULT_QUERY_LIMIT,
  GROUP_FIELDS,
  type RunStoreOptions,
  type RunQueryFilters,
  type AggregateStats,
  type GroupField,
} from './run-store.js';

export { percentile, median, mean, sortAscending } from './statistics.js';

export { InvalidGroupFieldError } from './errors.js';
