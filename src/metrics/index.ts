/**
 * Metrics module for migration runs.
 *
 * This module provides:
 * - MigrationMetricsCollector: In-memory collection during run execution
 * - Record factories, derived ratios and JSON serialization
 * - Log backfill: Rebuild records from migration logs
 */

export {
  createRunIdentity,
  createEmptyRunRecord,
  createEmptyCodeMetrics,
  type RunIdentityInput,
} from './record.js';

export {
  cacheEfficiencyRatio,
  matchRate,
  locExpansionRatio,
  costPerLoc,
  deriveRunRatios,
} from './derived.js';

export {
  serializeRunRecord,
  parseRunRecord,
  runRecordFromJson,
  describeRunRecord,
  freezeRunRecord,
} from './serialization.js';

export {
  MigrationMetricsCollector,
  type CollectorOptions,
  type IoContractInput,
  type CostBreakdownInput,
} from './collector.js';

export {
  parseMigrationLog,
  parseMigrationLogFile,
  type LogParseOptions,
} from './log-parser.js';

export { RunRecordParseError } from './errors.js';
