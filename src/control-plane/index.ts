// Validators
export {
  validate,
  formatZodErrors,
  listCommandOptionsSchema,
  statsCommandOptionsSchema,
  backfillCommandOptionsSchema,
  jsonOptionSchema,
  groupFieldSchema,
  runIdSchema,
  type ValidationResult,
  type ValidationError,
  type ListCommandOptions,
  type StatsCommandOptions,
  type BackfillCommandOptions,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  formatStatus,
  formatDurationMs,
  formatCost,
  formatPercent,
  formatCount,
  truncate,
  formatTable,
  formatRunList,
  formatRunDetail,
  formatAggregateStats,
  formatGroupedStats,
  formatClassification,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';

// Store access
export { openRunStore } from './store.js';

// CLI
export {
  createProgram,
  runCli,
  createImportCommand,
  createShowCommand,
  createListCommand,
  createStatsCommand,
  createClassifyCommand,
  createBackfillCommand,
  createExportCommand,
  createDeleteCommand,
} from './cli.js';
