import { Command } from 'commander';
import { openRunStore } from '../store.js';
import { statsCommandOptionsSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatAggregateStats,
  formatGroupedStats,
  formatInfo,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the stats command.
 */
export function createStatsCommand(): Command {
  const command = new Command('stats')
    .description('Aggregate statistics across runs')
    .option('-p, --project <name>', 'Filter by project name')
    .option('-t, --target <language>', 'Filter by target language')
    .option('-s, --strategy <name>', 'Filter by strategy')
    .option('-g, --group-by <field>', 'Group by project, target or strategy')
    .option('--json', 'Output result as JSON', false)
    .action((options: Record<string, unknown>) => {
      try {
        executeStats(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

function executeStats(rawOptions: Record<string, unknown>): void {
  const result = validate(statsCommandOptionsSchema, rawOptions);
  if (!result.success) {
    printError(formatValidationErrors(result.errors));
    process.exitCode = 1;
    return;
  }

  const { groupBy, json, ...filters } = result.data;
  const store = openRunStore();

  if (groupBy !== undefined) {
    const groups = store.groupBy(groupBy, filters);
    print(json ? formatJson(groups) : formatGroupedStats(groups, groupBy));
    return;
  }

  const stats = store.aggregate(filters);
  if (json) {
    print(formatJson(stats));
  } else {
    print(stats === null ? formatInfo('No runs match the given filters.') : formatAggregateStats(stats));
  }
}
