import { Command } from 'commander';
import { openRunStore } from '../store.js';
import { listCommandOptionsSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatRunList,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the list command.
 */
export function createListCommand(): Command {
  const command = new Command('list')
    .description('List recorded runs, newest first')
    .option('-p, --project <name>', 'Filter by project name')
    .option('-t, --target <language>', 'Filter by target language')
    .option('-s, --strategy <name>', 'Filter by strategy')
    .option('--status <status>', 'Filter by status (success, partial, failure)')
    .option('--since <date>', 'Only runs started at or after this date')
    .option('--until <date>', 'Only runs started at or before this date (a date alone includes the whole day)')
    .option('-l, --limit <n>', 'Maximum number of runs to show')
    .option('--json', 'Output result as JSON', false)
    .action((options: Record<string, unknown>) => {
      try {
        executeList(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

function executeList(rawOptions: Record<string, unknown>): void {
  const result = validate(listCommandOptionsSchema, rawOptions);
  if (!result.success) {
    printError(formatValidationErrors(result.errors));
    process.exitCode = 1;
    return;
  }

  const { limit, json, ...filters } = result.data;
  const store = openRunStore();
  const records = store.query(filters, limit);

  print(json ? formatJson(records) : formatRunList(records));
}
