import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { parseMigrationLogFile } from '../../metrics/index.js';
import { openRunStore } from '../store.js';
import { backfillCommandOptionsSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatSuccess,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the backfill command.
 */
export function createBackfillCommand(): Command {
  const command = new Command('backfill')
    .description('Rebuild a run record from a migration log and store it')
    .argument('<log-file>', 'Migration log file')
    .option('-p, --project <name>', 'Project name (default: from the log header)')
    .option('-s, --strategy <name>', 'Strategy (default: from the log header)')
    .option('--source-language <language>', 'Language the project was migrated from')
    .option('--dry-run', 'Print the record instead of storing it', false)
    .action(async (logFile: string, options: Record<string, unknown>) => {
      try {
        await executeBackfill(logFile, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeBackfill(logFile: string, rawOptions: Record<string, unknown>): Promise<void> {
  const result = validate(backfillCommandOptionsSchema, rawOptions);
  if (!result.success) {
    printError(formatValidationErrors(result.errors));
    process.exitCode = 1;
    return;
  }

  const options = result.data;
  const record = await parseMigrationLogFile(logFile, {
    projectName: options.project,
    strategy: options.strategy,
    sourceLanguage: options.sourceLanguage,
    schemaVersion: getConfig().schemaVersion,
  });

  if (options.dryRun) {
    print(formatJson(record));
    return;
  }

  openRunStore().insert(record);
  print(formatSuccess(`Backfilled run ${record.identity.runId} from ${logFile}`));
}
