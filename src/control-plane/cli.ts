import { Command } from 'commander';
import { createImportCommand } from './commands/import.js';
import { createShowCommand } from './commands/show.js';
import { createListCommand } from './commands/list.js';
import { createStatsCommand } from './commands/stats.js';
import { createClassifyCommand } from './commands/classify.js';
import { createBackfillCommand } from './commands/backfill.js';
import { createExportCommand } from './commands/export.js';
import { createDeleteCommand } from './commands/delete.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('migrascope')
    .description('Migration run metrics: record, classify, store and aggregate')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createImportCommand());
  program.addCommand(createShowCommand());
  program.addCommand(createListCommand());
  program.addCommand(createStatsCommand());
  program.addCommand(createClassifyCommand());
  program.addCommand(createBackfillCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createDeleteCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createImportCommand } from './commands/import.js';
export { createShowCommand } from './commands/show.js';
export { createListCommand } from './commands/list.js';
export { createStatsCommand } from './commands/stats.js';
export { createClassifyCommand } from './commands/classify.js';
export { createBackfillCommand } from './commands/backfill.js';
export { createExportCommand } from './commands/export.js';
export { createDeleteCommand } from './commands/delete.js';
