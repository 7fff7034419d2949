import { Command } from 'commander';
import { openRunStore } from '../store.js';
import { runIdSchema, validate } from '../validators.js';
import { print, printError, formatError, formatSuccess, formatValidationErrors } from '../formatter.js';

/**
 * Create the delete command.
 */
export function createDeleteCommand(): Command {
  const command = new Command('delete')
    .description('Delete a stored run')
    .argument('<run-id>', 'Run ID to delete')
    .action((rawRunId: string) => {
      try {
        const result = validate(runIdSchema, rawRunId);
        if (!result.success) {
          printError(formatValidationErrors(result.errors));
          process.exitCode = 1;
          return;
        }
        if (!openRunStore().delete(result.data)) {
          printError(formatError(`Run not found: ${result.data}`));
          process.exitCode = 1;
          return;
        }
        print(formatSuccess(`Deleted run ${result.data}`));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
