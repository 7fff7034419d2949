import { Command } from 'commander';
import { describeRunRecord } from '../../metrics/index.js';
import { openRunStore } from '../store.js';
import { jsonOptionSchema, runIdSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatRunDetail,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  const command = new Command('show')
    .description('Show the full record of one run')
    .argument('<run-id>', 'Run ID to show')
    .option('--json', 'Output the record with derived ratios as JSON', false)
    .action((runId: string, options: Record<string, unknown>) => {
      try {
        executeShow(runId, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

function executeShow(rawRunId: string, rawOptions: Record<string, unknown>): void {
  const idResult = validate(runIdSchema, rawRunId);
  const optionsResult = validate(jsonOptionSchema, rawOptions);
  if (!idResult.success || !optionsResult.success) {
    printError(
      formatValidationErrors([
        ...(idResult.success ? [] : idResult.errors),
        ...(optionsResult.success ? [] : optionsResult.errors),
      ])
    );
    process.exitCode = 1;
    return;
  }

  const runId = idResult.data;
  const record = openRunStore().get(runId);
  if (!record) {
    printError(formatError(`Run not found: ${runId}`));
    process.exitCode = 1;
    return;
  }

  print(optionsResult.data.json ? formatJson(describeRunRecord(record)) : formatRunDetail(record));
}
