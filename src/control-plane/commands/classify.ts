import { Command } from 'commander';
import { resolve } from 'node:path';
import { classifyDirectory } from '../../classifier/index.js';
import { jsonOptionSchema, validate } from '../validators.js';
import {
  print,
  printError,
  formatClassification,
  formatError,
  formatJson,
  formatValidationErrors,
} from '../formatter.js';

/**
 * Create the classify command.
 */
export function createClassifyCommand(): Command {
  const command = new Command('classify')
    .description('Count production and test lines in a source directory')
    .argument('<dir>', 'Directory to scan')
    .argument('<language>', 'Language profile (java, go, python, rust)')
    .option('--json', 'Output result as JSON, including per-file counts', false)
    .action(async (dir: string, language: string, options: Record<string, unknown>) => {
      try {
        await executeClassify(dir, language, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeClassify(
  dir: string,
  language: string,
  rawOptions: Record<string, unknown>
): Promise<void> {
  const result = validate(jsonOptionSchema, rawOptions);
  if (!result.success) {
    printError(formatValidationErrors(result.errors));
    process.exitCode = 1;
    return;
  }

  const classification = await classifyDirectory(resolve(dir), language);
  print(
    result.data.json
      ? formatJson(classification)
      : formatClassification(classification, language.toLowerCase())
  );
}
