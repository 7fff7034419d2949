import { Command } from 'commander';
import { resolve } from 'node:path';
import { openRunStore } from '../store.js';
import { print, printError, formatError, formatSuccess } from '../formatter.js';

/**
 * Create the export command.
 */
export function createExportCommand(): Command {
  const command = new Command('export')
    .description('Write every stored run, with derived ratios, to a JSON file')
    .argument('<file>', 'Output file')
    .action(async (file: string) => {
      try {
        const outputPath = resolve(file);
        const count = await openRunStore().exportToJson(outputPath);
        print(formatSuccess(`Exported ${count} run${count === 1 ? '' : 's'} to ${outputPath}`));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
