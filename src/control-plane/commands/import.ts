import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { parseRunRecord } from '../../metrics/index.js';
import { openRunStore } from '../store.js';
import { print, printError, formatError, formatSuccess } from '../formatter.js';

/**
 * Create the import command.
 */
export function createImportCommand(): Command {
  const command = new Command('import')
    .description('Insert serialized run records, replacing runs with the same id')
    .argument('<files...>', 'Run record JSON files')
    .action(async (files: string[]) => {
      try {
        await executeImport(files);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeImport(files: string[]): Promise<void> {
  const store = openRunStore();
  let imported = 0;

  for (const file of files) {
    try {
      const record = parseRunRecord(await readFile(file, 'utf-8'));
      store.insert(record);
      imported++;
      print(formatSuccess(`${file} -> ${record.identity.runId}`));
    } catch (error) {
      printError(formatError(`${file}: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  }

  print(`Imported ${imported} of ${files.length} file${files.length === 1 ? '' : 's'}`);
}
