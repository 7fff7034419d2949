/**
 * Directory scan: applies a language profile to every matching file
 * under a root and sums the per-file counts.
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import fg from 'fast-glob';
const { glob } = fg;

import { createLogger } from '../utils/logger.js';
import { resolveProfile, type LocCount } from './profiles.js';

const log = createLogger('classifier');

export interface FileClassification extends LocCount {
  /** Path relative to the scan root, forward slashes */
  path: string;
}

export interface DirectoryClassification extends LocCount {
  fileCount: number;
  files: FileClassification[];
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Classify every file of the language under `root`, recursively.
 * A missing root yields zero counts; an unreadable file contributes
 * nothing but still counts as a file.
 * @throws UnsupportedLanguageError for unknown language tags
 */
export async function classifyDirectory(
  root: string,
  language: string
): Promise<DirectoryClassification> {
  const profile = resolveProfile(language);

  if (!(await isDirectory(root))) {
    log.warn({ root, language: profile.language }, 'Directory not found for classification');
    return { productionLoc: 0, testLoc: 0, fileCount: 0, files: [] };
  }

  const paths = await glob(`**/*${profile.extension}`, {
    cwd: root,
    onlyFiles: true,
    absolute: false,
  });
  paths.sort();

  const files: FileClassification[] = [];
  let productionLoc = 0;
  let testLoc = 0;

  for (const path of paths) {
    let counts: LocCount = { productionLoc: 0, testLoc: 0 };
    try {
      const contents = await readFile(join(root, path), 'utf-8');
      counts = profile.classify(path, contents);
    } catch (error) {
      log.warn(
        { path, error: error instanceof Error ? error.message : String(error) },
        'Skipping unreadable file'
      );
    }
    productionLoc += counts.productionLoc;
    testLoc += counts.testLoc;
    files.push({ path, ...counts });
  }

  log.debug(
    { root, language: profile.language, productionLoc, testLoc, fileCount: files.length },
    'Classified directory'
  );
  return { productionLoc, testLoc, fileCount: files.length, files };
}

/**
 * Production LOC, test LOC and file count for a directory.
 */
export async function classify(
  directory: string,
  language: string
): Promise<DirectoryClassification> {
  return classifyDirectory(directory, language);
}
