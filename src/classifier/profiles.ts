/**
 * Per-language rules for splitting source files into production and
 * test lines. Each profile is a pure function of a file's path (relative
 * to the scan root) and its contents.
 */

import { UnsupportedLanguageError } from './errors.js';

export const Language = {
  JAVA: 'java',
  GO: 'go',
  PYTHON: 'python',
  RUST: 'rust',
} as const;

export type Language = (typeof Language)[keyof typeof Language];

export interface LocCount {
  productionLoc: number;
  testLoc: number;
}

export interface LanguageProfile {
  language: Language;
  /** File extension including the dot */
  extension: string;
  classify(relativePath: string, contents: string): LocCount;
}

// ============================================================================
// Helpers
// ============================================================================

function splitLines(contents: string): string[] {
  return contents.split(/\r?\n/);
}

function baseName(relativePath: string): string {
  const segments = relativePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? relativePath;
}

/**
 * True when any directory segment of the path is `test` or `tests`.
 */
function inTestDirectory(relativePath: string): boolean {
  const directories = relativePath.split(/[\\/]/).slice(0, -1);
  return directories.some((segment) => {
    const lower = segment.toLowerCase();
    return lower === 'test' || lower === 'tests';
  });
}

function wholeFile(loc: number, isTest: boolean): LocCount {
  return isTest ? { productionLoc: 0, testLoc: loc } : { productionLoc: loc, testLoc: 0 };
}

function countBraces(line: string): number {
  let depth = 0;
  for (const ch of line) {
    if (ch === '{') depth++;
    else if (ch === '}') depth--;
  }
  return depth;
}

/**
 * Count lines holding code in a language with `//` line comments and
 * `/* ... *\/` block comments. Code sharing a line with a comment counts.
 */
export function countCStyleLines(contents: string): number {
  let count = 0;
  let inBlock = false;

  for (const line of splitLines(contents)) {
    let code = '';
    let i = 0;
    while (i < line.length) {
      if (inBlock) {
        const end = line.indexOf('*/', i);
        if (end === -1) {
          i = line.length;
        } else {
          inBlock = false;
          i = end + 2;
        }
        continue;
      }
      const lineComment = line.indexOf('//', i);
      const blockComment = line.indexOf('/*', i);
      if (blockComment !== -1 && (lineComment === -1 || blockComment < lineComment)) {
        code += line.slice(i, blockComment);
        inBlock = true;
        i = blockComment + 2;
      } else {
        code += lineComment === -1 ? line.slice(i) : line.slice(i, lineComment);
        i = line.length;
      }
    }
    if (code.trim() !== '') count++;
  }

  return count;
}

/**
 * Count Python lines, skipping `#` comments and triple-quoted
 * documentation blocks including their delimiter lines.
 */
export function countPythonLines(contents: string): number {
  let count = 0;
  let delimiter: string | null = null;

  for (const line of splitLines(contents)) {
    const stripped = line.trim();

    if (delimiter !== null) {
      if (stripped.includes(delimiter)) delimiter = null;
      continue;
    }

    if (stripped.startsWith('"""') || stripped.startsWith("'''")) {
      const opening = stripped.slice(0, 3);
      // One-line docstring: the block closes on the same line
      if (stripped.indexOf(opening, 3) === -1) delimiter = opening;
      continue;
    }

    if (stripped !== '' && !stripped.startsWith('#')) count++;
  }

  return count;
}

/**
 * Split a Rust file at inline test modules by tracking brace depth.
 * A `#[cfg(test)]` line or a `mod tests` line with an opening brace starts
 * a test region, which ends once the depth falls back to where it began.
 */
export function splitRustLines(contents: string): LocCount {
  let productionLoc = 0;
  let testLoc = 0;
  let inTest = false;
  let depth = 0;
  let baseDepth = 0;

  for (const line of splitLines(contents)) {
    const stripped = line.trim();
    if (stripped === '' || stripped.startsWith('//')) continue;

    if (!inTest && (line.includes('#[cfg(test)]') || (line.includes('mod tests') && line.includes('{')))) {
      inTest = true;
      baseDepth = depth;
      depth += countBraces(line);
      testLoc++;
      continue;
    }

    depth += countBraces(line);
    if (inTest) {
      testLoc++;
      if (depth <= baseDepth) inTest = false;
    } else {
      productionLoc++;
    }
  }

  return { productionLoc, testLoc };
}

// ============================================================================
// Profiles
// ============================================================================

const javaProfile: LanguageProfile = {
  language: Language.JAVA,
  extension: '.java',
  classify(relativePath, contents) {
    const stem = baseName(relativePath).replace(/\.java$/, '');
    const isTest =
      inTestDirectory(relativePath) ||
      stem.startsWith('Test') ||
      stem.endsWith('Test') ||
      stem.endsWith('Tests');
    return wholeFile(countCStyleLines(contents), isTest);
  },
};

const goProfile: LanguageProfile = {
  language: Language.GO,
  extension: '.go',
  classify(relativePath, contents) {
    return wholeFile(countCStyleLines(contents), baseName(relativePath).endsWith('_test.go'));
  },
};

const pythonProfile: LanguageProfile = {
  language: Language.PYTHON,
  extension: '.py',
  classify(relativePath, contents) {
    const name = baseName(relativePath);
    const isTest =
      inTestDirectory(relativePath) || name.startsWith('test_') || name.endsWith('_test.py');
    return wholeFile(countPythonLines(contents), isTest);
  },
};

const rustProfile: LanguageProfile = {
  language: Language.RUST,
  extension: '.rs',
  classify(_relativePath, contents) {
    return splitRustLines(contents);
  },
};

export const PROFILES: Readonly<Record<Language, LanguageProfile>> = {
  java: javaProfile,
  go: goProfile,
  python: pythonProfile,
  rust: rustProfile,
};

export const SUPPORTED_LANGUAGES: readonly Language[] = Object.values(Language);

function isLanguage(tag: string): tag is Language {
  return SUPPORTED_LANGUAGES.some((language) => language === tag);
}

/**
 * Look up the profile for a language tag (case-insensitive).
 * @throws UnsupportedLanguageError for unknown tags
 */
export function resolveProfile(tag: string): LanguageProfile {
  const normalized = tag.trim().toLowerCase();
  if (!isLanguage(normalized)) {
    throw new UnsupportedLanguageError(tag, SUPPORTED_LANGUAGES);
  }
  return PROFILES[normalized];
}
