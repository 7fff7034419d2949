/**
 * External dependency counts read from project manifests.
 */

import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { resolveProfile, Language } from './profiles.js';

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Entries of the `[dependencies]` table of a Cargo.toml.
 */
export function countCargoDependencies(content: string): number {
  let inDependencies = false;
  let count = 0;
  for (const line of content.split(/\r?\n/)) {
    const stripped = line.trim();
    if (stripped === '[dependencies]') {
      inDependencies = true;
    } else if (stripped.startsWith('[') && inDependencies) {
      break;
    } else if (inDependencies && stripped.includes('=') && !stripped.startsWith('#')) {
      count++;
    }
  }
  return count;
}

/**
 * Single-line `require` directives plus entries of `require ( ... )` blocks.
 */
export function countGoModDependencies(content: string): number {
  let count = 0;
  let inBlock = false;
  for (const line of content.split(/\r?\n/)) {
    const stripped = line.trim();
    if (inBlock) {
      if (stripped === ')') inBlock = false;
      else if (stripped !== '' && !stripped.startsWith('//')) count++;
    } else if (/^require\s*\(/.test(stripped)) {
      inBlock = true;
    } else if (/^require\s+\S+/.test(line)) {
      count++;
    }
  }
  return count;
}

export function countGradleDependencies(content: string): number {
  return content.match(/(implementation|api|compile|testImplementation)\s*['"]/g)?.length ?? 0;
}

export function countPomDependencies(content: string): number {
  return content.match(/<dependency>/g)?.length ?? 0;
}

/**
 * Non-comment, non-option lines of a requirements.txt.
 */
export function countRequirementsDependencies(content: string): number {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#') && !line.startsWith('-')).length;
}

/**
 * Quoted entries following a `dependencies = [` line of a pyproject.toml.
 */
export function countPyprojectDependencies(content: string): number {
  let inDependencies = false;
  let count = 0;
  for (const line of content.split(/\r?\n/)) {
    const stripped = line.trim();
    if (!inDependencies && /^dependencies\s*=/.test(stripped)) {
      inDependencies = true;
      // Inline list: dependencies = ["a", "b"]
      const inline = stripped.match(/\[(.*)\]/);
      if (inline?.[1] !== undefined) {
        return inline[1].split(',').filter((entry) => /["']/.test(entry)).length;
      }
    } else if (inDependencies) {
      if (stripped.startsWith(']') || stripped.startsWith('[')) break;
      if (stripped.startsWith('"') || stripped.startsWith("'")) count++;
    }
  }
  return count;
}

/**
 * Count external dependencies declared by the project's manifest.
 * Python projects also look one directory up, since sources often live
 * in a subdirectory of the project. Missing manifests count 0.
 */
export async function countExternalDependencies(
  projectDir: string,
  language: string
): Promise<number> {
  const profile = resolveProfile(language);

  switch (profile.language) {
    case Language.RUST: {
      const cargo = await readIfExists(join(projectDir, 'Cargo.toml'));
      return cargo === null ? 0 : countCargoDependencies(cargo);
    }
    case Language.GO: {
      const goMod = await readIfExists(join(projectDir, 'go.mod'));
      return goMod === null ? 0 : countGoModDependencies(goMod);
    }
    case Language.JAVA: {
      const gradle = await readIfExists(join(projectDir, 'build.gradle'));
      if (gradle !== null) return countGradleDependencies(gradle);
      const pom = await readIfExists(join(projectDir, 'pom.xml'));
      return pom === null ? 0 : countPomDependencies(pom);
    }
    case Language.PYTHON: {
      for (const dir of [projectDir, dirname(projectDir)]) {
        const requirements = await readIfExists(join(dir, 'requirements.txt'));
        if (requirements !== null) return countRequirementsDependencies(requirements);
      }
      for (const dir of [projectDir, dirname(projectDir)]) {
        const pyproject = await readIfExists(join(dir, 'pyproject.toml'));
        if (pyproject !== null) return countPyprojectDependencies(pyproject);
      }
      return 0;
    }
  }
}
