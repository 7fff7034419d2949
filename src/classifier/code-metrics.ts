import type { CodeMetrics } from '../types/index.js';
import { classifyDirectory } from './classifier.js';
import { countExternalDependencies } from './dependencies.js';

/**
 * Simplified maintainability index without Halstead volume:
 * `171 - 0.23 * CC - 16.2 * ln(LOC)`, clamped to 0-100.
 * Null when there is no code to measure.
 */
export function maintainabilityIndex(productionLoc: number, avgCyclomaticComplexity: number): number | null {
  if (productionLoc <= 0) return null;
  const mi = 171 - 0.23 * avgCyclomaticComplexity - 16.2 * Math.log(productionLoc);
  return Math.max(0, Math.min(100, mi));
}

/**
 * Size figures for one code base, ready to merge into a run record
 * through the collector's recordSourceMetrics/recordTargetMetrics.
 * `moduleCount` is the number of files holding production code. Complexity
 * is not measured here; pass the average from an external tool to fold it
 * into the maintainability index.
 */
export async function measureCodeMetrics(
  directory: string,
  language: string,
  projectDir: string = directory,
  avgCyclomaticComplexity: number = 0
): Promise<Partial<CodeMetrics>> {
  const classification = await classifyDirectory(directory, language);
  const externalDependencies = await countExternalDependencies(projectDir, language);

  return {
    productionLoc: classification.productionLoc,
    testLoc: classification.testLoc,
    totalLoc: classification.productionLoc + classification.testLoc,
    moduleCount: classification.files.filter((file) => file.productionLoc > 0).length,
    externalDependencies,
    maintainabilityIndex: maintainabilityIndex(classification.productionLoc, avgCyclomaticComplexity),
  };
}
