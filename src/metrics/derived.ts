/**
 * Ratios derived from a run record. Always computed from the stored
 * fields; a zero denominator yields 0.
 */

import type {
  DerivedRunRatios,
  IoContractMetrics,
  RunRecord,
  TokenMetrics,
} from '../types/index.js';

function safeRatio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Fraction of input tokens served from the prompt cache.
 */
export function cacheEfficiencyRatio(tokens: TokenMetrics): number {
  const { cacheReadInputTokens, inputTokens } = tokens;
  return safeRatio(cacheReadInputTokens, cacheReadInputTokens + inputTokens);
}

/**
 * Fraction of behavioral test cases that matched (0-1).
 */
export function matchRate(ioContract: IoContractMetrics): number {
  return safeRatio(ioContract.passed, ioContract.totalTestCases);
}

/**
 * Target production LOC per source production LOC.
 */
export function locExpansionRatio(record: RunRecord): number {
  return safeRatio(record.targetMetrics.productionLoc, record.sourceMetrics.productionLoc);
}

/**
 * Dollars spent per source production line migrated.
 */
export function costPerLoc(record: RunRecord): number {
  return safeRatio(record.cost.totalCostUsd, record.sourceMetrics.productionLoc);
}

export function deriveRunRatios(record: RunRecord): DerivedRunRatios {
  return {
    cacheEfficiencyRatio: cacheEfficiencyRatio(record.tokens),
    matchRate: matchRate(record.ioContract),
    locExpansionRatio: locExpansionRatio(record),
    costPerLoc: costPerLoc(record),
  };
}
