import { randomUUID } from 'node:crypto';
import {
  RunStatus,
  SCHEMA_VERSION,
  type CodeMetrics,
  type RunIdentity,
  type RunRecord,
} from '../types/index.js';

/**
 * Fields a caller supplies when a run starts
 */
export interface RunIdentityInput {
  projectName: string;
  sourceLanguage: string;
  targetLanguage: string;
  strategy: string;
  /** Defaults to a fresh UUID */
  runId?: string;
  /** Defaults to now */
  startedAt?: string;
  hostPlatform?: string | null;
  sdkVersion?: string | null;
  modelId?: string | null;
}

/**
 * Create the identity block of a run. The run id and start time are
 * fixed here and never change afterwards.
 */
export function createRunIdentity(input: RunIdentityInput): RunIdentity {
  return {
    runId: input.runId ?? randomUUID(),
    projectName: input.projectName,
    sourceLanguage: input.sourceLanguage,
    targetLanguage: input.targetLanguage,
    strategy: input.strategy,
    startedAt: input.startedAt ?? new Date().toISOString(),
    completedAt: null,
    hostPlatform: input.hostPlatform ?? null,
    sdkVersion: input.sdkVersion ?? null,
    modelId: input.modelId ?? null,
  };
}

export function createEmptyCodeMetrics(): CodeMetrics {
  return {
    productionLoc: 0,
    testLoc: 0,
    totalLoc: 0,
    moduleCount: 0,
    functionCount: 0,
    avgCyclomaticComplexity: 0,
    maxCyclomaticComplexity: 0,
    externalDependencies: 0,
    maintainabilityIndex: null,
  };
}

/**
 * A run record as it looks when the run starts: identity set, every
 * counter zero, every optional value null.
 */
export function createEmptyRunRecord(
  identity: RunIdentity,
  schemaVersion: string = SCHEMA_VERSION
): RunRecord {
  return {
    schemaVersion,
    identity: { ...identity },
    timing: {
      wallClockDurationMs: 0,
      apiDurationMs: 0,
      phaseDurationsMs: {},
      moduleDurations: [],
    },
    cost: {
      totalCostUsd: 0,
      inputTokensCostUsd: 0,
      outputTokensCostUsd: 0,
      cacheCreationCostUsd: 0,
    },
    tokens: {
      inputTokens: 0,
      outputTokens: 0,
      cacheCreationInputTokens: 0,
      cacheReadInputTokens: 0,
    },
    agent: {
      totalTurns: 0,
      totalMessages: 0,
      toolInvocations: {},
      subagentInvocations: {},
      errorRecoveryEvents: 0,
      retryCount: 0,
    },
    sourceMetrics: createEmptyCodeMetrics(),
    targetMetrics: createEmptyCodeMetrics(),
    qualityGates: {
      compilation: { passed: false, errorCount: 0, warningCount: 0 },
      linting: { passed: false, tool: '', errorCount: 0, warningCount: 0 },
      formatting: { passed: false, tool: '' },
      unitTests: { passed: false, total: 0, passedCount: 0, failedCount: 0, skippedCount: 0 },
      coverage: { lineCoveragePct: null, branchCoveragePct: null, functionCoveragePct: null },
      idiomaticness: null,
    },
    ioContract: {
      totalTestCases: 0,
      passed: 0,
      failed: 0,
      unsupported: 0,
      featureResults: [],
    },
    outcome: {
      status: RunStatus.FAILURE,
      modulesCompleted: 0,
      modulesTotal: 0,
      blockingIssues: [],
      notes: null,
    },
  };
}
