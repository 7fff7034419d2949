/**
 * Live collector for a migration run.
 * Accumulates timing, cost, token, tool and code metrics pushed by the
 * orchestration loop and freezes them into a RunRecord at the end.
 */

import {
  RunStatus,
  type CodeMetrics,
  type FeatureResult,
  type IdiomaticnessScore,
  type RunRecord,
  type UnitTestResult,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { createEmptyRunRecord, createRunIdentity, type RunIdentityInput } from './record.js';
import { freezeRunRecord } from './serialization.js';

const log = createLogger('collector');

export interface CollectorOptions extends RunIdentityInput {
  /** Schema version written on the record */
  schemaVersion?: string;
}

/**
 * Counts for the behavioral contract
 */
export interface IoContractInput {
  totalTestCases: number;
  passed: number;
  failed?: number;
  unsupported?: number;
  featureResults?: FeatureResult[];
}

export interface CostBreakdownInput {
  inputTokensCostUsd?: number;
  outputTokensCostUsd?: number;
  cacheCreationCostUsd?: number;
}

// ============================================================================
// Payload extraction
// ============================================================================

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First finite, non-negative number found under any of the keys.
 */
function readNumber(payload: Payload, ...keys: string[]): number | null {
  for (const key of keys) {
    const value = payload[key];
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed === 'number' && Number.isFinite(parsed) && parsed >= 0) {
      return parsed;
    }
  }
  return null;
}

function readString(payload: Payload, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === 'string') return value;
  }
  return null;
}

function toCount(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
}

function toAmount(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function toPercentage(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return Math.min(100, Math.max(0, value));
}

// ============================================================================
// Collector
// ============================================================================

/**
 * Mutable accumulator bound to exactly one run.
 * Never throws for out-of-order or missing calls.
 */
export class MigrationMetricsCollector {
  private readonly record: RunRecord;
  private readonly startInstant: number;
  private readonly phaseStarts = new Map<string, number>();
  private readonly moduleStarts = new Map<string, number>();
  private readonly moduleAttempts = new Map<string, number>();
  // Keyed by caller-supplied names, so kept out of plain objects until finalize
  private readonly phaseDurations = new Map<string, number>();
  private readonly toolCounts = new Map<string, number>();
  private readonly subagentCounts = new Map<string, number>();
  private messageCount = 0;
  private wallClockFromResult = false;

  constructor(options: CollectorOptions) {
    const { schemaVersion, ...identityInput } = options;
    this.record = createEmptyRunRecord(createRunIdentity(identityInput), schemaVersion);
    this.startInstant = Date.now();
  }

  get runId(): string {
    return this.record.identity.runId;
  }

  // --------------------------------------------------------------------------
  // Timing
  // --------------------------------------------------------------------------

  startPhase(name: string): void {
    this.phaseStarts.set(name, Date.now());
  }

  endPhase(name: string): void {
    const startedAt = this.phaseStarts.get(name);
    if (startedAt === undefined) {
      log.warn({ runId: this.runId, phase: name }, 'endPhase without matching startPhase');
      return;
    }
    this.phaseStarts.delete(name);
    this.phaseDurations.set(name, Date.now() - startedAt);
  }

  /**
   * Every call counts as one attempt at the module.
   */
  startModule(name: string): void {
    this.moduleStarts.set(name, Date.now());
    this.moduleAttempts.set(name, (this.moduleAttempts.get(name) ?? 0) + 1);
  }

  endModule(name: string, attempts?: number): void {
    const startedAt = this.moduleStarts.get(name);
    if (startedAt === undefined) {
      log.warn({ runId: this.runId, module: name }, 'endModule without matching startModule');
      return;
    }
    this.moduleStarts.delete(name);

    const tracked = this.moduleAttempts.get(name) ?? 1;
    const supplied = attempts !== undefined && attempts >= 1 ? Math.trunc(attempts) : null;
    this.record.timing.moduleDurations.push({
      moduleName: name,
      durationMs: Date.now() - startedAt,
      attempts: supplied ?? tracked,
    });
  }

  // --------------------------------------------------------------------------
  // Agent activity
  // --------------------------------------------------------------------------

  recordToolUse(name: string): void {
    this.toolCounts.set(name, (this.toolCounts.get(name) ?? 0) + 1);
  }

  recordSubagent(role: string): void {
    this.subagentCounts.set(role, (this.subagentCounts.get(role) ?? 0) + 1);
  }

  recordMessage(): void {
    this.messageCount++;
  }

  recordRetry(): void {
    this.record.agent.retryCount++;
  }

  recordErrorRecovery(): void {
    this.record.agent.errorRecoveryEvents++;
  }

  /**
   * Extract duration, cost, turns, token usage and status from the final
   * result payload of an agent session. Missing or invalid values read as 0,
   * and anything other than a `success` subtype reads as failure.
   */
  recordResult(payload: Record<string, unknown>): void {
    const { timing, cost, tokens, agent, outcome } = this.record;

    const durationMs = readNumber(payload, 'duration_ms', 'durationMs');
    timing.wallClockDurationMs = durationMs ?? 0;
    this.wallClockFromResult = durationMs !== null && durationMs > 0;
    timing.apiDurationMs = readNumber(payload, 'duration_api_ms', 'durationApiMs') ?? 0;
    cost.totalCostUsd = readNumber(payload, 'total_cost_usd', 'totalCostUsd') ?? 0;
    agent.totalTurns = toCount(readNumber(payload, 'num_turns', 'numTurns') ?? 0);

    const rawUsage = payload['usage'];
    const usage: Payload = isPayload(rawUsage) ? rawUsage : {};
    tokens.inputTokens = toCount(readNumber(usage, 'input_tokens', 'inputTokens') ?? 0);
    tokens.outputTokens = toCount(readNumber(usage, 'output_tokens', 'outputTokens') ?? 0);
    tokens.cacheCreationInputTokens = toCount(
      readNumber(usage, 'cache_creation_input_tokens', 'cacheCreationInputTokens') ?? 0
    );
    tokens.cacheReadInputTokens = toCount(
      readNumber(usage, 'cache_read_input_tokens', 'cacheReadInputTokens') ?? 0
    );

    const subtype = readString(payload, 'subtype', 'status');
    outcome.status = subtype === 'success' ? RunStatus.SUCCESS : RunStatus.FAILURE;

    log.debug(
      { runId: this.runId, durationMs: timing.wallClockDurationMs, costUsd: cost.totalCostUsd },
      'Recorded result'
    );
  }

  recordCostBreakdown(breakdown: CostBreakdownInput): void {
    const { cost } = this.record;
    if (breakdown.inputTokensCostUsd !== undefined) {
      cost.inputTokensCostUsd = toAmount(breakdown.inputTokensCostUsd);
    }
    if (breakdown.outputTokensCostUsd !== undefined) {
      cost.outputTokensCostUsd = toAmount(breakdown.outputTokensCostUsd);
    }
    if (breakdown.cacheCreationCostUsd !== undefined) {
      cost.cacheCreationCostUsd = toAmount(breakdown.cacheCreationCostUsd);
    }
  }

  // --------------------------------------------------------------------------
  // Code metrics
  // --------------------------------------------------------------------------

  recordSourceLoc(
    productionLoc: number,
    testLoc: number,
    moduleCount: number,
    functionCount?: number
  ): void {
    this.setLoc(this.record.sourceMetrics, productionLoc, testLoc, moduleCount, functionCount);
  }

  recordTargetLoc(
    productionLoc: number,
    testLoc: number,
    moduleCount: number,
    functionCount?: number
  ): void {
    this.setLoc(this.record.targetMetrics, productionLoc, testLoc, moduleCount, functionCount);
  }

  /**
   * Merge complexity, dependency or maintainability figures into the
   * source metrics.
   */
  recordSourceMetrics(partial: Partial<CodeMetrics>): void {
    this.mergeCodeMetrics(this.record.sourceMetrics, partial);
  }

  recordTargetMetrics(partial: Partial<CodeMetrics>): void {
    this.mergeCodeMetrics(this.record.targetMetrics, partial);
  }

  private setLoc(
    metrics: CodeMetrics,
    productionLoc: number,
    testLoc: number,
    moduleCount: number,
    functionCount: number | undefined
  ): void {
    metrics.productionLoc = toCount(productionLoc);
    metrics.testLoc = toCount(testLoc);
    metrics.totalLoc = metrics.productionLoc + metrics.testLoc;
    metrics.moduleCount = toCount(moduleCount);
    if (functionCount !== undefined) {
      metrics.functionCount = toCount(functionCount);
    }
  }

  private mergeCodeMetrics(metrics: CodeMetrics, partial: Partial<CodeMetrics>): void {
    const counters = [
      'productionLoc',
      'testLoc',
      'moduleCount',
      'functionCount',
      'maxCyclomaticComplexity',
      'externalDependencies',
    ] as const;
    for (const key of counters) {
      const value = partial[key];
      if (value !== undefined) metrics[key] = toCount(value);
    }
    if (partial.avgCyclomaticComplexity !== undefined) {
      metrics.avgCyclomaticComplexity = toAmount(partial.avgCyclomaticComplexity);
    }
    if (partial.maintainabilityIndex !== undefined) {
      metrics.maintainabilityIndex = toPercentage(partial.maintainabilityIndex);
    }
    if (partial.totalLoc !== undefined) {
      metrics.totalLoc = toCount(partial.totalLoc);
    } else if (partial.productionLoc !== undefined || partial.testLoc !== undefined) {
      metrics.totalLoc = metrics.productionLoc + metrics.testLoc;
    }
  }

  // --------------------------------------------------------------------------
  // Quality gates
  // --------------------------------------------------------------------------

  recordCompilation(passed: boolean, errorCount: number = 0, warningCount: number = 0): void {
    this.record.qualityGates.compilation = {
      passed,
      errorCount: toCount(errorCount),
      warningCount: toCount(warningCount),
    };
  }

  recordLinting(tool: string, passed: boolean, errorCount: number = 0, warningCount: number = 0): void {
    this.record.qualityGates.linting = {
      passed,
      tool,
      errorCount: toCount(errorCount),
      warningCount: toCount(warningCount),
    };
  }

  recordFormatting(tool: string, passed: boolean): void {
    this.record.qualityGates.formatting = { passed, tool };
  }

  recordUnitTests(result: Partial<UnitTestResult>): void {
    const current = this.record.qualityGates.unitTests;
    this.record.qualityGates.unitTests = {
      passed: result.passed ?? current.passed,
      total: toCount(result.total ?? current.total),
      passedCount: toCount(result.passedCount ?? current.passedCount),
      failedCount: toCount(result.failedCount ?? current.failedCount),
      skippedCount: toCount(result.skippedCount ?? current.skippedCount),
    };
  }

  /**
   * Record coverage percentages. A null value means "not measured".
   */
  recordCoverage(
    lineCoveragePct: number | null,
    branchCoveragePct: number | null = null,
    functionCoveragePct: number | null = null
  ): void {
    this.record.qualityGates.coverage = {
      lineCoveragePct: toPercentage(lineCoveragePct),
      branchCoveragePct: toPercentage(branchCoveragePct),
      functionCoveragePct: toPercentage(functionCoveragePct),
    };
  }

  recordIdiomaticness(score: IdiomaticnessScore | null, reasoning: string | null = null): void {
    this.record.qualityGates.idiomaticness = score === null ? null : { score, reasoning };
  }

  recordIoContract(input: IoContractInput): void {
    this.record.ioContract = {
      totalTestCases: toCount(input.totalTestCases),
      passed: toCount(input.passed),
      failed: toCount(input.failed ?? 0),
      unsupported: toCount(input.unsupported ?? 0),
      featureResults: (input.featureResults ?? []).map((result) => ({ ...result })),
    };
  }

  // --------------------------------------------------------------------------
  // Outcome
  // --------------------------------------------------------------------------

  setOutcome(
    status: RunStatus,
    modulesCompleted: number = 0,
    modulesTotal: number = 0,
    blockingIssues: string[] = [],
    notes: string | null = null
  ): void {
    this.record.outcome = {
      status,
      modulesCompleted: toCount(modulesCompleted),
      modulesTotal: toCount(modulesTotal),
      blockingIssues: [...blockingIssues],
      notes,
    };
  }

  /**
   * Freeze the accumulated metrics into an independent, immutable record.
   * May be called repeatedly; each call stamps a fresh completion time.
   */
  finalize(): RunRecord {
    const now = Date.now();
    const wallClockDurationMs = this.wallClockFromResult
      ? this.record.timing.wallClockDurationMs
      : Math.max(0, now - this.startInstant);

    const snapshot: RunRecord = structuredClone({
      ...this.record,
      identity: { ...this.record.identity, completedAt: new Date(now).toISOString() },
      timing: { ...this.record.timing, wallClockDurationMs },
      agent: { ...this.record.agent, totalMessages: this.messageCount },
    });
    snapshot.timing.phaseDurationsMs = Object.fromEntries(this.phaseDurations);
    snapshot.agent.toolInvocations = Object.fromEntries(this.toolCounts);
    snapshot.agent.subagentInvocations = Object.fromEntries(this.subagentCounts);

    log.debug(
      { runId: this.runId, status: snapshot.outcome.status, wallClockDurationMs },
      'Finalized run record'
    );
    return freezeRunRecord(snapshot);
  }
}
