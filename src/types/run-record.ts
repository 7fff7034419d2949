import { z } from 'zod';

/**
 * Default schema version tag written on new run records.
 * The store receives the version it writes through configuration.
 */
export const SCHEMA_VERSION = '1.0.0';

const counter = z.number().int().nonnegative();
const amount = z.number().nonnegative();
const percentage = z.number().min(0).max(100);

// ============================================================================
// Constants
// ============================================================================

/**
 * Final status of a migration run
 */
export const RunStatus = {
  SUCCESS: 'success',
  PARTIAL: 'partial',
  FAILURE: 'failure',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export const runStatusSchema = z.enum(['success', 'partial', 'failure']);

/**
 * Strategies an orchestrator uses to slice a migration
 */
export const MigrationStrategy = {
  MODULE_BY_MODULE: 'module-by-module',
  FEATURE_BY_FEATURE: 'feature-by-feature',
} as const;

export type MigrationStrategy = (typeof MigrationStrategy)[keyof typeof MigrationStrategy];

/**
 * Categorical judgment of how idiomatic the generated code reads
 */
export const IdiomaticnessScore = {
  IDIOMATIC: 'Idiomatic',
  ACCEPTABLE: 'Acceptable',
  NON_IDIOMATIC: 'Non-idiomatic',
} as const;

export type IdiomaticnessScore = (typeof IdiomaticnessScore)[keyof typeof IdiomaticnessScore];

export const idiomaticnessScoreSchema = z.enum(['Idiomatic', 'Acceptable', 'Non-idiomatic']);

/**
 * Support status of one feature in the behavioral contract
 */
export const FeatureStatus = {
  SUPPORTED: 'SUPPORTED',
  NOT_SUPPORTED: 'NOT_SUPPORTED',
  PARTIAL: 'PARTIAL',
} as const;

export type FeatureStatus = (typeof FeatureStatus)[keyof typeof FeatureStatus];

export const featureStatusSchema = z.enum(['SUPPORTED', 'NOT_SUPPORTED', 'PARTIAL']);

// ============================================================================
// Identity
// ============================================================================

/**
 * Who and what a run migrated. Assigned once when the run starts.
 */
export const runIdentitySchema = z.object({
  /** Unique run identifier */
  runId: z.string().min(1),
  /** Name of the migrated project */
  projectName: z.string(),
  sourceLanguage: z.string(),
  targetLanguage: z.string(),
  /** Strategy tag, usually one of MigrationStrategy */
  strategy: z.string(),
  /** ISO-8601 start time */
  startedAt: z.string().datetime(),
  /** ISO-8601 completion time, null while the run is in flight */
  completedAt: z.string().datetime().nullable(),
  /** Platform the run executed on */
  hostPlatform: z.string().nullable(),
  /** Version of the agent SDK that drove the run */
  sdkVersion: z.string().nullable(),
  /** Model used by the agents */
  modelId: z.string().nullable(),
});

export type RunIdentity = z.infer<typeof runIdentitySchema>;

// ============================================================================
// Timing
// ============================================================================

export const moduleTimingSchema = z.object({
  moduleName: z.string(),
  durationMs: amount,
  /** Attempts it took to finish the module (1-based) */
  attempts: z.number().int().positive(),
});

export type ModuleTiming = z.infer<typeof moduleTimingSchema>;

export const timingMetricsSchema = z.object({
  /** Total wall-clock duration */
  wallClockDurationMs: amount,
  /** Time spent waiting on remote model calls */
  apiDurationMs: amount,
  /** Duration per named phase */
  phaseDurationsMs: z.record(amount),
  /** Per-module timings in completion order */
  moduleDurations: z.array(moduleTimingSchema),
});

export type TimingMetrics = z.infer<typeof timingMetricsSchema>;

// ============================================================================
// Cost and Tokens
// ============================================================================

export const costMetricsSchema = z.object({
  totalCostUsd: amount,
  inputTokensCostUsd: amount,
  outputTokensCostUsd: amount,
  cacheCreationCostUsd: amount,
});

export type CostMetrics = z.infer<typeof costMetricsSchema>;

export const tokenMetricsSchema = z.object({
  /** Freshly processed input tokens */
  inputTokens: counter,
  outputTokens: counter,
  /** Tokens written to the prompt cache */
  cacheCreationInputTokens: counter,
  /** Tokens served from the prompt cache */
  cacheReadInputTokens: counter,
});

export type TokenMetrics = z.infer<typeof tokenMetricsSchema>;

// ============================================================================
// Agent Activity
// ============================================================================

export const agentMetricsSchema = z.object({
  totalTurns: counter,
  totalMessages: counter,
  /** Invocation count per tool name */
  toolInvocations: z.record(counter),
  /** Invocation count per sub-agent role */
  subagentInvocations: z.record(counter),
  errorRecoveryEvents: counter,
  retryCount: counter,
});

export type AgentMetrics = z.infer<typeof agentMetricsSchema>;

// ============================================================================
// Code Metrics
// ============================================================================

/**
 * Size and complexity of one code base (source or target)
 */
export const codeMetricsSchema = z.object({
  productionLoc: counter,
  testLoc: counter,
  totalLoc: counter,
  /** Number of files or modules */
  moduleCount: counter,
  functionCount: counter,
  avgCyclomaticComplexity: amount,
  maxCyclomaticComplexity: counter,
  externalDependencies: counter,
  /** 0-100, higher is better; null when not measured */
  maintainabilityIndex: percentage.nullable(),
});

export type CodeMetrics = z.infer<typeof codeMetricsSchema>;

// ============================================================================
// Quality Gates
// ============================================================================

export const compilationResultSchema = z.object({
  passed: z.boolean(),
  errorCount: counter,
  warningCount: counter,
});

export const lintingResultSchema = z.object({
  passed: z.boolean(),
  /** Linter that produced the result, e.g. clippy */
  tool: z.string(),
  errorCount: counter,
  warningCount: counter,
});

export const formattingResultSchema = z.object({
  passed: z.boolean(),
  tool: z.string(),
});

export const unitTestResultSchema = z.object({
  passed: z.boolean(),
  total: counter,
  passedCount: counter,
  failedCount: counter,
  skippedCount: counter,
});

export const coverageResultSchema = z.object({
  lineCoveragePct: percentage.nullable(),
  branchCoveragePct: percentage.nullable(),
  functionCoveragePct: percentage.nullable(),
});

export const idiomaticnessSchema = z.object({
  score: idiomaticnessScoreSchema,
  reasoning: z.string().nullable(),
});

export const qualityGatesSchema = z.object({
  compilation: compilationResultSchema,
  linting: lintingResultSchema,
  formatting: formattingResultSchema,
  unitTests: unitTestResultSchema,
  coverage: coverageResultSchema,
  /** Null when no judgment was made */
  idiomaticness: idiomaticnessSchema.nullable(),
});

export type CompilationResult = z.infer<typeof compilationResultSchema>;
export type LintingResult = z.infer<typeof lintingResultSchema>;
export type FormattingResult = z.infer<typeof formattingResultSchema>;
export type UnitTestResult = z.infer<typeof unitTestResultSchema>;
export type CoverageResult = z.infer<typeof coverageResultSchema>;
export type Idiomaticness = z.infer<typeof idiomaticnessSchema>;
export type QualityGates = z.infer<typeof qualityGatesSchema>;

// ============================================================================
// Behavioral Contract
// ============================================================================

export const featureResultSchema = z.object({
  feature: z.string(),
  testCount: counter,
  passed: counter,
  status: featureStatusSchema,
});

export type FeatureResult = z.infer<typeof featureResultSchema>;

/**
 * Input/output test cases replayed against the migrated program
 */
export const ioContractMetricsSchema = z.object({
  totalTestCases: counter,
  passed: counter,
  failed: counter,
  unsupported: counter,
  featureResults: z.array(featureResultSchema),
});

export type IoContractMetrics = z.infer<typeof ioContractMetricsSchema>;

// ============================================================================
// Outcome
// ============================================================================

export const outcomeMetricsSchema = z.object({
  status: runStatusSchema,
  modulesCompleted: counter,
  modulesTotal: counter,
  blockingIssues: z.array(z.string()),
  notes: z.string().nullable(),
});

export type OutcomeMetrics = z.infer<typeof outcomeMetricsSchema>;

// ============================================================================
// Run Record
// ============================================================================

/**
 * Canonical record of one migration run. Derived ratios are computed
 * on read and never stored here.
 */
export const runRecordSchema = z.object({
  schemaVersion: z.string().min(1),
  identity: runIdentitySchema,
  timing: timingMetricsSchema,
  cost: costMetricsSchema,
  tokens: tokenMetricsSchema,
  agent: agentMetricsSchema,
  sourceMetrics: codeMetricsSchema,
  targetMetrics: codeMetricsSchema,
  qualityGates: qualityGatesSchema,
  ioContract: ioContractMetricsSchema,
  outcome: outcomeMetricsSchema,
});

export type RunRecord = z.infer<typeof runRecordSchema>;

/**
 * Ratios computed from a run record at read time
 */
export interface DerivedRunRatios {
  cacheEfficiencyRatio: number;
  matchRate: number;
  locExpansionRatio: number;
  costPerLoc: number;
}

/**
 * A run record with its derived ratios attached, for human-facing exports
 */
export type DescribedRunRecord = RunRecord & { derived: DerivedRunRatios };
