// Run Record Types
export {
  SCHEMA_VERSION,
  RunStatus,
  MigrationStrategy,
  IdiomaticnessScore,
  FeatureStatus,
  runStatusSchema,
  idiomaticnessScoreSchema,
  featureStatusSchema,
  runIdentitySchema,
  moduleTimingSchema,
  timingMetricsSchema,
  costMetricsSchema,
  tokenMetricsSchema,
  agentMetricsSchema,
  codeMetricsSchema,
  compilationResultSchema,
  lintingResultSchema,
  formattingResultSchema,
  unitTestResultSchema,
  coverageResultSchema,
  idiomaticnessSchema,
  qualityGatesSchema,
  featureResultSchema,
  ioContractMetricsSchema,
  outcomeMetricsSchema,
  runRecordSchema,
  type RunIdentity,
  type ModuleTiming,
  type TimingMetrics,
  type CostMetrics,
  type TokenMetrics,
  type AgentMetrics,
  type CodeMetrics,
  type CompilationResult,
  type LintingResult,
  type FormattingResult,
  type UnitTestResult,
  type CoverageResult,
  type Idiomaticness,
  type QualityGates,
  type FeatureResult,
  type IoContractMetrics,
  type OutcomeMetrics,
  type RunRecord,
  type DerivedRunRatios,
  type DescribedRunRecord,
} from './run-record.js';
