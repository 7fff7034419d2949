import { deriveRunRatios } from '../metrics/derived.js';
import type { DirectoryClassification } from '../classifier/index.js';
import type { AggregateStats } from '../store/index.js';
import type { RunRecord, RunStatus } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

// ============================================================================
// Values
// ============================================================================

/**
 * Format a run status with appropriate color.
 */
export function formatStatus(status: RunStatus): string {
  const statusColors: Record<RunStatus, keyof typeof colors> = {
    success: 'green',
    partial: 'yellow',
    failure: 'red',
  };
  return colorize(status.toUpperCase(), statusColors[status]);
}

/**
 * Format duration in milliseconds to human-readable string.
 */
export function formatDurationMs(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

export function formatCost(usd: number): string {
  return `$${usd.toFixed(2)}`;
}

/**
 * Format a percentage; `n/a` for values that were never measured.
 */
export function formatPercent(value: number | null, digits: number = 1): string {
  return value === null ? 'n/a' : `${value.toFixed(digits)}%`;
}

export function formatCount(count: number): string {
  return count.toLocaleString('en-US');
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

// ============================================================================
// Tables
// ============================================================================

interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const pad = (text: string, col: TableColumn<T>): string =>
    col.align === 'right' ? text.padStart(col.width) : text.padEnd(col.width);

  const lines: string[] = [];
  lines.push(columns.map((col) => bold(pad(col.header, col))).join('  '));
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));
  for (const item of items) {
    lines.push(columns.map((col) => pad(truncate(col.value(item), col.width), col)).join('  '));
  }
  return lines.join('\n');
}

/**
 * Format a list of runs as a table, newest first.
 */
export function formatRunList(records: RunRecord[]): string {
  if (records.length === 0) {
    return dim('No runs found.');
  }

  const columns: TableColumn<RunRecord>[] = [
    { header: 'RUN ID', width: 12, value: (r) => r.identity.runId },
    { header: 'PROJECT', width: 16, value: (r) => r.identity.projectName },
    {
      header: 'MIGRATION',
      width: 18,
      value: (r) => `${r.identity.sourceLanguage} -> ${r.identity.targetLanguage}`,
    },
    { header: 'STRATEGY', width: 18, value: (r) => r.identity.strategy },
    { header: 'STATUS', width: 8, value: (r) => r.outcome.status },
    {
      header: 'DURATION',
      width: 9,
      align: 'right',
      value: (r) => formatDurationMs(r.timing.wallClockDurationMs),
    },
    { header: 'COST', width: 8, align: 'right', value: (r) => formatCost(r.cost.totalCostUsd) },
  ];

  return formatTable(records, columns);
}

// ============================================================================
// Details
// ============================================================================

function sortedCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

/**
 * Format a single run for detailed display.
 */
export function formatRunDetail(record: RunRecord): string {
  const { identity, timing, cost, tokens, agent, outcome, qualityGates } = record;
  const derived = deriveRunRatios(record);
  const lines: string[] = [];

  lines.push(bold(`Run: ${identity.runId}`));
  lines.push(dim('─'.repeat(60)));
  lines.push(`${bold('Project:')}     ${identity.projectName}`);
  lines.push(`${bold('Migration:')}   ${identity.sourceLanguage} -> ${identity.targetLanguage}`);
  lines.push(`${bold('Strategy:')}    ${identity.strategy}`);
  lines.push(`${bold('Status:')}      ${formatStatus(outcome.status)}`);
  lines.push(`${bold('Started:')}     ${identity.startedAt}`);
  lines.push(`${bold('Completed:')}   ${identity.completedAt ?? dim('in progress')}`);
  lines.push(`${bold('Duration:')}    ${formatDurationMs(timing.wallClockDurationMs)}`);
  lines.push(`${bold('Cost:')}        ${formatCost(cost.totalCostUsd)}`);
  lines.push('');

  const phases = Object.entries(timing.phaseDurationsMs);
  if (phases.length > 0) {
    lines.push(bold('Phases:'));
    for (const [name, durationMs] of phases) {
      lines.push(`  ${name.padEnd(14)} ${formatDurationMs(durationMs)}`);
    }
    lines.push('');
  }

  if (timing.moduleDurations.length > 0) {
    lines.push(bold('Modules:'));
    for (const entry of timing.moduleDurations) {
      const attempts = entry.attempts > 1 ? dim(` (${entry.attempts} attempts)`) : '';
      lines.push(`  ${entry.moduleName.padEnd(14)} ${formatDurationMs(entry.durationMs)}${attempts}`);
    }
    lines.push('');
  }

  lines.push(bold('Tokens:'));
  lines.push(`  Input:        ${formatCount(tokens.inputTokens)}`);
  lines.push(`  Output:       ${formatCount(tokens.outputTokens)}`);
  lines.push(`  Cache write:  ${formatCount(tokens.cacheCreationInputTokens)}`);
  lines.push(`  Cache read:   ${formatCount(tokens.cacheReadInputTokens)}`);
  lines.push(`  Cache ratio:  ${formatPercent(derived.cacheEfficiencyRatio * 100)}`);
  lines.push('');

  lines.push(bold('Agent:'));
  lines.push(`  Turns: ${agent.totalTurns}  Messages: ${agent.totalMessages}  Retries: ${agent.retryCount}`);
  for (const [tool, count] of sortedCounts(agent.toolInvocations)) {
    lines.push(`  ${cyan(tool.padEnd(14))} ${count}`);
  }
  for (const [role, count] of sortedCounts(agent.subagentInvocations)) {
    lines.push(`  ${blue(role.padEnd(14))} ${count}`);
  }
  lines.push('');

  lines.push(bold('Code:'));
  lines.push(
    `  Source:  ${formatCount(record.sourceMetrics.productionLoc)} prod / ${formatCount(record.sourceMetrics.testLoc)} test`
  );
  lines.push(
    `  Target:  ${formatCount(record.targetMetrics.productionLoc)} prod / ${formatCount(record.targetMetrics.testLoc)} test`
  );
  lines.push(`  Expansion: ${derived.locExpansionRatio.toFixed(2)}x`);
  lines.push('');

  lines.push(bold('Quality:'));
  lines.push(`  Match rate:   ${formatPercent(derived.matchRate * 100)}`);
  lines.push(`  Coverage:     ${formatPercent(qualityGates.coverage.lineCoveragePct)}`);
  if (qualityGates.idiomaticness !== null) {
    lines.push(`  Idiomatic:    ${qualityGates.idiomaticness.score}`);
  }

  if (outcome.blockingIssues.length > 0) {
    lines.push('');
    lines.push(bold(red('Blocking issues:')));
    for (const issue of outcome.blockingIssues) {
      lines.push(`  ${red('•')} ${issue}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format aggregate statistics over a set of runs.
 */
export function formatAggregateStats(stats: AggregateStats, title: string = 'All runs'): string {
  const lines: string[] = [];
  lines.push(bold(`${title} (${stats.count} run${stats.count === 1 ? '' : 's'})`));
  lines.push(`  Duration:     avg ${formatDurationMs(stats.avgDurationMs)}, median ${formatDurationMs(stats.medianDurationMs)}, p95 ${formatDurationMs(stats.p95DurationMs)}`);
  lines.push(`  Cost:         total ${formatCost(stats.totalCostUsd)}, avg ${formatCost(stats.avgCostUsd)}`);
  lines.push(`  Success rate: ${formatPercent(stats.successRatePct)}`);
  lines.push(`  Match rate:   ${formatPercent(stats.avgIoMatchRate * 100)}`);
  lines.push(`  Coverage:     ${formatPercent(stats.avgCoveragePct)}`);
  lines.push(
    `  Expansion:    ${stats.avgLocExpansion === null ? 'n/a' : `${stats.avgLocExpansion.toFixed(2)}x`}`
  );
  return lines.join('\n');
}

export function formatGroupedStats(groups: Record<string, AggregateStats>, field: string): string {
  const entries = Object.entries(groups);
  if (entries.length === 0) {
    return dim('No runs found.');
  }
  return entries.map(([value, stats]) => formatAggregateStats(stats, `${field}: ${value}`)).join('\n\n');
}

/**
 * Format a directory classification summary.
 */
export function formatClassification(result: DirectoryClassification, language: string): string {
  return [
    bold(`${language} (${result.fileCount} file${result.fileCount === 1 ? '' : 's'})`),
    `  Production: ${formatCount(result.productionLoc)}`,
    `  Test:       ${formatCount(result.testLoc)}`,
    `  Total:      ${formatCount(result.productionLoc + result.testLoc)}`,
  ].join('\n');
}

// ============================================================================
// Messages
// ============================================================================

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
