/**
 * Backfill run records from migration logs written before the collector
 * was wired into the orchestration loop.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { RunRecord } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { MigrationMetricsCollector } from './collector.js';
import { freezeRunRecord } from './serialization.js';

const log = createLogger('log-parser');

const HEADER_LINES = 20;
const UNKNOWN = 'unknown';

const START_PATTERN = /Starting Migration: (\w+) -> (\w+)/;
const STRATEGY_PATTERN = /Strategy: ([\w-]+)/;
const MSG_PATTERN = /\[[\d:]+\] MSG #(\d+)/;
const TOOL_USE_PATTERN = /ToolUseBlock\(.*?name='(\w+)'/;
const TASK_PATTERN = /subagent_type='(\w+)'/;
const RESULT_PATTERN =
  /ResultMessage\(.*?duration_ms=(\d+).*?duration_api_ms=(\d+).*?num_turns=(\d+).*?total_cost_usd=([\d.]+)/;
const USAGE_PATTERN =
  /'input_tokens': (\d+).*?'cache_creation_input_tokens': (\d+).*?'cache_read_input_tokens': (\d+)/;
const OUTPUT_TOKENS_PATTERN = /'output_tokens': (\d+)/;
const SUBTYPE_PATTERN = /subtype='(\w+)'/;
const TIMESTAMP_PATTERN = /\[(\d{2}:\d{2}:\d{2})\]/g;
const FILE_DATE_PATTERN = /migration_(\d{4})(\d{2})(\d{2})_\d{6}/;
const SESSION_PATTERN = /session_id='([^']+)'/;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface LogParseOptions {
  /** Log file name; a `migration_YYYYMMDD_HHMMSS` name dates the timestamps */
  fileName?: string;
  /** Overrides the project named in the log header */
  projectName?: string;
  /** Overrides the strategy named in the log header */
  strategy?: string;
  sourceLanguage?: string;
  schemaVersion?: string;
}

interface LogHeader {
  projectName: string;
  targetLanguage: string;
  strategy: string;
}

interface RunSpan {
  startedAt: string;
  completedAt: string | null;
}

function readHeader(lines: string[]): LogHeader {
  const header: LogHeader = { projectName: UNKNOWN, targetLanguage: UNKNOWN, strategy: UNKNOWN };
  for (const line of lines.slice(0, HEADER_LINES)) {
    const start = START_PATTERN.exec(line);
    if (start?.[1] !== undefined && start[2] !== undefined) {
      header.projectName = start[1];
      header.targetLanguage = start[2];
    }
    const strategy = STRATEGY_PATTERN.exec(line);
    if (strategy?.[1] !== undefined) {
      header.strategy = strategy[1];
    }
  }
  return header;
}

/**
 * Start and end of the run from the first and last `[HH:MM:SS]` stamps,
 * dated by the file name. Times are read as UTC; an end before the start
 * rolls over to the next day.
 */
function readWindow(content: string, fileName: string | undefined): RunSpan | null {
  const date = fileName === undefined ? null : FILE_DATE_PATTERN.exec(fileName);
  if (!date) return null;

  const times = [...content.matchAll(TIMESTAMP_PATTERN)]
    .map((match) => match[1])
    .filter((time): time is string => time !== undefined);
  const first = times[0];
  if (first === undefined) return null;

  const day = `${date[1]}-${date[2]}-${date[3]}`;
  const start = Date.parse(`${day}T${first}Z`);
  if (Number.isNaN(start)) return null;

  const last = times.length > 1 ? times[times.length - 1] : undefined;
  let end = last === undefined ? Number.NaN : Date.parse(`${day}T${last}Z`);
  if (!Number.isNaN(end) && end < start) end += DAY_MS;

  return {
    startedAt: new Date(start).toISOString(),
    completedAt: Number.isNaN(end) ? null : new Date(end).toISOString(),
  };
}

/**
 * Payload for recordResult built from a `ResultMessage(...)` line.
 */
function readResult(line: string): Record<string, unknown> {
  const payload: Record<string, unknown> = {};

  const result = RESULT_PATTERN.exec(line);
  if (result) {
    payload['duration_ms'] = Number(result[1]);
    payload['duration_api_ms'] = Number(result[2]);
    payload['num_turns'] = Number(result[3]);
    payload['total_cost_usd'] = Number(result[4]);
  }

  const usage: Record<string, number> = {};
  const tokens = USAGE_PATTERN.exec(line);
  if (tokens) {
    usage['input_tokens'] = Number(tokens[1]);
    usage['cache_creation_input_tokens'] = Number(tokens[2]);
    usage['cache_read_input_tokens'] = Number(tokens[3]);
  }
  const output = OUTPUT_TOKENS_PATTERN.exec(line);
  if (output) {
    usage['output_tokens'] = Number(output[1]);
  }
  payload['usage'] = usage;

  const subtype = SUBTYPE_PATTERN.exec(line);
  if (subtype?.[1] !== undefined) {
    payload['subtype'] = subtype[1];
  }

  return payload;
}

/**
 * Rebuild a run record from the text of a migration log. Messages, tool
 * uses, sub-agent calls and the final result are replayed through a
 * collector, so the record goes through the same finalize path as a live run.
 */
export function parseMigrationLog(content: string, options: LogParseOptions = {}): RunRecord {
  const lines = content.split(/\r?\n/);
  const header = readHeader(lines);
  const span = readWindow(content, options.fileName);
  const session = SESSION_PATTERN.exec(content);

  const collector = new MigrationMetricsCollector({
    projectName: options.projectName ?? header.projectName,
    sourceLanguage: options.sourceLanguage ?? UNKNOWN,
    targetLanguage: header.targetLanguage,
    strategy: options.strategy ?? header.strategy,
    schemaVersion: options.schemaVersion,
    runId: session?.[1],
    startedAt: span?.startedAt,
  });

  let resultDurationMs = 0;
  for (const line of lines) {
    if (MSG_PATTERN.test(line)) {
      collector.recordMessage();
    }

    const tool = TOOL_USE_PATTERN.exec(line);
    if (tool?.[1] !== undefined) {
      collector.recordToolUse(tool[1]);
    }

    const task = TASK_PATTERN.exec(line);
    if (task?.[1] !== undefined) {
      collector.recordSubagent(task[1]);
    }

    if (line.includes('ResultMessage')) {
      const payload = readResult(line);
      collector.recordResult(payload);
      resultDurationMs = typeof payload['duration_ms'] === 'number' ? payload['duration_ms'] : 0;
    }
  }

  const record = collector.finalize();
  log.debug({ runId: record.identity.runId, fileName: options.fileName }, 'Parsed migration log');
  if (span === null || span.completedAt === null) return record;

  // Timestamps from the log replace the moment of parsing
  const backfilled = structuredClone(record);
  backfilled.identity.completedAt = span.completedAt;
  if (resultDurationMs === 0) {
    backfilled.timing.wallClockDurationMs = Date.parse(span.completedAt) - Date.parse(span.startedAt);
  }
  return freezeRunRecord(backfilled);
}

/**
 * Read and parse a migration log file.
 */
export async function parseMigrationLogFile(
  path: string,
  options: Omit<LogParseOptions, 'fileName'> = {}
): Promise<RunRecord> {
  const content = await readFile(path, 'utf-8');
  return parseMigrationLog(content, { ...options, fileName: basename(path) });
}
