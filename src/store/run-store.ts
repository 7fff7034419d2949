/**
 * Persistent aggregate store for run records, backed by SQLite.
 *
 * One row per run, keyed by run id. Frequently filtered fields are copied
 * into indexed columns; the full record lives in `metrics_json`. Every
 * operation opens its own connection and runs in a single transaction.
 */

import { mkdirSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';

import { matchRate } from '../metrics/derived.js';
import { describeRunRecord, parseRunRecord, runRecordFromJson } from '../metrics/serialization.js';
import type { RunRecord, RunStatus } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { InvalidGroupFieldError } from './errors.js';
import { mean, median, percentile, sortAscending } from './statistics.js';

const log = createLogger('run-store');

export const DEFAULT_QUERY_LIMIT = 100;

// ============================================================================
// Types
// ============================================================================

export interface RunStoreOptions {
  /** SQLite database file; parent directories are created */
  dbPath: string;
  /** Version tag written into the schema_version column */
  schemaVersion: string;
  /** Limit used by query() when none is given */
  defaultLimit?: number;
}

/**
 * Conjunction of optional filters. `since`/`until` are inclusive
 * ISO-8601 bounds on the start time.
 */
export interface RunQueryFilters {
  project?: string;
  target?: string;
  strategy?: string;
  status?: RunStatus;
  since?: string;
  until?: string;
}

export interface AggregateStats {
  count: number;
  avgDurationMs: number;
  medianDurationMs: number;
  p95DurationMs: number;
  totalCostUsd: number;
  avgCostUsd: number;
  /** Mean behavioral match rate (0-1) */
  avgIoMatchRate: number;
  /** Null when no run recorded line coverage */
  avgCoveragePct: number | null;
  successRatePct: number;
  /** Null when every run had zero source LOC */
  avgLocExpansion: number | null;
}

/**
 * Fields runs can be grouped by, mapped to their columns
 */
export const GROUP_FIELDS = {
  project: 'project_name',
  target: 'target_language',
  strategy: 'strategy',
} as const;

export type GroupField = keyof typeof GROUP_FIELDS;

// ============================================================================
// Table definition
// ============================================================================

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS migrations (
    run_id            TEXT PRIMARY KEY,
    project_name      TEXT NOT NULL,
    source_language   TEXT NOT NULL,
    target_language   TEXT NOT NULL,
    strategy          TEXT NOT NULL,
    started_at        TEXT NOT NULL,
    completed_at      TEXT,
    duration_ms       REAL,
    cost_usd          REAL,
    io_match_rate     REAL,
    line_coverage_pct REAL,
    status            TEXT NOT NULL,
    source_loc        INTEGER,
    target_loc        INTEGER,
    schema_version    TEXT,
    metrics_json      TEXT NOT NULL,
    created_at        TEXT DEFAULT CURRENT_TIMESTAMP
  )
`;

const CREATE_INDEXES = `
  CREATE INDEX IF NOT EXISTS idx_project ON migrations(project_name);
  CREATE INDEX IF NOT EXISTS idx_target ON migrations(target_language);
  CREATE INDEX IF NOT EXISTS idx_strategy ON migrations(strategy);
  CREATE INDEX IF NOT EXISTS idx_started ON migrations(started_at);
  CREATE INDEX IF NOT EXISTS idx_status ON migrations(status);
`;

/**
 * Columns added after the first release. Databases created earlier gain
 * them on open; nothing is ever dropped or rewritten.
 */
export const ADDITIVE_COLUMNS: ReadonlyArray<{ name: string; type: string }> = [
  { name: 'line_coverage_pct', type: 'REAL' },
  { name: 'schema_version', type: 'TEXT' },
];

// ============================================================================
// Row shapes
// ============================================================================

const recordRowSchema = z.object({
  run_id: z.string(),
  metrics_json: z.string(),
});

const tableInfoSchema = z.array(z.object({ name: z.string() }));

const aggregateRowSchema = z.object({
  count: z.number(),
  total_cost: z.number().nullable(),
  avg_cost: z.number().nullable(),
  avg_match_rate: z.number().nullable(),
  avg_coverage: z.number().nullable(),
  success_rate: z.number().nullable(),
  avg_loc_expansion: z.number().nullable(),
});

const durationRowSchema = z.object({ duration_ms: z.number() });
const countRowSchema = z.object({ count: z.number() });
const valueRowSchema = z.object({ value: z.string() });

interface WhereClause {
  sql: string;
  params: Array<string | number>;
}

function buildWhere(filters: RunQueryFilters): WhereClause {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  const equalities: Array<[string | undefined, string]> = [
    [filters.project, 'project_name'],
    [filters.target, 'target_language'],
    [filters.strategy, 'strategy'],
    [filters.status, 'status'],
  ];
  for (const [value, column] of equalities) {
    if (value !== undefined) {
      conditions.push(`${column} = ?`);
      params.push(value);
    }
  }
  if (filters.since !== undefined) {
    conditions.push('started_at >= ?');
    params.push(filters.since);
  }
  if (filters.until !== undefined) {
    conditions.push('started_at <= ?');
    params.push(filters.until);
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

function isGroupField(field: string): field is GroupField {
  return Object.prototype.hasOwnProperty.call(GROUP_FIELDS, field);
}

/**
 * Accepts the group field names and their column names.
 */
function resolveGroupField(field: string): GroupField {
  if (isGroupField(field)) return field;
  for (const [name, column] of Object.entries(GROUP_FIELDS)) {
    if (column === field && isGroupField(name)) return name;
  }
  const allowed = new Set<string>([...Object.keys(GROUP_FIELDS), ...Object.values(GROUP_FIELDS)]);
  throw new InvalidGroupFieldError(field, [...allowed]);
}

// ============================================================================
// Store
// ============================================================================

export class RunStore {
  readonly dbPath: string;
  readonly schemaVersion: string;
  private readonly defaultLimit: number;

  constructor(options: RunStoreOptions) {
    this.dbPath = options.dbPath;
    this.schemaVersion = options.schemaVersion;
    this.defaultLimit = options.defaultLimit ?? DEFAULT_QUERY_LIMIT;

    mkdirSync(dirname(this.dbPath), { recursive: true });
    this.migrate();
  }

  /**
   * Open a connection, run `fn` inside one transaction, close.
   */
  private withConnection<T>(fn: (db: Database.Database) => T): T {
    const db = new Database(this.dbPath);
    try {
      return db.transaction(() => fn(db))();
    } finally {
      db.close();
    }
  }

  private migrate(): void {
    this.withConnection((db) => {
      db.exec(CREATE_TABLE);

      const existing = new Set(
        tableInfoSchema.parse(db.pragma('table_info(migrations)')).map((column) => column.name)
      );
      for (const column of ADDITIVE_COLUMNS) {
        if (existing.has(column.name)) continue;
        try {
          db.exec(`ALTER TABLE migrations ADD COLUMN ${column.name} ${column.type}`);
          log.info({ column: column.name, dbPath: this.dbPath }, 'Added column');
        } catch (error) {
          if (error instanceof Error && error.message.includes('duplicate column')) {
            log.debug({ column: column.name }, 'Column already present');
            continue;
          }
          throw error;
        }
      }

      db.exec(CREATE_INDEXES);
    });
  }

  /**
   * Insert a run, replacing any earlier row with the same run id.
   * @throws RunRecordParseError if the record fails validation
   */
  insert(record: RunRecord): void {
    const validated = runRecordFromJson(record, record.identity.runId);
    const { identity, timing, cost, qualityGates, outcome } = validated;

    this.withConnection((db) => {
      db.prepare(
        `INSERT OR REPLACE INTO migrations (
          run_id, project_name, source_language, target_language, strategy,
          started_at, completed_at, duration_ms, cost_usd, io_match_rate,
          line_coverage_pct, status, source_loc, target_loc, schema_version, metrics_json
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        identity.runId,
        identity.projectName,
        identity.sourceLanguage,
        identity.targetLanguage,
        identity.strategy,
        identity.startedAt,
        identity.completedAt,
        timing.wallClockDurationMs,
        cost.totalCostUsd,
        matchRate(validated.ioContract),
        qualityGates.coverage.lineCoveragePct,
        outcome.status,
        validated.sourceMetrics.productionLoc,
        validated.targetMetrics.productionLoc,
        this.schemaVersion,
        JSON.stringify(validated)
      );
    });

    log.debug({ runId: identity.runId }, 'Inserted run');
  }

  /**
   * Point lookup; null when the run is unknown.
   * @throws RunRecordParseError if the stored JSON is corrupt
   */
  get(runId: string): RunRecord | null {
    const row = this.withConnection((db) =>
      db.prepare('SELECT run_id, metrics_json FROM migrations WHERE run_id = ?').get(runId)
    );
    if (row === undefined) return null;

    const { run_id, metrics_json } = recordRowSchema.parse(row);
    return parseRunRecord(metrics_json, run_id);
  }

  /**
   * Runs matching all filters, newest first.
   */
  query(filters: RunQueryFilters = {}, limit: number = this.defaultLimit): RunRecord[] {
    const where = buildWhere(filters);
    const rows = this.withConnection((db) =>
      db
        .prepare(
          `SELECT run_id, metrics_json FROM migrations ${where.sql} ORDER BY started_at DESC LIMIT ?`
        )
        .all(...where.params, limit)
    );

    return z
      .array(recordRowSchema)
      .parse(rows)
      .map((row) => parseRunRecord(row.metrics_json, row.run_id));
  }

  /**
   * Summary statistics over the matching runs; null when none match.
   */
  aggregate(filters: RunQueryFilters = {}): AggregateStats | null {
    return this.withConnection((db) => this.aggregateWith(db, filters));
  }

  /**
   * Aggregate statistics for each distinct value of a field, over the runs
   * matching `filters`.
   * @throws InvalidGroupFieldError for fields outside project/target/strategy
   */
  groupBy(field: string, filters: RunQueryFilters = {}): Record<string, AggregateStats> {
    const groupField = resolveGroupField(field);
    const column = GROUP_FIELDS[groupField];
    const where = buildWhere(filters);

    return this.withConnection((db) => {
      const values = z
        .array(valueRowSchema)
        .parse(
          db
            .prepare(`SELECT DISTINCT ${column} AS value FROM migrations ${where.sql} ORDER BY value`)
            .all(...where.params)
        )
        .map((row) => row.value);

      const groups = new Map<string, AggregateStats>();
      for (const value of values) {
        const groupFilters: RunQueryFilters = { ...filters };
        groupFilters[groupField] = value;
        const stats = this.aggregateWith(db, groupFilters);
        if (stats !== null) groups.set(value, stats);
      }
      return Object.fromEntries(groups);
    });
  }

  private aggregateWith(db: Database.Database, filters: RunQueryFilters): AggregateStats | null {
    const where = buildWhere(filters);
    const row = aggregateRowSchema.parse(
      db
        .prepare(
          `SELECT
            COUNT(*) AS count,
            SUM(cost_usd) AS total_cost,
            AVG(cost_usd) AS avg_cost,
            AVG(io_match_rate) AS avg_match_rate,
            AVG(line_coverage_pct) AS avg_coverage,
            AVG(CASE WHEN status = 'success' THEN 1.0 ELSE 0.0 END) * 100 AS success_rate,
            AVG(CAST(target_loc AS REAL) / NULLIF(source_loc, 0)) AS avg_loc_expansion
          FROM migrations ${where.sql}`
        )
        .get(...where.params)
    );
    if (row.count === 0) return null;

    const durationCondition = where.sql
      ? `${where.sql} AND duration_ms IS NOT NULL`
      : 'WHERE duration_ms IS NOT NULL';
    const durations = sortAscending(
      z
        .array(durationRowSchema)
        .parse(db.prepare(`SELECT duration_ms FROM migrations ${durationCondition}`).all(...where.params))
        .map((r) => r.duration_ms)
    );

    return {
      count: row.count,
      avgDurationMs: mean(durations) ?? 0,
      medianDurationMs: median(durations) ?? 0,
      p95DurationMs: percentile(durations, 95) ?? 0,
      totalCostUsd: row.total_cost ?? 0,
      avgCostUsd: row.avg_cost ?? 0,
      avgIoMatchRate: row.avg_match_rate ?? 0,
      avgCoveragePct: row.avg_coverage,
      successRatePct: row.success_rate ?? 0,
      avgLocExpansion: row.avg_loc_expansion,
    };
  }

  count(): number {
    const row = this.withConnection((db) => db.prepare('SELECT COUNT(*) AS count FROM migrations').get());
    return countRowSchema.parse(row).count;
  }

  /**
   * Remove a run; false when it did not exist.
   */
  delete(runId: string): boolean {
    const result = this.withConnection((db) =>
      db.prepare('DELETE FROM migrations WHERE run_id = ?').run(runId)
    );
    if (result.changes > 0) {
      log.debug({ runId }, 'Deleted run');
      return true;
    }
    return false;
  }

  listProjects(): string[] {
    return this.distinct('project_name');
  }

  listTargets(): string[] {
    return this.distinct('target_language');
  }

  private distinct(column: 'project_name' | 'target_language'): string[] {
    const rows = this.withConnection((db) =>
      db.prepare(`SELECT DISTINCT ${column} AS value FROM migrations ORDER BY value`).all()
    );
    return z
      .array(valueRowSchema)
      .parse(rows)
      .map((row) => row.value);
  }

  /**
   * Write every stored run, with derived ratios, to a JSON file.
   * @returns Number of runs exported
   */
  async exportToJson(outputPath: string): Promise<number> {
    const rows = this.withConnection((db) =>
      db.prepare('SELECT run_id, metrics_json FROM migrations ORDER BY started_at DESC').all()
    );
    const migrations = z
      .array(recordRowSchema)
      .parse(rows)
      .map((row) => describeRunRecord(parseRunRecord(row.metrics_json, row.run_id)));

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(
      outputPath,
      JSON.stringify({ exportedAt: new Date().toISOString(), count: migrations.length, migrations }, null, 2)
    );

    log.info({ outputPath, count: migrations.length }, 'Exported runs');
    return migrations.length;
  }
}
