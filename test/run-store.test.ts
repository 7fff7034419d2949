/**
 * Run Store Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { RunRecordParseError, serializeRunRecord } from '../src/metrics/index.js';
import { InvalidGroupFieldError, RunStore } from '../src/store/index.js';
import { createDetailedRunRecord, createMockRunRecord } from './helpers/run-records.js';

const columnSchema = z.array(z.object({ name: z.string() }));

function columnNames(dbPath: string): string[] {
  const db = new Database(dbPath);
  try {
    return columnSchema.parse(db.pragma('table_info(migrations)')).map((column) => column.name);
  } finally {
    db.close();
  }
}

describe('RunStore', () => {
  let testDir: string;
  let dbPath: string;
  let store: RunStore;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'migrascope-store-'));
    dbPath = join(testDir, 'nested', 'migrations.db');
    store = new RunStore({ dbPath, schemaVersion: '1.0.0' });
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  function seedThreeRuns(): void {
    store.insert(
      createMockRunRecord({
        runId: 'r1',
        projectName: 'calc',
        targetLanguage: 'rust',
        startedAt: '2026-01-01T10:00:00.000Z',
        durationMs: 60000,
        costUsd: 1,
        status: 'success',
        lineCoveragePct: 80,
        ioPassed: 10,
        ioTotal: 10,
      })
    );
    store.insert(
      createMockRunRecord({
        runId: 'r2',
        projectName: 'calc',
        targetLanguage: 'java',
        startedAt: '2026-01-02T10:00:00.000Z',
        durationMs: 120000,
        costUsd: 2,
        status: 'failure',
        lineCoveragePct: null,
        ioPassed: 5,
        ioTotal: 10,
      })
    );
    store.insert(
      createMockRunRecord({
        runId: 'r3',
        projectName: 'ledger',
        targetLanguage: 'java',
        startedAt: '2026-01-03T10:00:00.000Z',
        durationMs: 180000,
        costUsd: 3,
        status: 'success',
        lineCoveragePct: 60,
        sourceLoc: 0,
        ioPassed: 0,
        ioTotal: 0,
      })
    );
  }

  describe('insert and get', () => {
    it('should create the database under missing directories', () => {
      expect(store.count()).toBe(0);
      expect(columnNames(dbPath)).toContain('metrics_json');
    });

    it('should round-trip a detailed record', () => {
      const record = createDetailedRunRecord();
      store.insert(record);

      expect(store.get('detailed-run')).toEqual(record);
    });

    it('should return null for an unknown run', () => {
      expect(store.get('missing')).toBeNull();
    });

    it('should replace a run inserted twice', () => {
      store.insert(createMockRunRecord({ runId: 'dup', costUsd: 1 }));
      store.insert(createMockRunRecord({ runId: 'dup', costUsd: 5 }));

      expect(store.count()).toBe(1);
      expect(store.get('dup')?.cost.totalCostUsd).toBe(5);
    });

    it('should reject an invalid record', () => {
      const record = createMockRunRecord({ runId: 'bad' });
      record.tokens.outputTokens = -1;

      expect(() => store.insert(record)).toThrow(RunRecordParseError);
      expect(store.count()).toBe(0);
    });

    it('should fail loudly on a corrupt stored record', () => {
      store.insert(createMockRunRecord({ runId: 'corrupt' }));
      const db = new Database(dbPath);
      try {
        db.prepare("UPDATE migrations SET metrics_json = '{broken' WHERE run_id = 'corrupt'").run();
      } finally {
        db.close();
      }

      expect(() => store.get('corrupt')).toThrow(RunRecordParseError);
    });

    it('should write the configured schema version into its column', () => {
      const versioned = new RunStore({ dbPath, schemaVersion: '2.1.0' });
      versioned.insert(createMockRunRecord({ runId: 'v2' }));

      const db = new Database(dbPath);
      try {
        const row = z
          .object({ schema_version: z.string() })
          .parse(db.prepare("SELECT schema_version FROM migrations WHERE run_id = 'v2'").get());
        expect(row.schema_version).toBe('2.1.0');
      } finally {
        db.close();
      }
    });
  });

  describe('query', () => {
    beforeEach(() => {
      seedThreeRuns();
    });

    it('should return runs newest first', () => {
      expect(store.query().map((record) => record.identity.runId)).toEqual(['r3', 'r2', 'r1']);
    });

    it('should combine filters', () => {
      const runs = store.query({ project: 'calc', target: 'java' });
      expect(runs.map((record) => record.identity.runId)).toEqual(['r2']);
    });

    it('should filter by status', () => {
      expect(store.query({ status: 'success' }).map((record) => record.identity.runId)).toEqual(['r3', 'r1']);
    });

    it('should apply inclusive time bounds', () => {
      const runs = store.query({ since: '2026-01-02T10:00:00.000Z', until: '2026-01-03T10:00:00.000Z' });
      expect(runs.map((record) => record.identity.runId)).toEqual(['r3', 'r2']);
    });

    it('should honor the limit', () => {
      expect(store.query({}, 1).map((record) => record.identity.runId)).toEqual(['r3']);
    });

    it('should use the configured default limit', () => {
      const limited = new RunStore({ dbPath, schemaVersion: '1.0.0', defaultLimit: 2 });
      expect(limited.query()).toHaveLength(2);
    });

    it('should return an empty list when nothing matches', () => {
      expect(store.query({ project: 'none' })).toEqual([]);
    });
  });

  describe('aggregate', () => {
    beforeEach(() => {
      seedThreeRuns();
    });

    it('should summarize every run', () => {
      const stats = store.aggregate();

      expect(stats).not.toBeNull();
      expect(stats?.count).toBe(3);
      expect(stats?.avgDurationMs).toBe(120000);
      expect(stats?.medianDurationMs).toBe(120000);
      expect(stats?.p95DurationMs).toBeCloseTo(174000, 6);
      expect(stats?.totalCostUsd).toBe(6);
      expect(stats?.avgCostUsd).toBe(2);
    });

    it('should average coverage over runs that measured it', () => {
      expect(store.aggregate()?.avgCoveragePct).toBe(70);
    });

    it('should report the success rate as a percentage', () => {
      expect(store.aggregate({ project: 'calc' })?.successRatePct).toBe(50);
    });

    it('should skip runs without source loc in the expansion average', () => {
      expect(store.aggregate()?.avgLocExpansion).toBe(1.5);
    });

    it('should average the io match rate', () => {
      expect(store.aggregate({ project: 'calc' })?.avgIoMatchRate).toBe(0.75);
    });

    it('should aggregate only matching runs', () => {
      const stats = store.aggregate({ target: 'rust' });

      expect(stats?.count).toBe(1);
      expect(stats?.totalCostUsd).toBe(1);
      expect(stats?.p95DurationMs).toBe(60000);
    });

    it('should return null when nothing matches', () => {
      expect(store.aggregate({ project: 'none' })).toBeNull();
    });

    it('should leave coverage null when no run measured it', () => {
      expect(store.aggregate({ target: 'java', project: 'calc' })?.avgCoveragePct).toBeNull();
    });

    it('should leave loc expansion null when every source loc is zero', () => {
      expect(store.aggregate({ project: 'ledger' })?.avgLocExpansion).toBeNull();
    });
  });

  describe('groupBy', () => {
    beforeEach(() => {
      seedThreeRuns();
    });

    it('should aggregate per distinct value', () => {
      const groups = store.groupBy('target');

      expect(Object.keys(groups)).toEqual(['java', 'rust']);
      expect(groups['java']?.count).toBe(2);
      expect(groups['java']?.totalCostUsd).toBe(5);
      expect(groups['rust']?.count).toBe(1);
    });

    it('should accept column names', () => {
      const groups = store.groupBy('project_name');
      expect(groups['calc']?.count).toBe(2);
      expect(groups['ledger']?.count).toBe(1);
    });

    it('should group only the runs matching the filters', () => {
      const groups = store.groupBy('target', { project: 'calc' });

      expect(Object.keys(groups)).toEqual(['java', 'rust']);
      expect(groups['java']?.count).toBe(1);
      expect(groups['java']?.totalCostUsd).toBe(2);
      expect(groups['rust']?.count).toBe(1);
    });

    it('should leave out values that no filtered run has', () => {
      const groups = store.groupBy('project', { target: 'rust' });

      expect(Object.keys(groups)).toEqual(['calc']);
      expect(groups['calc']?.count).toBe(1);
    });

    it('should reject fields outside the allow-list', () => {
      expect(() => store.groupBy('status; DROP TABLE migrations')).toThrow(InvalidGroupFieldError);
      expect(store.count()).toBe(3);
    });
  });

  describe('schema evolution', () => {
    it('should add missing columns to an older database', () => {
      const legacyPath = join(testDir, 'legacy.db');
      const legacyRecord = createMockRunRecord({ runId: 'legacy-run' });
      const db = new Database(legacyPath);
      try {
        db.exec(`CREATE TABLE migrations (
          run_id TEXT PRIMARY KEY,
          project_name TEXT NOT NULL,
          source_language TEXT NOT NULL,
          target_language TEXT NOT NULL,
          strategy TEXT NOT NULL,
          started_at TEXT NOT NULL,
          completed_at TEXT,
          duration_ms REAL,
          cost_usd REAL,
          io_match_rate REAL,
          status TEXT NOT NULL,
          source_loc INTEGER,
          target_loc INTEGER,
          metrics_json TEXT NOT NULL,
          created_at TEXT DEFAULT CURRENT_TIMESTAMP
        )`);
        db.prepare(
          `INSERT INTO migrations (run_id, project_name, source_language, target_language, strategy,
            started_at, status, metrics_json) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        ).run(
          'legacy-run',
          'calc',
          'python',
          'rust',
          'module-by-module',
          legacyRecord.identity.startedAt,
          'success',
          serializeRunRecord(legacyRecord)
        );
      } finally {
        db.close();
      }

      const upgraded = new RunStore({ dbPath: legacyPath, schemaVersion: '1.0.0' });

      expect(columnNames(legacyPath)).toEqual(expect.arrayContaining(['line_coverage_pct', 'schema_version']));
      expect(upgraded.get('legacy-run')).toEqual(legacyRecord);
      expect(upgraded.aggregate()?.avgCoveragePct).toBeNull();
    });

    it('should open an up-to-date database twice without changes', () => {
      const reopened = new RunStore({ dbPath, schemaVersion: '1.0.0' });
      expect(reopened.count()).toBe(0);
      expect(columnNames(dbPath).filter((name) => name === 'schema_version')).toHaveLength(1);
    });
  });

  describe('housekeeping', () => {
    beforeEach(() => {
      seedThreeRuns();
    });

    it('should delete a run and report whether it existed', () => {
      expect(store.delete('r2')).toBe(true);
      expect(store.delete('r2')).toBe(false);
      expect(store.count()).toBe(2);
    });

    it('should list distinct projects and targets', () => {
      expect(store.listProjects()).toEqual(['calc', 'ledger']);
      expect(store.listTargets()).toEqual(['java', 'rust']);
    });

    it('should export every run with derived ratios', async () => {
      const outputPath = join(testDir, 'exports', 'runs.json');
      const count = await store.exportToJson(outputPath);

      const exported = z
        .object({
          exportedAt: z.string(),
          count: z.number(),
          migrations: z.array(
            z.object({
              identity: z.object({ runId: z.string() }),
              derived: z.object({ matchRate: z.number(), locExpansionRatio: z.number() }),
            })
          ),
        })
        .parse(JSON.parse(await readFile(outputPath, 'utf-8')));

      expect(count).toBe(3);
      expect(exported.count).toBe(3);
      expect(exported.migrations.map((run) => run.identity.runId)).toEqual(['r3', 'r2', 'r1']);
      expect(exported.migrations[1]?.derived.matchRate).toBe(0.5);
      expect(exported.migrations[2]?.derived.locExpansionRatio).toBe(1.5);
    });
  });
});
