/**
 * CLI Command Tests
 *
 * Drive the program end to end against a temporary database.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { runCli } from '../src/control-plane/cli.js';
import { resetConfig } from '../src/config/index.js';
import { serializeRunRecord } from '../src/metrics/index.js';
import { createMockRunRecord } from './helpers/run-records.js';

const SAMPLE_LOG = [
  '[10:00:00] Starting Migration: calc -> rust',
  '[10:00:00] Strategy: module-by-module',
  "[10:30:00] MSG #1 ResultMessage(subtype='success', duration_ms=1800000, duration_api_ms=900000, " +
    "num_turns=5, session_id='backfilled-run', total_cost_usd=1.25, usage={'input_tokens': 10, " +
    "'cache_creation_input_tokens': 0, 'cache_read_input_tokens': 0, 'output_tokens': 5})",
].join('\n');

describe('CLI', () => {
  let testDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  function stdout(): string {
    return logSpy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  function stderr(): string {
    return errorSpy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  async function run(...args: string[]): Promise<void> {
    await runCli(['node', 'migrascope', ...args]);
  }

  async function importRuns(...runIds: string[]): Promise<void> {
    const files: string[] = [];
    for (const runId of runIds) {
      const file = join(testDir, `${runId}.json`);
      await writeFile(file, serializeRunRecord(createMockRunRecord({ runId })));
      files.push(file);
    }
    await run('import', ...files);
    logSpy.mockClear();
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'migrascope-cli-'));
    vi.stubEnv('MIGRASCOPE_DB_PATH', join(testDir, 'migrations.db'));
    vi.stubEnv('NO_COLOR', '1');
    resetConfig();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetConfig();
    process.exitCode = undefined;
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('import', () => {
    it('should store every valid file', async () => {
      const file = join(testDir, 'run.json');
      await writeFile(file, serializeRunRecord(createMockRunRecord({ runId: 'cli-1' })));

      await run('import', file);

      expect(stdout()).toContain(`✓ ${file} -> cli-1`);
      expect(stdout()).toContain('Imported 1 of 1 file');
      expect(process.exitCode).toBeUndefined();
    });

    it('should report invalid files and keep going', async () => {
      const bad = join(testDir, 'bad.json');
      const good = join(testDir, 'good.json');
      await writeFile(bad, '{"schemaVersion": "1.0.0"}');
      await writeFile(good, serializeRunRecord(createMockRunRecord({ runId: 'cli-good' })));

      await run('import', bad, good);

      expect(stderr()).toContain(`${bad}: Invalid run record`);
      expect(stdout()).toContain('Imported 1 of 2 files');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('show', () => {
    it('should print a stored run as JSON with derived ratios', async () => {
      await importRuns('cli-show');

      await run('show', 'cli-show', '--json');

      const shown = z
        .object({
          identity: z.object({ runId: z.string() }),
          derived: z.object({ locExpansionRatio: z.number() }),
        })
        .parse(JSON.parse(stdout()));
      expect(shown.identity.runId).toBe('cli-show');
      expect(shown.derived.locExpansionRatio).toBe(1.5);
    });

    it('should fail for an unknown run', async () => {
      await run('show', 'missing');

      expect(stderr()).toBe('✗ Run not found: missing');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('list', () => {
    it('should list stored runs as JSON', async () => {
      await importRuns('cli-a', 'cli-b');

      await run('list', '--json');

      const runs = z.array(z.object({ identity: z.object({ runId: z.string() }) })).parse(JSON.parse(stdout()));
      expect(runs.map((record) => record.identity.runId).sort()).toEqual(['cli-a', 'cli-b']);
    });

    it('should include runs started later on a date-only until day', async () => {
      const file = join(testDir, 'late.json');
      await writeFile(
        file,
        serializeRunRecord(createMockRunRecord({ runId: 'cli-late', startedAt: '2026-01-31T18:45:00.000Z' }))
      );
      await run('import', file);
      logSpy.mockClear();

      await run('list', '--until', '2026-01-31', '--json');

      const runs = z.array(z.object({ identity: z.object({ runId: z.string() }) })).parse(JSON.parse(stdout()));
      expect(runs.map((record) => record.identity.runId)).toEqual(['cli-late']);
    });

    it('should reject a non-numeric limit', async () => {
      await run('list', '--limit', 'ten');

      expect(stderr()).toContain('Validation failed:');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('stats', () => {
    it('should print aggregate statistics as JSON', async () => {
      await importRuns('cli-s1', 'cli-s2');

      await run('stats', '--json');

      const stats = z.object({ count: z.number(), totalCostUsd: z.number() }).parse(JSON.parse(stdout()));
      expect(stats).toEqual({ count: 2, totalCostUsd: 2 });
    });

    it('should group by an allowed field', async () => {
      await importRuns('cli-g1');

      await run('stats', '--group-by', 'target');

      expect(stdout()).toContain('target: rust (1 run)');
    });

    it('should apply filters to grouped statistics', async () => {
      const calcFile = join(testDir, 'calc.json');
      const otherFile = join(testDir, 'other.json');
      await writeFile(
        calcFile,
        serializeRunRecord(createMockRunRecord({ runId: 'cli-calc', projectName: 'calc', targetLanguage: 'rust' }))
      );
      await writeFile(
        otherFile,
        serializeRunRecord(createMockRunRecord({ runId: 'cli-other', projectName: 'other', targetLanguage: 'rust' }))
      );
      await run('import', calcFile, otherFile);
      logSpy.mockClear();

      await run('stats', '-p', 'calc', '--group-by', 'target', '--json');

      const groups = z.record(z.object({ count: z.number() })).parse(JSON.parse(stdout()));
      expect(groups).toEqual({ rust: { count: 1 } });
    });

    it('should reject an unknown group field', async () => {
      await run('stats', '--group-by', 'status');

      expect(stderr()).toContain('groupBy');
      expect(process.exitCode).toBe(1);
    });

    it('should report when no runs match', async () => {
      await run('stats');

      expect(stdout()).toBe('i No runs match the given filters.');
    });
  });

  describe('classify', () => {
    it('should count lines in a directory', async () => {
      const sourceDir = join(testDir, 'src');
      await mkdir(sourceDir);
      await writeFile(join(sourceDir, 'calc.go'), 'package calc\n\nfunc Add() {}\n');

      await run('classify', sourceDir, 'Go');

      expect(stdout()).toBe('go (1 file)\n  Production: 2\n  Test:       0\n  Total:      2');
    });

    it('should fail for an unsupported language', async () => {
      await run('classify', testDir, 'cobol');

      expect(stderr()).toContain('Unsupported language: cobol');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('backfill', () => {
    it('should store a run rebuilt from a log', async () => {
      const logFile = join(testDir, 'migration_20260115_100000.log');
      await writeFile(logFile, SAMPLE_LOG);

      await run('backfill', logFile, '--source-language', 'python');
      logSpy.mockClear();
      await run('show', 'backfilled-run', '--json');

      const shown = z
        .object({
          identity: z.object({ sourceLanguage: z.string(), startedAt: z.string() }),
          cost: z.object({ totalCostUsd: z.number() }),
        })
        .parse(JSON.parse(stdout()));
      expect(shown.identity.sourceLanguage).toBe('python');
      expect(shown.identity.startedAt).toBe('2026-01-15T10:00:00.000Z');
      expect(shown.cost.totalCostUsd).toBe(1.25);
    });

    it('should only print the record on a dry run', async () => {
      const logFile = join(testDir, 'migration_20260115_100000.log');
      await writeFile(logFile, SAMPLE_LOG);

      await run('backfill', logFile, '--dry-run');
      logSpy.mockClear();
      await run('show', 'backfilled-run');

      expect(stderr()).toBe('✗ Run not found: backfilled-run');
    });
  });

  describe('export and delete', () => {
    it('should export stored runs', async () => {
      await importRuns('cli-e1', 'cli-e2');
      const outputPath = join(testDir, 'out', 'runs.json');

      await run('export', outputPath);

      const exported = z.object({ count: z.number() }).parse(JSON.parse(await readFile(outputPath, 'utf-8')));
      expect(exported.count).toBe(2);
      expect(stdout()).toBe(`✓ Exported 2 runs to ${outputPath}`);
    });

    it('should delete a stored run once', async () => {
      await importRuns('cli-d1');

      await run('delete', 'cli-d1');
      expect(stdout()).toBe('✓ Deleted run cli-d1');

      await run('delete', 'cli-d1');
      expect(stderr()).toBe('✗ Run not found: cli-d1');
      expect(process.exitCode).toBe(1);
    });
  });
});
