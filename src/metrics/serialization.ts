/**
 * Conversion between RunRecord values and their JSON text form.
 */

import { ZodError } from 'zod';
import { runRecordSchema, type DescribedRunRecord, type RunRecord } from '../types/index.js';
import { deriveRunRatios } from './derived.js';
import { RunRecordParseError } from './errors.js';

/**
 * Serialize a run record to JSON text. Derived ratios are not written.
 */
export function serializeRunRecord(record: RunRecord, indent: number = 2): string {
  return JSON.stringify(runRecordSchema.parse(record), null, indent);
}

/**
 * Validate an already-decoded value as a RunRecord. Unknown keys
 * (such as an exported `derived` block) are stripped.
 * @throws RunRecordParseError if the value does not match the schema
 */
export function runRecordFromJson(value: unknown, runId: string | null = null): RunRecord {
  try {
    return runRecordSchema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      throw new RunRecordParseError(issues, runId);
    }
    throw error;
  }
}

/**
 * Parse JSON text into a RunRecord.
 * @throws RunRecordParseError on malformed JSON or a schema violation
 */
export function parseRunRecord(text: string, runId: string | null = null): RunRecord {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RunRecordParseError([`malformed JSON: ${message}`], runId);
  }
  return runRecordFromJson(decoded, runId);
}

/**
 * The record plus its derived ratios, for reports and exports.
 */
export function describeRunRecord(record: RunRecord): DescribedRunRecord {
  return { ...record, derived: deriveRunRatios(record) };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Freeze a record and every nested block and collection in place.
 */
export function freezeRunRecord(record: RunRecord): RunRecord {
  return deepFreeze(record);
}
