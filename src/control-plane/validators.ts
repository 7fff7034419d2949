import { z, type ZodError, type ZodTypeAny } from 'zod';
import { runStatusSchema } from '../types/index.js';

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Convert Zod errors to our ValidationError format.
 */
export function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Validate data against a schema. The result carries the schema's output
 * type, so defaults and transforms are applied.
 */
export function validate<S extends ZodTypeAny>(
  schema: S,
  data: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatZodErrors(result.error) };
}

/**
 * Date or date-time accepted on the command line, normalized to ISO-8601.
 */
const isoDateSchema = z.coerce
  .date({ errorMap: () => ({ message: 'Expected a date such as 2026-01-31' }) })
  .transform((date) => date.toISOString());

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Upper bound on a start time. A date without a time covers the whole day.
 */
const endOfDaySchema = z.preprocess(
  (value) => (typeof value === 'string' && DATE_ONLY_PATTERN.test(value) ? `${value}T23:59:59.999Z` : value),
  isoDateSchema
);

const limitSchema = z.coerce.number().int().min(1).max(10000);

export const groupFieldSchema = z.enum([
  'project',
  'target',
  'strategy',
  'project_name',
  'target_language',
]);

/**
 * Schema for list command options.
 */
export const listCommandOptionsSchema = z.object({
  project: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  strategy: z.string().min(1).optional(),
  status: runStatusSchema.optional(),
  since: isoDateSchema.optional(),
  until: endOfDaySchema.optional(),
  limit: limitSchema.optional(),
  json: z.boolean().default(false),
});

export type ListCommandOptions = z.infer<typeof listCommandOptionsSchema>;

/**
 * Schema for stats command options.
 */
export const statsCommandOptionsSchema = z.object({
  project: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  strategy: z.string().min(1).optional(),
  groupBy: groupFieldSchema.optional(),
  json: z.boolean().default(false),
});

export type StatsCommandOptions = z.infer<typeof statsCommandOptionsSchema>;

export const jsonOptionSchema = z.object({
  json: z.boolean().default(false),
});

/**
 * Schema for backfill command options.
 */
export const backfillCommandOptionsSchema = z.object({
  project: z.string().min(1).optional(),
  strategy: z.string().min(1).optional(),
  sourceLanguage: z.string().min(1).optional(),
  dryRun: z.boolean().default(false),
});

export type BackfillCommandOptions = z.infer<typeof backfillCommandOptionsSchema>;

export const runIdSchema = z.string().trim().min(1, 'Run ID is required');
