/**
 * Validation Module
 *
 * zod schemas for the untrusted JSON cmdgate reads: plans from the generator,
 * history lines and snapshot manifests from disk.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { EXECUTOR_BACKENDS } from '../constants';
import { HistoryRecord, Plan, Snapshot, ValidationErrorDetail, ValidationResult } from '../types';

/**
 * Validate data against a Zod schema
 */
export function validate<T>(schema: z.ZodSchema<T>, data: unknown): ValidationResult {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, errors: [] };
  }

  const errors: ValidationErrorDetail[] = result.error.errors.map(err => ({
    path: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
  return { valid: false, errors };
}

/**
 * Validate and throw if invalid
 */
export function validateOrThrow<T>(schema: z.ZodSchema<T>, data: unknown, errorMessage?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
  throw new ValidationError(errorMessage ? `${errorMessage}: ${errors}` : `Validation failed: ${errors}`, result.error.errors);
}

// ============================================================================
// Plan
// ============================================================================

export const commandSchema = z.object({
  command: z.string().min(1, 'Command cannot be empty'),
  description: z.string().optional(),
  preview: z.string().optional(),
});

export const planSchema = z
  .object({
    summary: z.string(),
    risk: z.enum(['low', 'medium', 'high']),
    commands: z.array(commandSchema),
    explanation: z.string().optional(),
    affectedFiles: z.array(z.string().min(1)).optional(),
    clarifications: z
      .array(
        z.object({
          question: z.string().min(1),
          options: z.array(z.string()).optional(),
        })
      )
      .optional(),
    independent: z.boolean().optional(),
  })
  .refine(plan => !(plan.commands.length > 0 && (plan.clarifications?.length ?? 0) > 0), {
    message: 'A plan carries either commands or clarification questions, not both',
    path: ['clarifications'],
  });

/**
 * Deep-freeze an object graph
 */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Parse and freeze a plan from untrusted input
 */
export function parsePlan(data: unknown): Plan {
  const plan: Plan = validateOrThrow(planSchema, data, 'Invalid plan');
  return deepFreeze(plan);
}

/**
 * Parse a plan from JSON text
 */
export function parsePlanJson(text: string): Plan {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Plan is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parsePlan(data);
}

export function freezePlan(plan: Plan): Plan {
  return deepFreeze(plan);
}

// ============================================================================
// Persistence
// ============================================================================

const executionResultSchema = z.object({
  stdout: z.string(),
  stderr: z.string(),
  exitCode: z.number().int(),
  durationMs: z.number().nonnegative(),
  simulated: z.boolean(),
  timedOut: z.boolean(),
});

export const historyRecordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string(),
  query: z.string(),
  plan: planSchema,
  status: z.enum(['executed', 'failed', 'blocked']),
  verdict: z.enum(['LOW', 'MEDIUM', 'HIGH', 'BLOCKED']),
  blockedBy: z
    .object({
      ruleId: z.string(),
      commandIndex: z.number().int().nonnegative(),
      reason: z.string(),
    })
    .optional(),
  backend: z.enum(EXECUTOR_BACKENDS),
  outcomes: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      command: z.string(),
      status: z.enum(['succeeded', 'failed', 'timed-out', 'error', 'skipped']),
      result: executionResultSchema.optional(),
      error: z.string().optional(),
    })
  ),
  exitCode: z.number().int().nullable(),
  snapshotId: z.string().nullable(),
});

export const snapshotManifestSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  entries: z.array(
    z.object({
      originalPath: z.string().min(1),
      existed: z.boolean(),
      kind: z.enum(['file', 'directory', 'absent']),
      backupKey: z.string().nullable(),
      sizeBytes: z.number().nonnegative(),
    })
  ),
  sizeBytes: z.number().nonnegative(),
});

/**
 * Common validation schemas
 */
export const schemas = {
  nonEmptyString: z.string().min(1, 'String cannot be empty'),
  positiveInt: z.number().int().positive('Must be a positive integer'),
  nonNegativeInt: z.number().int().nonnegative('Must be non-negative'),
};

export function parseHistoryRecord(data: unknown): HistoryRecord {
  return validateOrThrow(historyRecordSchema, data, 'Invalid history record');
}

export function parseSnapshotManifest(data: unknown): Snapshot {
  return validateOrThrow(snapshotManifestSchema, data, 'Invalid snapshot manifest');
}
