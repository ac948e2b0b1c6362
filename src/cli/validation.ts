/**
 * Zod validation schemas for CLI inputs
 *
 * Commander parses arguments as strings; these schemas coerce and check
 * them before a command touches the core.
 */

import { z } from 'zod';
import { RiskSchema } from '../agents/risk-analyzer.js';
import { ValidationError } from '../errors/index.js';

// ============================================================================
// SHARED
// ============================================================================

const IdentifierSchema = z
  .string()
  .min(1, 'cannot be empty')
  .max(100, 'too long (max 100 chars)')
  .regex(/^[A-Za-z0-9._/-]+$/, 'may only contain letters, numbers, ".", "_", "/" and "-"');

const TopKSchema = z
  .string()
  .transform((val) => parseInt(val, 10))
  .refine((val) => !isNaN(val) && val >= 1 && val <= 100, {
    message: 'top-k must be a number between 1 and 100',
  });

// ============================================================================
// INDEX COMMAND SCHEMA
// ============================================================================

export const IndexOptionsSchema = z.object({
  project: IdentifierSchema,
  projectName: z.string().min(1).optional(),
  docId: IdentifierSchema.optional(),
  title: z.string().min(1).optional(),
  type: z
    .string()
    .regex(/^[a-z_]+$/, 'document type must be lowercase words joined by "_" (e.g. technical_design)')
    .default('document'),
});

// ============================================================================
// SUMMARY COMMAND SCHEMA
// ============================================================================

export const SummaryOptionsSchema = z.object({
  key: IdentifierSchema.optional(),
  ref: z.string().min(1).default('HEAD'),
});

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const SearchOptionsSchema = z.object({
  project: IdentifierSchema.optional(),
  type: z.string().regex(/^[a-z_]+$/, 'document type must be lowercase (e.g. prd)').optional(),
  top: TopKSchema,
});

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(1000, 'Search query too long (max 1000 chars)'),
});

// ============================================================================
// SCOPE COMMAND SCHEMA
// ============================================================================

export const ScopeOptionsSchema = z.object({
  project: IdentifierSchema,
  repo: z.string().min(1).default('.'),
  key: IdentifierSchema.optional(),
  base: z.string().min(1).optional(),
  head: z.string().min(1).optional(),
  diffFile: z.string().min(1).optional(),
  title: z.string().optional(),
  description: z.string().optional(),
});

// ============================================================================
// RISK COMMAND SCHEMA
// ============================================================================

export const RiskOptionsSchema = z.object({
  project: IdentifierSchema,
  events: z.string().min(1).optional(),
});

export const HistoricalEventsFileSchema = z.array(
  z.object({
    eventType: z.string().min(1),
    team: z.string().optional(),
    durationDays: z.number().nonnegative().optional(),
    outcome: z.string().optional(),
    description: z.string().optional(),
  })
);

// ============================================================================
// GAPS COMMAND SCHEMA
// ============================================================================

const MetricValueSchema = z.union([z.string(), z.number()]).transform(String);

export const GapsOptionsSchema = z.object({
  project: IdentifierSchema,
  targets: z.string().min(1),
  doc: z.array(z.string().min(1)).default([]),
  days: z
    .string()
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val >= 0, { message: 'days must be a non-negative number' }),
});

/** Targets as a PRD records them; actual_value is filled in from monitoring */
export const MetricTargetsFileSchema = z.array(
  z.object({
    metric_name: z.string().min(1),
    target_value: MetricValueSchema,
    actual_value: MetricValueSchema.nullish(),
    unit: z.string().optional(),
  })
);

// ============================================================================
// LAUNCH COMMAND SCHEMA
// ============================================================================

export const LaunchOptionsSchema = z.object({
  project: IdentifierSchema,
  doc: z.array(z.string().min(1)).default([]),
  risks: z.string().min(1).optional(),
  metrics: z.string().min(1).optional(),
});

/** A bare list of risks, or a saved `warden risk --json` report */
export const RisksFileSchema = z.union([
  z.array(RiskSchema),
  z.object({ risks: z.array(RiskSchema) }).transform((report) => report.risks),
]);

export const LaunchMetricsFileSchema = z.record(z.union([z.string(), z.number()]));

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; issues: string[] } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  return { success: false, issues };
}

/**
 * Like validateInput, but throws.
 *
 * @throws ValidationError listing every issue
 */
export function parseInput<T extends z.ZodSchema>(schema: T, input: unknown, what: string): z.output<T> {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, result.issues);
  }
  return result.data;
}
