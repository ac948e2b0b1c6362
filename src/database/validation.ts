/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. `as Type` casts are
 * erased at runtime; a schema catches drift between the tables and the code
 * at the read that would otherwise corrupt silently.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM graph_nodes WHERE label = ? AND key = ?').get(label, key);
 * return row ? validateRow(GraphNodeRowSchema, row, `graph_nodes.${label}=${key}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// JSON Columns
// ============================================================================

/**
 * A TEXT column holding JSON, parsed and then validated against `inner`.
 */
function jsonColumn<T extends z.ZodTypeAny>(inner: T) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        return JSON.parse(text);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid JSON' });
        return z.NEVER;
      }
    })
    .pipe(inner);
}

export const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const PropertiesSchema = z.record(z.unknown());

// ============================================================================
// Vector Entry Schema
// ============================================================================

/**
 * Rows of `vector_entries`. `embedding` is a Buffer (BLOB); conversion to
 * Float32Array happens in the store.
 */
export const VectorEntryRowSchema = z.object({
  collection: z.string(),
  id: z.string(),
  content: z.string(),
  embedding: z.instanceof(Buffer),
  dimensions: z.number().int().positive(),
  metadata: jsonColumn(MetadataSchema),
  updated_at: z.string(),
});

export type VectorEntryRow = z.infer<typeof VectorEntryRowSchema>;

// ============================================================================
// Graph Schemas
// ============================================================================

export const GraphNodeRowSchema = z.object({
  label: z.string(),
  key: z.string(),
  properties: jsonColumn(PropertiesSchema),
  created_at: z.string(),
  updated_at: z.string(),
});

export type GraphNodeRow = z.infer<typeof GraphNodeRowSchema>;

export const GraphEdgeRowSchema = z.object({
  from_label: z.string(),
  from_key: z.string(),
  type: z.string(),
  to_label: z.string(),
  to_key: z.string(),
  properties: jsonColumn(PropertiesSchema),
  updated_at: z.string(),
});

export type GraphEdgeRow = z.infer<typeof GraphEdgeRowSchema>;

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation: the database
 * holds data the code does not expect (failed migration, manual edit,
 * version mismatch).
 *
 * Exit code 5, same as DatabaseError
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Shown in the error message, e.g. "graph_nodes.Project=api"
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodTypeAny>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows. Throws on the first invalid row
 * unless `continueOnError` is set, in which case only valid rows are
 * returned and `onError` sees the rest.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string,
  options?: {
    continueOnError?: boolean;
    onError?: (row: unknown, error: z.ZodError) => void;
  }
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const result = schema.safeParse(row);

    if (result.success) {
      valid.push(result.data);
    } else if (options?.continueOnError) {
      options.onError?.(row, result.error);
    } else {
      throw new SchemaValidationError(
        `Database schema mismatch in ${context}[${i}]`,
        result.error.issues
      );
    }
  }

  return valid;
}
