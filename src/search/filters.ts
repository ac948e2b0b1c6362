/**
 * Metadata filters for vector queries.
 *
 * A filter is either a map of key/value equalities or an explicit
 * `{ $and: [...] }` of single equalities. Both compile to
 * `json_extract(metadata, '$.key') = ?` clauses.
 */

import { ValidationError } from '../errors/index.js';
import type { MetadataValue } from '../database/schema.js';

export type EqualityFilter = Record<string, MetadataValue>;

export type MetadataFilter = EqualityFilter | { $and: EqualityFilter[] };

const FILTER_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build a filter from optional conditions. Undefined conditions are
 * dropped; one condition is a plain equality, several are joined with $and.
 *
 * @example
 * buildMetadataFilter({ project_id: 'api', doc_type: undefined })
 * // { project_id: 'api' }
 * buildMetadataFilter({ project_id: 'api', doc_type: 'prd' })
 * // { $and: [{ project_id: 'api' }, { doc_type: 'prd' }] }
 */
export function buildMetadataFilter(
  conditions: Record<string, MetadataValue | undefined>
): MetadataFilter | undefined {
  const clauses: EqualityFilter[] = [];
  for (const [key, value] of Object.entries(conditions)) {
    if (value !== undefined) {
      clauses.push({ [key]: value });
    }
  }

  if (clauses.length === 0) {
    return undefined;
  }
  if (clauses.length === 1) {
    return clauses[0];
  }
  return { $and: clauses };
}

function isAndFilter(filter: MetadataFilter): filter is { $and: EqualityFilter[] } {
  return Array.isArray(filter.$and);
}

/** SQLite cannot bind booleans; json_extract yields 1/0 for them */
function toSqlValue(value: MetadataValue): string | number {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

export interface CompiledFilter {
  /** SQL fragment without a leading AND, empty when there is no filter */
  sql: string;
  params: Array<string | number>;
}

/**
 * @throws ValidationError for a key that is not a plain identifier
 */
export function compileMetadataFilter(filter: MetadataFilter | undefined): CompiledFilter {
  if (filter === undefined) {
    return { sql: '', params: [] };
  }

  const equalities: Array<[string, MetadataValue]> = isAndFilter(filter)
    ? filter.$and.flatMap((clause) => Object.entries(clause))
    : Object.entries(filter);

  const invalid = equalities.map(([key]) => key).filter((key) => !FILTER_KEY.test(key));
  if (invalid.length > 0) {
    throw new ValidationError(
      'Invalid metadata filter',
      invalid.map((key) => `'${key}' is not a valid metadata key`)
    );
  }

  return {
    sql: equalities.map(([key]) => `json_extract(metadata, '$.${key}') = ?`).join(' AND '),
    params: equalities.map(([, value]) => toSqlValue(value)),
  };
}
