/**
 * Equality filters over chunk metadata.
 *
 * Both candidate queries apply the same filters: the keyword store as a SQL
 * predicate on the metadata JSON column, the vector store in memory.
 */

import type { Metadata } from '../ingest/types.js';
import type { MetadataFilters } from '../retrieval/types.js';
import { ValidationError } from '../utils/errors.js';

const FILTER_KEY = /^[A-Za-z0-9_]+$/;

export interface SqlFragment {
  sql: string;
  params: Array<string | number>;
}

/**
 * @throws ValidationError for keys other than letters, digits and underscores
 */
export function validateFilters(filters: MetadataFilters): void {
  for (const key of Object.keys(filters)) {
    if (!FILTER_KEY.test(key)) {
      throw new ValidationError(`Invalid metadata filter key "${key}"`, 'INVALID_FILTER');
    }
  }
}

/**
 * `AND`-joined predicates on `<column>`, or an empty fragment.
 * Comparisons are type-exact, matching `matchesFilters`: `true` never equals
 * `1` and `"1"` never equals `1`. null matches missing or null keys.
 */
export function buildFilterClause(filters: MetadataFilters | undefined, column: string): SqlFragment {
  if (!filters) return { sql: '', params: [] };
  validateFilters(filters);

  const clauses: string[] = [];
  const params: Array<string | number> = [];

  for (const [key, value] of Object.entries(filters)) {
    const path = `'$."${key}"'`;
    const type = `json_type(${column}, ${path})`;
    const extracted = `json_extract(${column}, ${path})`;
    if (value === null) {
      clauses.push(`${extracted} IS NULL`);
    } else if (typeof value === 'boolean') {
      clauses.push(`${type} = '${value ? 'true' : 'false'}'`);
    } else if (typeof value === 'number') {
      clauses.push(`${type} IN ('integer', 'real') AND ${extracted} = ?`);
      params.push(value);
    } else {
      clauses.push(`${type} = 'text' AND ${extracted} = ?`);
      params.push(value);
    }
  }

  return { sql: clauses.join(' AND '), params };
}

/**
 * In-memory counterpart of `buildFilterClause`.
 */
export function matchesFilters(metadata: Metadata, filters: MetadataFilters | undefined): boolean {
  if (!filters) return true;
  for (const [key, expected] of Object.entries(filters)) {
    const actual = metadata[key] ?? null;
    if (actual !== expected) return false;
  }
  return true;
}
