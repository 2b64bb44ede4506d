/**
 * Search filters
 *
 * Each resource family declares a closed map of search keys. Query values
 * are compiled once into conditions that the SQL adapter renders as a WHERE
 * clause and the in-memory adapter evaluates as a predicate.
 *
 * - `reference`: UUID equality
 * - `token`: exact match
 * - `string`: case-insensitive prefix
 * - `date` / `datetime`: calendar-date comparison with an optional
 *   `eq|ge|gt|le|lt` prefix (`ge2024-01-01`)
 */

import { ValidationError } from '../errors.js';

export type FilterKind = 'reference' | 'token' | 'string' | 'date' | 'datetime';

export interface FilterSpec {
  readonly field: string;
  readonly kind: FilterKind;
}

export type FilterMap<F extends string> = { readonly [K in F]: FilterSpec };

export type SearchFilters<F extends string> = Partial<Record<F, string>>;

export type ComparisonOperator = '=' | '>=' | '>' | '<=' | '<';

export type FilterCondition =
  | { kind: 'reference'; field: string; value: string }
  | { kind: 'token'; field: string; value: string }
  | { kind: 'prefix'; field: string; value: string }
  | {
      kind: 'date';
      field: string;
      operator: ComparisonOperator;
      date: string;
      /** Column holds a timestamp rather than a calendar date */
      timestamp: boolean;
    };

const DATE_PREFIXES: Readonly<Record<string, ComparisonOperator>> = {
  eq: '=',
  ge: '>=',
  gt: '>',
  le: '<=',
  lt: '<',
};

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DATE_PATTERN = /^(eq|ge|gt|le|lt)?(\d{4}-\d{2}-\d{2})$/;

export interface PickedFilters<F extends string> {
  filters: SearchFilters<F>;
  /** Query keys that are neither filters nor reserved */
  ignored: string[];
}

/**
 * Keep the query values whose keys are declared filters
 *
 * Empty and non-string values are dropped. Keys listed in `reserved`
 * (pagination and the like) are not reported as ignored.
 */
export function pickFilters<F extends string>(
  specs: FilterMap<F>,
  query: Readonly<Record<string, unknown>>,
  reserved: readonly string[] = []
): PickedFilters<F> {
  const filters: SearchFilters<F> = {};
  for (const key in specs) {
    const value = query[key];
    if (typeof value === 'string' && value !== '') {
      filters[key] = value;
    }
  }

  const ignored = Object.keys(query).filter(
    (key) => !Object.prototype.hasOwnProperty.call(specs, key) && !reserved.includes(key)
  );
  return { filters, ignored };
}

/**
 * Parse a date filter value such as `2024-01-01` or `lt2024-01-01`
 *
 * @throws ValidationError on any other shape
 */
export function parseDateFilter(
  key: string,
  raw: string
): { operator: ComparisonOperator; date: string } {
  const match = DATE_PATTERN.exec(raw);
  const date = match?.[2];
  if (match === null || date === undefined) {
    throw new ValidationError(`invalid ${key}: ${raw}`);
  }
  const prefix = match[1] ?? 'eq';
  return { operator: DATE_PREFIXES[prefix] ?? '=', date };
}

/**
 * Turn picked filter values into conditions
 *
 * @throws ValidationError for a malformed reference or date
 */
export function compileFilters<F extends string>(
  specs: FilterMap<F>,
  filters: SearchFilters<F>
): FilterCondition[] {
  const conditions: FilterCondition[] = [];

  for (const key in specs) {
    const raw = filters[key];
    if (raw === undefined) continue;
    const { field, kind } = specs[key];

    switch (kind) {
      case 'reference':
        if (!UUID_PATTERN.test(raw)) {
          throw new ValidationError(`invalid ${key}: ${raw}`);
        }
        conditions.push({ kind: 'reference', field, value: raw.toLowerCase() });
        break;
      case 'token':
        conditions.push({ kind: 'token', field, value: raw });
        break;
      case 'string':
        conditions.push({ kind: 'prefix', field, value: raw });
        break;
      case 'date':
      case 'datetime':
        conditions.push({
          kind: 'date',
          field,
          ...parseDateFilter(key, raw),
          timestamp: kind === 'datetime',
        });
        break;
    }
  }

  return conditions;
}

/**
 * Escape LIKE wildcards so a prefix matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Render conditions as SQL predicates with positional parameters
 *
 * @param column maps a record field to its column
 * @param firstIndex number of the first placeholder
 */
export function renderConditions(
  conditions: readonly FilterCondition[],
  column: (field: string) => string,
  firstIndex = 1
): { clauses: string[]; params: unknown[] } {
  const clauses: string[] = [];
  const params: unknown[] = [];

  for (const condition of conditions) {
    const placeholder = `$${firstIndex + params.length}`;
    const col = column(condition.field);

    switch (condition.kind) {
      case 'reference':
      case 'token':
        clauses.push(`${col} = ${placeholder}`);
        params.push(condition.value);
        break;
      case 'prefix':
        clauses.push(`${col} ILIKE ${placeholder}`);
        params.push(`${escapeLikePattern(condition.value)}%`);
        break;
      case 'date': {
        const lhs = condition.timestamp ? `(${col} AT TIME ZONE 'UTC')::date` : col;
        clauses.push(`${lhs} ${condition.operator} ${placeholder}::date`);
        params.push(condition.date);
        break;
      }
    }
  }

  return { clauses, params };
}

function compareDates(left: string, operator: ComparisonOperator, right: string): boolean {
  switch (operator) {
    case '=':
      return left === right;
    case '>=':
      return left >= right;
    case '>':
      return left > right;
    case '<=':
      return left <= right;
    case '<':
      return left < right;
  }
}

/**
 * Evaluate conditions against a record; every condition must hold
 */
export function matchesConditions(
  record: ReadonlyMap<string, unknown>,
  conditions: readonly FilterCondition[]
): boolean {
  return conditions.every((condition) => {
    const value = record.get(condition.field);
    if (value === undefined || value === null) return false;
    const text = String(value);

    switch (condition.kind) {
      case 'reference':
        return text.toLowerCase() === condition.value;
      case 'token':
        return text === condition.value;
      case 'prefix':
        return text.toLowerCase().startsWith(condition.value.toLowerCase());
      case 'date':
        // Both date and ISO timestamp values start with the UTC calendar date
        return compareDates(text.slice(0, 10), condition.operator, condition.date);
    }
  });
}
