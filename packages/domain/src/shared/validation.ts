/**
 * Field-level validation rules shared by resource and child services
 *
 * Rules read the caller's input as a field map so one implementation serves
 * every resource family.
 */

import { ValidationError } from '@ehr-backend/core';

/** Allow-lists keyed by field name */
export type AllowedValues<K extends string> = { readonly [P in K]?: readonly string[] };

export function toFieldMap(input: object): Map<string, unknown> {
  return new Map<string, unknown>(Object.entries(input));
}

function isBlank(value: unknown): boolean {
  return (
    value === undefined || value === null || (typeof value === 'string' && value.trim() === '')
  );
}

/**
 * @throws ValidationError `<field> is required` for the first missing or blank field
 */
export function assertRequired(values: ReadonlyMap<string, unknown>, fields: readonly string[]): void {
  for (const field of fields) {
    if (isBlank(values.get(field))) {
      throw new ValidationError(`${field} is required`);
    }
  }
}

/**
 * @throws ValidationError `invalid <field>: <value>` for a present value outside its allow-list
 */
export function assertAllowed<K extends string>(
  values: ReadonlyMap<string, unknown>,
  allowed: AllowedValues<K>
): void {
  for (const field in allowed) {
    const options = allowed[field];
    const value = values.get(field);
    if (options === undefined || value === undefined || value === null) continue;
    if (typeof value !== 'string' || !options.includes(value)) {
      throw new ValidationError(`invalid ${field}: ${String(value)}`);
    }
  }
}

/**
 * Fill absent fields from `defaults`; present values, including `false`
 * and `0`, are kept
 */
export function withDefaults<I extends object>(input: I, defaults: object): I {
  const values = toFieldMap(input);
  let result: I = input;
  for (const [field, value] of Object.entries(defaults)) {
    if (value !== undefined && (values.get(field) === undefined || values.get(field) === null)) {
      result = { ...result, [field]: value };
    }
  }
  return result;
}
