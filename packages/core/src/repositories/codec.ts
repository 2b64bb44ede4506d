/**
 * Field/column mapping between records (camelCase) and rows (snake_case)
 */

import { ZodError } from 'zod';

import { ValidationError } from '../errors.js';
import type { RecordSchema } from './types.js';

/** `addressLine1` -> `address_line1`, `bsaM2` -> `bsa_m2` */
export function toColumnName(field: string): string {
  return field.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);
}

/** Store-assigned fields of top-level resources */
export const RESOURCE_META_FIELDS: readonly string[] = ['id', 'fhirId', 'createdAt', 'updatedAt'];

/** Store-assigned fields of child rows */
export const CHILD_META_FIELDS: readonly string[] = ['id', 'createdAt'];

/** Read a string-valued entry of a caller's input */
export function readString(values: ReadonlyMap<string, unknown>, key: string): string | undefined {
  const value = values.get(key);
  return typeof value === 'string' ? value : undefined;
}

export class RecordCodec<T> {
  /** Every field of the record, metadata included */
  readonly fields: readonly string[];
  private readonly columns: ReadonlyMap<string, string>;

  constructor(private readonly schema: RecordSchema<T>) {
    this.fields = Object.keys(schema.shape);
    this.columns = new Map(this.fields.map((field) => [field, toColumnName(field)]));
  }

  /** Fields a caller writes: everything except the given metadata */
  dataFields(meta: readonly string[]): string[] {
    return this.fields.filter((field) => !meta.includes(field));
  }

  column(field: string): string {
    const column = this.columns.get(field);
    if (column === undefined) {
      throw new Error(`Unknown field: ${field}`);
    }
    return column;
  }

  /** Validate a stored row into a record */
  fromRow(row: Readonly<Record<string, unknown>>): T {
    const candidate: Record<string, unknown> = {};
    for (const [field, column] of this.columns) {
      candidate[field] = row[column] ?? undefined;
    }
    return this.schema.parse(candidate);
  }

  /**
   * Validate a record held as plain fields
   *
   * @throws ValidationError listing the offending fields
   */
  fromFields(fields: ReadonlyMap<string, unknown>, resourceType: string): T {
    try {
      return this.schema.parse(Object.fromEntries(fields));
    } catch (error: unknown) {
      if (error instanceof ZodError) {
        throw new ValidationError(`invalid ${resourceType}`, error.flatten().fieldErrors);
      }
      throw error;
    }
  }
}
