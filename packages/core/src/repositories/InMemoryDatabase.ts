/**
 * In-Memory Database
 *
 * Development/test store behind the in-memory repositories. Tables are kept
 * per tenant and the declared references are enforced the way the SQL
 * schema enforces its foreign keys: writes must point at existing rows,
 * deletes cascade to owned rows and are refused while other rows still
 * point at the target.
 *
 * WARNING: Not suitable for production - data is lost on restart.
 *
 * @module @ehr-backend/core/repositories/InMemoryDatabase
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import { ReferentialIntegrityError } from '../errors.js';
import { requireTenantId } from '../tenant/context.js';
import type { OrderSpec, ReferenceMap, ReferenceSpec } from './types.js';

export interface StoredRecord {
  /** Insertion sequence, breaks ordering ties */
  sequence: number;
  fields: ReadonlyMap<string, unknown>;
}

export type InMemoryTable = Map<string, StoredRecord>;

function compareValues(left: unknown, right: unknown): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort stored records; missing values last, insertion sequence breaks ties
 * in the direction of the first key
 */
export function sortRecords(records: StoredRecord[], orderBy: readonly OrderSpec[]): StoredRecord[] {
  const tieDirection = orderBy[0]?.direction === 'desc' ? -1 : 1;

  return [...records].sort((left, right) => {
    for (const { field, direction } of orderBy) {
      const a = left.fields.get(field);
      const b = right.fields.get(field);
      if (a === undefined && b === undefined) continue;
      if (a === undefined) return 1;
      if (b === undefined) return -1;
      const result = compareValues(a, b);
      if (result !== 0) return direction === 'desc' ? -result : result;
    }
    return (left.sequence - right.sequence) * tieDirection;
  });
}

/** Row values before a transaction first touched them, per table */
type UndoJournal = Map<InMemoryTable, Map<string, StoredRecord | undefined>>;

interface InboundReference extends ReferenceSpec {
  /** Table holding the reference */
  source: string;
  field: string;
}

export class InMemoryDatabase {
  private tenants = new Map<string, Map<string, InMemoryTable>>();
  private readonly outbound = new Map<string, ReferenceMap>();
  private readonly inbound = new Map<string, InboundReference[]>();
  private sequence = 0;
  private readonly journals = new AsyncLocalStorage<UndoJournal>();

  /**
   * Declare a table's references; later declarations for the same table
   * replace earlier ones
   */
  registerTable(table: string, references: ReferenceMap): void {
    for (const [target, relations] of this.inbound) {
      this.inbound.set(
        target,
        relations.filter((relation) => relation.source !== table)
      );
    }
    this.outbound.set(table, references);

    for (const [field, spec] of Object.entries(references)) {
      const relations = this.inbound.get(spec.table) ?? [];
      relations.push({ ...spec, source: table, field });
      this.inbound.set(spec.table, relations);
    }
  }

  /**
   * Table of the current tenant, created on first use
   */
  table(name: string): InMemoryTable {
    const tenantId = requireTenantId();
    let tables = this.tenants.get(tenantId);
    if (tables === undefined) {
      tables = new Map();
      this.tenants.set(tenantId, tables);
    }
    let table = tables.get(name);
    if (table === undefined) {
      table = new Map();
      tables.set(name, table);
    }
    return table;
  }

  /**
   * Write a row of the current tenant
   */
  put(table: string, id: string, record: StoredRecord): void {
    const rows = this.table(table);
    this.track(rows, id);
    rows.set(id, record);
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  /**
   * @throws ReferentialIntegrityError when a reference field names a missing row
   */
  assertReferencesExist(table: string, fields: ReadonlyMap<string, unknown>): void {
    const references = this.outbound.get(table) ?? {};
    for (const [field, spec] of Object.entries(references)) {
      const value = fields.get(field);
      if (typeof value === 'string' && !this.table(spec.table).has(value)) {
        throw new ReferentialIntegrityError(
          table,
          `${field} references a missing ${spec.table}: ${value}`
        );
      }
    }
  }

  /**
   * Delete a row with everything that cascades from it
   *
   * Nothing is removed when any restricting reference is found.
   *
   * @returns false when the row does not exist
   */
  delete(table: string, id: string): boolean {
    if (!this.table(table).has(id)) {
      return false;
    }

    const plan = new Map<string, Set<string>>();
    this.planDeletion(table, id, plan);
    for (const [name, ids] of plan) {
      const rows = this.table(name);
      for (const rowId of ids) {
        this.track(rows, rowId);
        rows.delete(rowId);
      }
    }
    return true;
  }

  /**
   * Run `fn` as one transaction: when it fails, the rows it wrote are put
   * back. Writes made by other callers meanwhile are left alone. A nested
   * call joins the enclosing transaction.
   */
  async transaction<R>(fn: () => Promise<R>): Promise<R> {
    if (this.journals.getStore() !== undefined) {
      return fn();
    }
    const journal: UndoJournal = new Map();
    try {
      return await this.journals.run(journal, fn);
    } catch (error: unknown) {
      this.rollback(journal);
      throw error;
    }
  }

  /** Drop every tenant's data */
  clear(): void {
    this.tenants = new Map();
  }

  private track(rows: InMemoryTable, id: string): void {
    const journal = this.journals.getStore();
    if (journal === undefined) return;
    let touched = journal.get(rows);
    if (touched === undefined) {
      touched = new Map();
      journal.set(rows, touched);
    }
    if (!touched.has(id)) {
      touched.set(id, rows.get(id));
    }
  }

  private rollback(journal: UndoJournal): void {
    for (const [rows, touched] of journal) {
      for (const [id, previous] of touched) {
        if (previous === undefined) {
          rows.delete(id);
        } else {
          rows.set(id, previous);
        }
      }
    }
  }

  private planDeletion(table: string, id: string, plan: Map<string, Set<string>>): void {
    const planned = plan.get(table) ?? new Set<string>();
    if (planned.has(id)) return;
    planned.add(id);
    plan.set(table, planned);

    for (const relation of this.inbound.get(table) ?? []) {
      const referencing = [...this.table(relation.source)]
        .filter(([, record]) => record.fields.get(relation.field) === id)
        .map(([rowId]) => rowId);
      if (referencing.length === 0) continue;

      if (relation.onDelete === 'restrict') {
        throw new ReferentialIntegrityError(
          table,
          `${table} ${id} is still referenced by ${relation.source}.${relation.field}`
        );
      }
      for (const rowId of referencing) {
        this.planDeletion(relation.source, rowId, plan);
      }
    }
  }
}
