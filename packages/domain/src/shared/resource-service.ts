/**
 * Resource Service
 *
 * Validation layer between the handlers and a resource repository. Required
 * fields, allow-lists, defaults and per-family checks are declared as rules;
 * everything else passes through to the repository unchanged.
 *
 * @module domain/shared/resource-service
 */

import {
  createLogger,
  ValidationError,
  type FilterMap,
  type Logger,
  type NewResource,
  type PageRequest,
  type ResourceInput,
  type ResourceRepository,
  type SearchFilters,
  type UnitOfWork,
} from '@ehr-backend/core';
import type { Page, ResourceMeta } from '@ehr-backend/types';

import { assertAllowed, assertRequired, toFieldMap, withDefaults, type AllowedValues } from './validation.js';

export type InputField<T extends ResourceMeta> = keyof ResourceInput<T> & string;

export interface ResourceRules<T extends ResourceMeta> {
  /** Fields that must be present and non-blank */
  required: readonly InputField<T>[];
  /** Allow-lists, checked when the field is present */
  allowed?: AllowedValues<InputField<T>>;
  /** Field whose stored value is kept when an update omits it */
  statusField?: InputField<T>;
  /**
   * Values for absent fields on create, computed per call. An update that
   * omits one of these fields keeps its stored value.
   */
  defaults?: () => Partial<ResourceInput<T>>;
  /** Field holding the owning patient, for list-by-patient */
  patientField?: InputField<T>;
  /** Cross-field checks; throw ValidationError */
  validate?: (input: ResourceInput<T>) => void;
}

export class ResourceService<T extends ResourceMeta, F extends string> {
  protected readonly logger: Logger;

  constructor(
    protected readonly repository: ResourceRepository<T, F>,
    protected readonly rules: ResourceRules<T>,
    protected readonly unitOfWork: UnitOfWork
  ) {
    this.logger = createLogger({ name: `${repository.definition.table}-service` });
  }

  get resourceType(): string {
    return this.repository.definition.resourceType;
  }

  /** Closed set of search keys */
  get filters(): FilterMap<F> {
    return this.repository.definition.filters;
  }

  /** Whether `listByPatient` is available */
  get listsByPatient(): boolean {
    return this.rules.patientField !== undefined;
  }

  async create(input: NewResource<T>): Promise<T> {
    const prepared = this.prepareCreate(input);
    const record = await this.repository.create(prepared);
    this.logger.debug({ id: record.id }, `${this.resourceType} created`);
    return record;
  }

  getById(id: string): Promise<T> {
    return this.repository.getById(id);
  }

  getByFhirId(fhirId: string): Promise<T> {
    return this.repository.getByFhirId(fhirId);
  }

  /**
   * Replace the mutable fields of a resource. Runs in one unit of work so
   * the read of the stored row and the write see the same state.
   */
  update(id: string, input: ResourceInput<T>): Promise<T> {
    return this.unitOfWork.run(async () => {
      const current = await this.repository.getById(id);
      const prepared = this.prepareUpdate(input, current);
      return this.repository.update(id, prepared);
    });
  }

  async delete(id: string): Promise<void> {
    await this.repository.delete(id);
    this.logger.debug({ id }, `${this.resourceType} deleted`);
  }

  list(page: PageRequest): Promise<Page<T>> {
    return this.repository.list(page);
  }

  async listByPatient(patientId: string, page: PageRequest): Promise<Page<T>> {
    const field = this.rules.patientField;
    if (field === undefined) {
      throw new ValidationError(`${this.resourceType} cannot be listed by patient`);
    }
    return this.repository.listBy(field, patientId, page);
  }

  search(filters: SearchFilters<F>, page: PageRequest): Promise<Page<T>> {
    return this.repository.search(filters, page);
  }

  /** Apply defaults, then validate */
  protected prepareCreate(input: NewResource<T>): NewResource<T> {
    const prepared = this.rules.defaults ? withDefaults(input, this.rules.defaults()) : input;
    this.check(prepared);
    return prepared;
  }

  /** Keep the stored status and defaulted fields when absent, then validate */
  protected prepareUpdate(input: ResourceInput<T>, current: T): ResourceInput<T> {
    const prepared = withDefaults(input, this.storedValues(current));
    this.check(prepared);
    return prepared;
  }

  private storedValues(current: T): Record<string, unknown> {
    const fields = new Set<string>(Object.keys(this.rules.defaults?.() ?? {}));
    if (this.rules.statusField !== undefined) {
      fields.add(this.rules.statusField);
    }
    const stored = toFieldMap(current);
    const kept: Record<string, unknown> = {};
    for (const field of fields) {
      kept[field] = stored.get(field);
    }
    return kept;
  }

  protected statusOf(record: object): string | undefined {
    const field = this.rules.statusField;
    if (field === undefined) return undefined;
    const value = toFieldMap(record).get(field);
    return typeof value === 'string' ? value : undefined;
  }

  private check(input: ResourceInput<T>): void {
    const values = toFieldMap(input);
    assertRequired(values, this.rules.required);
    assertAllowed(values, this.rules.allowed ?? {});
    this.rules.validate?.(input);
  }
}
