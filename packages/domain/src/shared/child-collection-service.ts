/**
 * Child Collection Service
 *
 * Validates rows owned by a parent resource and delegates to the child
 * repository. The parent must exist: adding to, listing or removing from a
 * missing parent fails with RecordNotFoundError.
 *
 * @module domain/shared/child-collection-service
 */

import type { ChildInput, ChildRepository } from '@ehr-backend/core';
import type { ChildMeta } from '@ehr-backend/types';

import { assertAllowed, assertRequired, toFieldMap, withDefaults, type AllowedValues } from './validation.js';

type ChildField<C extends ChildMeta, P extends keyof C> = keyof ChildInput<C, P> & string;

export interface ChildRules<C extends ChildMeta, P extends keyof C & string> {
  required: readonly ChildField<C, P>[];
  allowed?: AllowedValues<ChildField<C, P>>;
  defaults?: () => Partial<ChildInput<C, P>>;
}

/** Anything that can confirm a parent exists */
export interface ParentLookup {
  getById(id: string): Promise<unknown>;
}

export class ChildCollectionService<C extends ChildMeta, P extends keyof C & string> {
  constructor(
    private readonly parent: ParentLookup,
    private readonly repository: ChildRepository<C, P>,
    private readonly rules: ChildRules<C, P>
  ) {}

  get resourceType(): string {
    return this.repository.definition.resourceType;
  }

  async add(parentId: string, input: ChildInput<C, P>): Promise<C> {
    await this.parent.getById(parentId);

    const prepared = this.rules.defaults ? withDefaults(input, this.rules.defaults()) : input;
    const values = toFieldMap(prepared);
    assertRequired(values, this.rules.required);
    assertAllowed(values, this.rules.allowed ?? {});

    return this.repository.add(parentId, prepared);
  }

  async list(parentId: string): Promise<C[]> {
    await this.parent.getById(parentId);
    return this.repository.listByParent(parentId);
  }

  async remove(parentId: string, childId: string): Promise<void> {
    await this.parent.getById(parentId);
    await this.repository.remove(parentId, childId);
  }
}
