/**
 * Status Tracking Service
 *
 * Resource service for families whose status changes are audited: every
 * create and every status change appends a history row inside the same
 * unit of work as the write. An optional transition table restricts which
 * status may follow which.
 *
 * @module domain/shared/status-tracking-service
 */

import {
  ValidationError,
  type NewResource,
  type ResourceInput,
  type ResourceRepository,
  type UnitOfWork,
} from '@ehr-backend/core';
import type { ResourceMeta } from '@ehr-backend/types';

import { ResourceService, type ResourceRules } from './resource-service.js';

/**
 * Appends status history rows for one resource family
 */
export interface StatusHistoryWriter {
  record(resourceId: string, fromStatus: string | undefined, toStatus: string): Promise<void>;
}

/** Allowed next statuses, keyed by current status */
export type TransitionTable = Readonly<Record<string, readonly string[]>>;

export class StatusTrackingService<T extends ResourceMeta, F extends string> extends ResourceService<
  T,
  F
> {
  constructor(
    repository: ResourceRepository<T, F>,
    rules: ResourceRules<T>,
    unitOfWork: UnitOfWork,
    private readonly history: StatusHistoryWriter,
    private readonly transitions?: TransitionTable
  ) {
    super(repository, rules, unitOfWork);
  }

  override create(input: NewResource<T>): Promise<T> {
    return this.unitOfWork.run(async () => {
      const record = await super.create(input);
      const status = this.statusOf(record);
      if (status !== undefined) {
        await this.history.record(record.id, undefined, status);
      }
      return record;
    });
  }

  override update(id: string, input: ResourceInput<T>): Promise<T> {
    return this.unitOfWork.run(async () => {
      const current = await this.repository.getById(id);
      const prepared = this.prepareUpdate(input, current);
      const fromStatus = this.statusOf(current);
      const toStatus = this.statusOf(prepared);

      if (fromStatus !== undefined && toStatus !== undefined && fromStatus !== toStatus) {
        this.assertTransition(fromStatus, toStatus);
      }

      const updated = await this.repository.update(id, prepared);
      if (toStatus !== undefined && fromStatus !== toStatus) {
        await this.history.record(id, fromStatus, toStatus);
        this.logger.info(
          { id, fromStatus, toStatus },
          `${this.resourceType} status changed`
        );
      }
      return updated;
    });
  }

  /**
   * @throws ValidationError `invalid status transition: <from> -> <to>`
   */
  assertTransition(fromStatus: string, toStatus: string): void {
    if (this.transitions === undefined) return;
    const next = this.transitions[fromStatus] ?? [];
    if (!next.includes(toStatus)) {
      throw new ValidationError(`invalid status transition: ${fromStatus} -> ${toStatus}`);
    }
  }
}
