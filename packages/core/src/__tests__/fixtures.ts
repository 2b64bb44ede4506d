/**
 * Table definitions shared by the repository tests
 */

import { z } from 'zod';
import {
  ChildMetaSchema,
  DateSchema,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from '@ehr-backend/types';

import type { ChildTableDefinition, TableDefinition } from '../repositories/types.js';

export const OwnerSchema = ResourceMetaSchema.extend({
  lastName: z.string(),
  firstName: optional(z.string()),
});

export type Owner = z.infer<typeof OwnerSchema>;

export const ownerTable: TableDefinition<Owner, 'family'> = {
  table: 'owner',
  resourceType: 'Owner',
  schema: OwnerSchema,
  orderBy: [
    { field: 'lastName', direction: 'asc' },
    { field: 'firstName', direction: 'asc' },
  ],
  filters: {
    family: { field: 'lastName', kind: 'string' },
  },
};

export const WidgetSchema = ResourceMetaSchema.extend({
  ownerId: UUIDSchema,
  status: optional(z.string()),
  label: optional(z.string()),
  madeOn: optional(DateSchema),
  seenAt: optional(z.string()),
});

export type Widget = z.infer<typeof WidgetSchema>;

export type WidgetFilter = 'owner' | 'status' | 'label' | 'made' | 'seen';

export const widgetTable: TableDefinition<Widget, WidgetFilter> = {
  table: 'widget',
  resourceType: 'Widget',
  schema: WidgetSchema,
  immutable: ['ownerId'],
  filters: {
    owner: { field: 'ownerId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    label: { field: 'label', kind: 'string' },
    made: { field: 'madeOn', kind: 'date' },
    seen: { field: 'seenAt', kind: 'datetime' },
  },
  references: {
    ownerId: { table: 'owner', onDelete: 'restrict' },
  },
};

export const PartSchema = ChildMetaSchema.extend({
  widgetId: UUIDSchema,
  name: z.string(),
  position: optional(z.number().int()),
});

export type Part = z.infer<typeof PartSchema>;

export const partTable: ChildTableDefinition<Part, 'widgetId'> = {
  table: 'part',
  resourceType: 'Part',
  schema: PartSchema,
  parentField: 'widgetId',
  parentTable: 'widget',
  orderBy: [{ field: 'position', direction: 'asc' }],
};

export const OWNER_ID = '5b8f2c1e-3d4a-4e6b-9c7d-1a2b3c4d5e6f';
export const WIDGET_ID = '0e1d2c3b-4a59-4687-9a6b-5c4d3e2f1a0b';
