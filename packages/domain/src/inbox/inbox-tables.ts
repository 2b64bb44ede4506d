/**
 * Inbox tables and rules: message pools and inbox messages
 */

import type { ChildTableDefinition, TableDefinition } from '@ehr-backend/core';
import {
  InboxMessageSchema,
  MessagePoolMemberSchema,
  MessagePoolSchema,
  type InboxMessage,
  type MessagePool,
  type MessagePoolMember,
} from '@ehr-backend/types';

import type { ChildRules, ResourceRules } from '../shared/index.js';

export type MessagePoolFilter = 'type' | 'organization';

export const messagePoolTable: TableDefinition<MessagePool, MessagePoolFilter> = {
  table: 'message_pool',
  resourceType: 'MessagePool',
  schema: MessagePoolSchema,
  filters: {
    type: { field: 'poolType', kind: 'token' },
    organization: { field: 'organizationId', kind: 'reference' },
  },
  references: {
    organizationId: { table: 'organization', onDelete: 'restrict' },
  },
};

export const messagePoolRules: ResourceRules<MessagePool> = {
  required: ['poolName', 'poolType'],
  defaults: () => ({ isActive: true }),
};

export const messagePoolMemberTable: ChildTableDefinition<MessagePoolMember, 'poolId'> = {
  table: 'message_pool_member',
  resourceType: 'MessagePoolMember',
  schema: MessagePoolMemberSchema,
  parentField: 'poolId',
  parentTable: 'message_pool',
};

export const messagePoolMemberRules: ChildRules<MessagePoolMember, 'poolId'> = {
  required: ['userId'],
  defaults: () => ({ isActive: true }),
};

export type InboxMessageFilter = 'patient' | 'status' | 'recipient' | 'pool' | 'type';

export const inboxMessageTable: TableDefinition<InboxMessage, InboxMessageFilter> = {
  table: 'inbox_message',
  resourceType: 'InboxMessage',
  schema: InboxMessageSchema,
  filters: {
    patient: { field: 'patientId', kind: 'reference' },
    status: { field: 'status', kind: 'token' },
    recipient: { field: 'recipientId', kind: 'reference' },
    pool: { field: 'poolId', kind: 'reference' },
    type: { field: 'messageType', kind: 'token' },
  },
  references: {
    patientId: { table: 'patient', onDelete: 'restrict' },
    encounterId: { table: 'encounter', onDelete: 'restrict' },
    poolId: { table: 'message_pool', onDelete: 'restrict' },
    parentId: { table: 'inbox_message', onDelete: 'restrict' },
  },
};

/** Status is free text for messages; only its default is fixed */
export const inboxMessageRules: ResourceRules<InboxMessage> = {
  required: ['messageType', 'subject'],
  statusField: 'status',
  patientField: 'patientId',
  defaults: () => ({ status: 'unread', priority: 'normal', isUrgent: false }),
};
