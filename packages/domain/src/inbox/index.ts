/**
 * @fileoverview Clinical inbox: shared message pools and messages
 *
 * @module domain/inbox
 */

import type { RepositoryBackend } from '@ehr-backend/core';
import type { InboxMessage, MessagePool, MessagePoolMember } from '@ehr-backend/types';

import { ChildCollectionService, ResourceService } from '../shared/index.js';
import {
  inboxMessageRules,
  inboxMessageTable,
  messagePoolMemberRules,
  messagePoolMemberTable,
  messagePoolRules,
  messagePoolTable,
  type InboxMessageFilter,
  type MessagePoolFilter,
} from './inbox-tables.js';

export * from './inbox-tables.js';

export interface InboxServices {
  messagePools: ResourceService<MessagePool, MessagePoolFilter>;
  messagePoolMembers: ChildCollectionService<MessagePoolMember, 'poolId'>;
  inboxMessages: ResourceService<InboxMessage, InboxMessageFilter>;
}

export function createInboxServices(backend: RepositoryBackend): InboxServices {
  const { unitOfWork } = backend;
  const messagePools = new ResourceService(
    backend.resources(messagePoolTable),
    messagePoolRules,
    unitOfWork
  );

  return {
    messagePools,
    messagePoolMembers: new ChildCollectionService(
      messagePools,
      backend.children(messagePoolMemberTable),
      messagePoolMemberRules
    ),
    inboxMessages: new ResourceService(
      backend.resources(inboxMessageTable),
      inboxMessageRules,
      unitOfWork
    ),
  };
}
