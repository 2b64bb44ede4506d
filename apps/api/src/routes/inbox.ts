/**
 * @fileoverview Message pool and inbox message routes
 *
 * @module api/routes/inbox
 */

import {
  CreateInboxMessageSchema,
  CreateMessagePoolMemberSchema,
  CreateMessagePoolSchema,
} from '@ehr-backend/types';
import type { FastifyPluginAsync } from 'fastify';

import { registerChildRoutes, registerResourceRoutes } from './resource-routes.js';
import type { ResourceRoutesOptions } from './types.js';

export const inboxRoutes: FastifyPluginAsync<ResourceRoutesOptions> = async (
  fastify,
  { services }
) => {
  registerResourceRoutes(fastify, {
    path: '/message-pools',
    tag: 'Inbox',
    service: services.messagePools,
    body: CreateMessagePoolSchema,
  });

  registerChildRoutes(fastify, {
    parentPath: '/message-pools',
    segment: 'members',
    tag: 'Inbox',
    service: services.messagePoolMembers,
    body: CreateMessagePoolMemberSchema,
  });

  registerResourceRoutes(fastify, {
    path: '/inbox-messages',
    tag: 'Inbox',
    service: services.inboxMessages,
    body: CreateInboxMessageSchema,
  });
};
