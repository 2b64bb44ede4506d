/**
 * Inbox schemas: message pools and clinical inbox messages
 */
import { z } from 'zod';

import {
  CHILD_META_MASK,
  ChildMetaSchema,
  DateTimeSchema,
  RESOURCE_META_MASK,
  ResourceIdentityInputShape,
  ResourceMetaSchema,
  UUIDSchema,
  optional,
} from './common.js';

export const MessagePoolSchema = ResourceMetaSchema.extend({
  poolName: z.string().max(255),
  poolType: z.string().max(50),
  organizationId: optional(UUIDSchema),
  departmentId: optional(UUIDSchema),
  description: optional(z.string()),
  isActive: optional(z.boolean()),
});

export const CreateMessagePoolSchema = MessagePoolSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export const MessagePoolMemberSchema = ChildMetaSchema.extend({
  poolId: UUIDSchema,
  userId: UUIDSchema,
  role: optional(z.string().max(30)),
  isActive: optional(z.boolean()),
});

export const CreateMessagePoolMemberSchema = MessagePoolMemberSchema.omit({
  ...CHILD_META_MASK,
  poolId: true,
});

export type MessagePool = z.infer<typeof MessagePoolSchema>;
export type CreateMessagePool = z.infer<typeof CreateMessagePoolSchema>;
export type MessagePoolMember = z.infer<typeof MessagePoolMemberSchema>;
export type CreateMessagePoolMember = z.infer<typeof CreateMessagePoolMemberSchema>;

// =============================================================================
// InboxMessage
// =============================================================================

export const InboxMessageSchema = ResourceMetaSchema.extend({
  messageType: z.string().max(50),
  subject: z.string().max(500),
  status: optional(z.string().max(30)),
  priority: optional(z.string().max(20)),
  body: optional(z.string()),
  patientId: optional(UUIDSchema),
  encounterId: optional(UUIDSchema),
  senderId: optional(UUIDSchema),
  recipientId: optional(UUIDSchema),
  poolId: optional(UUIDSchema),
  parentId: optional(UUIDSchema),
  threadId: optional(UUIDSchema),
  isUrgent: optional(z.boolean()),
  dueDate: optional(DateTimeSchema),
});

export const CreateInboxMessageSchema = InboxMessageSchema.omit(RESOURCE_META_MASK).extend(
  ResourceIdentityInputShape
);

export type InboxMessage = z.infer<typeof InboxMessageSchema>;
export type CreateInboxMessage = z.infer<typeof CreateInboxMessageSchema>;
