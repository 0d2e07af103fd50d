import { z } from 'zod';
import { MessageRoleSchema } from './conversations.js';

//
// Records written to local storage. Field names are snake_case so the files
// read the same as the gateway's own JSON.
//

const TimestampSecondsSchema = z.number().int().min(0);

export const PersistedConversationSummarySchema = z.object({
  id: z.string().min(1),
  title: z.string().nullable().optional(),
  last_message: z.string().nullable().optional(),
  created_at: TimestampSecondsSchema,
  updated_at: TimestampSecondsSchema.nullable().optional(),
  message_count: z.number().int().min(0),
});

export type PersistedConversationSummary = z.infer<typeof PersistedConversationSummarySchema>;

export const DeliveryStateSchema = z.enum(['sent', 'sending', 'failed']);

export type DeliveryState = z.infer<typeof DeliveryStateSchema>;

export const PersistedMessageSchema = z.object({
  id: z.string(),
  role: MessageRoleSchema,
  content: z.string(),
  created_at: TimestampSecondsSchema,
  delivery_state: DeliveryStateSchema.optional(),
});

export type PersistedMessage = z.infer<typeof PersistedMessageSchema>;

export const PendingMessageStatusSchema = z.enum(['pending', 'sending', 'failed']);

export type PendingMessageStatus = z.infer<typeof PendingMessageStatusSchema>;

export const PersistedPendingMessageSchema = z.object({
  id: z.string().min(1),
  message: z.string(),
  conversation_id: z.string(),
  created_at: TimestampSecondsSchema,
  status: PendingMessageStatusSchema,
  retry_count: z.number().int().min(0),
});

export type PersistedPendingMessage = z.infer<typeof PersistedPendingMessageSchema>;

export const PersistedCredentialsSchema = z.object({
  token: z.string().nullable().optional(),
  expires_at: TimestampSecondsSchema.nullable().optional(),
});

export type PersistedCredentials = z.infer<typeof PersistedCredentialsSchema>;
