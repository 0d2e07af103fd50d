import { z } from 'zod';

const TimestampSecondsSchema = z.number().int().min(0);

export const MessageRoleSchema = z.enum(['user', 'assistant', 'system']);

export type MessageRole = z.infer<typeof MessageRoleSchema>;

export const ApiConversationSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullable().optional(),
  created_at: TimestampSecondsSchema,
});

export type ApiConversation = z.infer<typeof ApiConversationSchema>;

export const ApiConversationSummarySchema = z.object({
  id: z.string().min(1),
  title: z.string().nullable().optional(),
  last_message: z.string().nullable().optional(),
  created_at: TimestampSecondsSchema,
  updated_at: TimestampSecondsSchema.nullable().optional(),
  message_count: z.number().int().optional(),
});

export type ApiConversationSummary = z.infer<typeof ApiConversationSummarySchema>;

export const ConversationListResponseSchema = z.object({
  conversations: z.array(ApiConversationSummarySchema),
});

export type ConversationListResponse = z.infer<typeof ConversationListResponseSchema>;

export const ApiMessageSchema = z.object({
  id: z.string(),
  role: MessageRoleSchema,
  content: z.string(),
  created_at: TimestampSecondsSchema,
});

export type ApiMessage = z.infer<typeof ApiMessageSchema>;

export const ConversationDetailSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullable().optional(),
  created_at: TimestampSecondsSchema,
  messages: z.array(ApiMessageSchema),
});

export type ConversationDetail = z.infer<typeof ConversationDetailSchema>;

export const DeleteConversationResponseSchema = z.object({
  deleted: z.boolean(),
});

export type DeleteConversationResponse = z.infer<typeof DeleteConversationResponseSchema>;
