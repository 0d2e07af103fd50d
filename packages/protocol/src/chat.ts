import { z } from 'zod';
import { MessageRoleSchema } from './conversations.js';

export const ChatRequestBodySchema = z.object({
  message: z.string().min(1),
});

export type ChatRequestBody = z.infer<typeof ChatRequestBodySchema>;

export const ChatMessageResponseSchema = z.object({
  message_id: z.string(),
  role: MessageRoleSchema,
  content: z.string(),
  conversation_id: z.string(),
  created_at: z.number().int().min(0),
});

export type ChatMessageResponse = z.infer<typeof ChatMessageResponseSchema>;

/**
 * One `data:` payload of the streaming chat endpoint.
 * Every field is optional on the wire; `delta` defaults to '' and `done` to false.
 */
export const SseChatChunkSchema = z.object({
  delta: z.string().nullable().optional(),
  done: z.boolean().nullable().optional(),
  message_id: z.string().nullable().optional(),
  content: z.string().nullable().optional(),
});

export type SseChatChunk = z.infer<typeof SseChatChunkSchema>;

export const SSE_DONE_SENTINEL = '[DONE]';
