export {
  ApiConversationSchema,
  ApiConversationSummarySchema,
  ApiMessageSchema,
  ConversationDetailSchema,
  ConversationListResponseSchema,
  DeleteConversationResponseSchema,
  MessageRoleSchema,
  type ApiConversation,
  type ApiConversationSummary,
  type ApiMessage,
  type ConversationDetail,
  type ConversationListResponse,
  type DeleteConversationResponse,
  type MessageRole,
} from './conversations.js';
export {
  ChatMessageResponseSchema,
  ChatRequestBodySchema,
  SSE_DONE_SENTINEL,
  SseChatChunkSchema,
  type ChatMessageResponse,
  type ChatRequestBody,
  type SseChatChunk,
} from './chat.js';
export {
  ApiErrorBodySchema,
  RefreshTokenResponseSchema,
  type ApiErrorBody,
  type RefreshTokenResponse,
} from './auth.js';
export {
  DeliveryStateSchema,
  PendingMessageStatusSchema,
  PersistedConversationSummarySchema,
  PersistedCredentialsSchema,
  PersistedMessageSchema,
  PersistedPendingMessageSchema,
  type DeliveryState,
  type PendingMessageStatus,
  type PersistedConversationSummary,
  type PersistedCredentials,
  type PersistedMessage,
  type PersistedPendingMessage,
} from './persisted.js';
