export { ApiClient, type ApiClientOptions } from '@/api/apiClient';
export { parseSseLine, readSseChunks, type SseLine, type StreamChunk } from '@/api/sse';
export { ConversationCache, type ConversationCacheOptions, type ConversationPatch } from '@/cache/conversationCache';
export { compareMessages, messageKey, normalizeConversations, normalizeMessages, safeFileName } from '@/cache/normalize';
export { effectiveTimestamp, type ConversationSummary, type Message } from '@/cache/types';
export { configuration, createConfiguration, DEFAULT_SERVER_URL, type Configuration, type LogLevel } from '@/configuration';
export { createSyncContext, SyncContext, type SendResult, type SyncContextOptions } from '@/context';
export {
    AbortedError,
    ApiError,
    AuthExpiredError,
    ChatSyncError,
    DecodeError,
    isAuthFailure,
    NetworkError,
    StorageError,
    ValidationError,
    type AuthExpiredReason,
} from '@/errors';
export { MessageOutbox, type MessageOutboxOptions, type PendingMessage } from '@/outbox/messageOutbox';
export {
    SessionManager,
    type RefreshedToken,
    type RefreshTokenFn,
    type Session,
    type SessionExpiredEvent,
    type SessionExpiredListener,
    type SessionManagerOptions,
} from '@/session/sessionManager';
export { FileTokenStore, MemoryTokenStore, type StoredCredentials, type TokenStore } from '@/session/tokenStore';
export { OutboxDrainer, type ChatTransport, type DrainResult, type OutboxDrainerOptions, type StreamDeltaEvent } from '@/sync/outboxDrainer';
export { Reconciler, type ReconcilerOptions, type SendFailureOutcome, type StreamCompletion } from '@/sync/reconciler';
export { Logger, logger } from '@/ui/logger';
