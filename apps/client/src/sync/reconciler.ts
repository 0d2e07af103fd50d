import type { ApiConversation, ApiConversationSummary, ChatMessageResponse, ConversationDetail } from '@chatsync/protocol';
import type { ConversationCache } from '@/cache/conversationCache';
import { messageFromRecord, summaryFromRecord, type Message } from '@/cache/types';
import { AuthExpiredError, NetworkError } from '@/errors';
import type { MessageOutbox, PendingMessage } from '@/outbox/messageOutbox';
import { logger } from '@/ui/logger';

export type SendFailureOutcome = 'halt' | 'failed' | 'retry';

export type StreamCompletion = {
    /** Empty when the server did not name the reply. */
    messageId: string;
    content: string;
    createdAt: number;
};

export type ReconcilerOptions = {
    cache: ConversationCache;
    outbox: MessageOutbox;
};

/**
 * Writes server results back into the cache and advances the outbox.
 * Holds no state of its own; ordering comes from the caller.
 */
export class Reconciler {
    private readonly cache: ConversationCache;
    private readonly outbox: MessageOutbox;

    constructor(opts: ReconcilerOptions) {
        this.cache = opts.cache;
        this.outbox = opts.outbox;
    }

    async applyChatReply(pending: PendingMessage, reply: ChatMessageResponse): Promise<void> {
        const conversationId = reply.conversation_id.trim() || pending.conversationId;
        await this.commitExchange(pending, conversationId, {
            id: reply.message_id,
            role: reply.role,
            content: reply.content,
            createdAt: reply.created_at,
        });
    }

    /** Only for a stream that reached its terminal event. */
    async applyStreamCompletion(pending: PendingMessage, completion: StreamCompletion): Promise<void> {
        await this.commitExchange(pending, pending.conversationId, {
            id: completion.messageId,
            role: 'assistant',
            content: completion.content,
            createdAt: completion.createdAt,
        });
    }

    async applyCreatedConversation(pendingId: string, conversation: ApiConversation): Promise<void> {
        await this.cache.upsertConversation({
            id: conversation.id,
            title: conversation.title ?? undefined,
            createdAt: conversation.created_at,
        });
        await this.outbox.updateConversationId(pendingId, conversation.id);
        await this.outbox.assignConversationIdToEmpty(conversation.id);
        logger.debug(`[SYNC] Conversation ${conversation.id} created for ${pendingId}`);
    }

    async applyConversationList(list: readonly ApiConversationSummary[]): Promise<void> {
        await this.cache.upsertConversations(list.map(summaryFromRecord));
    }

    async applyConversationDetail(detail: ConversationDetail): Promise<void> {
        const messages = detail.messages.map(messageFromRecord);
        await this.cache.replaceMessages(detail.id, messages);

        const last = messages.reduce<Message | undefined>(
            (latest, message) => (!latest || message.createdAt >= latest.createdAt ? message : latest),
            undefined,
        );
        await this.cache.upsertConversation({
            id: detail.id,
            title: detail.title ?? undefined,
            createdAt: detail.created_at,
            updatedAt: last?.createdAt,
            lastMessage: last?.content,
            messageCount: messages.length,
        });
    }

    async applyDeletedConversation(conversationId: string): Promise<void> {
        await this.cache.removeConversation(conversationId);
    }

    /**
     * Moves a failed send along the outbox state machine.
     * An expired session parks the entry untouched so it goes out after sign-in.
     */
    async applySendFailure(pendingId: string, error: unknown, maxRetries = 3): Promise<SendFailureOutcome> {
        if (error instanceof AuthExpiredError) {
            await this.outbox.markPending(pendingId);
            logger.debug(`[SYNC] Session expired while sending ${pendingId}, halting`);
            return 'halt';
        }

        const count = await this.outbox.incrementRetryCount(pendingId);
        const timedOut = error instanceof NetworkError && error.timedOut;
        if (timedOut || count >= maxRetries) {
            await this.outbox.markFailed(pendingId);
            logger.debug(`[SYNC] Giving up on ${pendingId} after ${count} attempt(s)${timedOut ? ' (timeout)' : ''}`);
            return 'failed';
        }

        await this.outbox.markPending(pendingId);
        logger.debug(`[SYNC] Will retry ${pendingId} (${count}/${maxRetries})`);
        return 'retry';
    }

    private async commitExchange(pending: PendingMessage, conversationId: string, reply: Message): Promise<void> {
        const sent: Message = {
            id: '',
            role: 'user',
            content: pending.message,
            createdAt: pending.createdAt,
            deliveryState: 'sent',
        };
        await this.cache.upsertMessages(conversationId, [sent, reply]);

        const current = (await this.cache.loadConversations()).find((item) => item.id === conversationId);
        await this.cache.upsertConversation({
            id: conversationId,
            lastMessage: reply.content,
            updatedAt: Math.max(reply.createdAt, pending.createdAt),
            messageCount: (current?.messageCount ?? 0) + 2,
        });

        await this.outbox.remove(pending.id);
        logger.debug(`[SYNC] Delivered ${pending.id} to ${conversationId}`);
    }
}
