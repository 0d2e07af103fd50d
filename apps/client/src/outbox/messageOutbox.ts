import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
    PersistedPendingMessageSchema,
    type PendingMessageStatus,
    type PersistedPendingMessage,
} from '@chatsync/protocol';
import { StorageError, ValidationError } from '@/errors';
import { readJsonFile, writeJsonFileAtomic } from '@/persistence/atomicFile';
import { logger } from '@/ui/logger';
import { AsyncLock } from '@/utils/lock';
import { nowSeconds, type Clock } from '@/utils/time';

const OutboxFileSchema = z.array(PersistedPendingMessageSchema);

export type PendingMessage = {
    /** Local id, stable for the lifetime of the send attempt. */
    id: string;
    message: string;
    /** Empty while no conversation exists for this send yet. */
    conversationId: string;
    createdAt: number;
    status: PendingMessageStatus;
    retryCount: number;
};

export type MessageOutboxOptions = {
    file: string;
    now?: Clock;
    generateId?: () => string;
};

function fromRecord(record: PersistedPendingMessage): PendingMessage {
    return {
        id: record.id,
        message: record.message,
        conversationId: record.conversation_id,
        createdAt: record.created_at,
        status: record.status,
        retryCount: record.retry_count,
    };
}

function toRecord(pending: PendingMessage): PersistedPendingMessage {
    return {
        id: pending.id,
        message: pending.message,
        conversation_id: pending.conversationId,
        created_at: pending.createdAt,
        status: pending.status,
        retry_count: pending.retryCount,
    };
}

function byCreatedAt(a: PendingMessage, b: PendingMessage): number {
    return a.createdAt - b.createdAt;
}

function normalizeConversationId(conversationId: string | null | undefined): string {
    return (conversationId ?? '').trim();
}

/**
 * Persisted queue of messages not yet confirmed by the server.
 *
 * Every mutation is written through before it resolves. If the write fails the
 * in-memory queue is rolled back and the call rejects with StorageError, so the
 * queue never reports a state that is not on disk.
 *
 * Status flow: pending -> sending -> pending | failed; failed -> pending only
 * through resetForManualRetry. Delivery removes the entry.
 */
export class MessageOutbox {
    private readonly file: string;
    private readonly now: Clock;
    private readonly generateId: () => string;
    private readonly lock = new AsyncLock();
    private messages: PendingMessage[];

    private constructor(opts: MessageOutboxOptions, messages: PendingMessage[]) {
        this.file = opts.file;
        this.now = opts.now ?? nowSeconds;
        this.generateId = opts.generateId ?? randomUUID;
        this.messages = messages;
    }

    static async open(opts: MessageOutboxOptions): Promise<MessageOutbox> {
        return new MessageOutbox(opts, await loadFromFile(opts.file));
    }

    enqueue(text: string, conversationId?: string | null): Promise<PendingMessage> {
        const message = text.trim();
        if (!message) {
            return Promise.reject(new ValidationError('Message text is empty'));
        }

        return this.mutate(() => {
            const pending: PendingMessage = {
                id: this.generateId(),
                message,
                conversationId: normalizeConversationId(conversationId),
                createdAt: this.now(),
                status: 'pending',
                retryCount: 0,
            };
            this.messages.push(pending);
            logger.debug(`[OUTBOX] Enqueued ${pending.id} for conversation '${pending.conversationId}'`);
            return { changed: true, result: { ...pending } };
        });
    }

    get(id: string): Promise<PendingMessage | null> {
        return this.lock.inLock(() => {
            const found = this.messages.find((item) => item.id === id);
            return found ? { ...found } : null;
        });
    }

    list(conversationId?: string | null): Promise<PendingMessage[]> {
        const normalized = normalizeConversationId(conversationId);
        return this.lock.inLock(() => this.sortedCopy((item) => item.conversationId === normalized));
    }

    listWithoutConversation(): Promise<PendingMessage[]> {
        return this.lock.inLock(() => this.sortedCopy((item) => item.conversationId === ''));
    }

    /**
     * Earliest pending or sending entry for the conversation. Unassigned entries
     * also qualify, so sends made before the conversation existed drain into it.
     */
    nextPending(conversationId?: string | null): Promise<PendingMessage | null> {
        const normalized = normalizeConversationId(conversationId);
        return this.lock.inLock(() => {
            const candidates = this.sortedCopy((item) => {
                if (item.status !== 'pending' && item.status !== 'sending') return false;
                if (!normalized) return item.conversationId === '';
                return item.conversationId === normalized || item.conversationId === '';
            });
            return candidates[0] ?? null;
        });
    }

    markSending(id: string): Promise<void> {
        return this.updateStatus(id, 'sending');
    }

    markPending(id: string): Promise<void> {
        return this.updateStatus(id, 'pending');
    }

    markFailed(id: string): Promise<void> {
        return this.updateStatus(id, 'failed');
    }

    /** User-initiated retry: back to pending with a fresh retry budget. */
    resetForManualRetry(id: string): Promise<void> {
        return this.mutate(() => {
            const item = this.messages.find((candidate) => candidate.id === id);
            if (!item) return { changed: false, result: undefined };
            item.status = 'pending';
            item.retryCount = 0;
            return { changed: true, result: undefined };
        });
    }

    /** Returns the new count, or 0 for an unknown id. Backoff is up to the caller. */
    incrementRetryCount(id: string): Promise<number> {
        return this.mutate(() => {
            const item = this.messages.find((candidate) => candidate.id === id);
            if (!item) return { changed: false, result: 0 };
            item.retryCount += 1;
            return { changed: true, result: item.retryCount };
        });
    }

    updateConversationId(id: string, conversationId: string): Promise<void> {
        const normalized = normalizeConversationId(conversationId);
        if (!normalized) {
            return Promise.resolve();
        }
        return this.mutate(() => {
            const item = this.messages.find((candidate) => candidate.id === id);
            if (!item) return { changed: false, result: undefined };
            item.conversationId = normalized;
            return { changed: true, result: undefined };
        });
    }

    /** Moves every unassigned entry into `conversationId`. */
    assignConversationIdToEmpty(conversationId: string): Promise<void> {
        const normalized = normalizeConversationId(conversationId);
        if (!normalized) {
            return Promise.resolve();
        }
        return this.mutate(() => {
            let changed = false;
            for (const item of this.messages) {
                if (item.conversationId === '') {
                    item.conversationId = normalized;
                    changed = true;
                }
            }
            return { changed, result: undefined };
        });
    }

    remove(id: string): Promise<void> {
        return this.mutate(() => {
            const before = this.messages.length;
            this.messages = this.messages.filter((item) => item.id !== id);
            return { changed: this.messages.length !== before, result: undefined };
        });
    }

    /** Drops every queued message. Used on sign-out. */
    clear(): Promise<void> {
        return this.mutate(() => {
            const changed = this.messages.length > 0;
            this.messages = [];
            return { changed, result: undefined };
        });
    }

    private updateStatus(id: string, status: PendingMessageStatus): Promise<void> {
        return this.mutate(() => {
            const item = this.messages.find((candidate) => candidate.id === id);
            if (!item) return { changed: false, result: undefined };
            item.status = status;
            return { changed: true, result: undefined };
        });
    }

    private sortedCopy(predicate: (item: PendingMessage) => boolean): PendingMessage[] {
        return this.messages
            .filter(predicate)
            .sort(byCreatedAt)
            .map((item) => ({ ...item }));
    }

    private mutate<T>(apply: () => { changed: boolean; result: T }): Promise<T> {
        return this.lock.inLock(async () => {
            const snapshot = this.messages.map((item) => ({ ...item }));
            const { changed, result } = apply();
            if (!changed) {
                return result;
            }

            try {
                await writeJsonFileAtomic(this.file, this.messages.map(toRecord));
            } catch (error) {
                this.messages = snapshot;
                logger.warn('[OUTBOX] Failed to persist outbox', error);
                throw new StorageError('Failed to persist the outbox', { cause: error });
            }
            return result;
        });
    }
}

async function loadFromFile(file: string): Promise<PendingMessage[]> {
    try {
        const raw = await readJsonFile(file);
        if (raw === null) {
            return [];
        }
        const parsed = OutboxFileSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn(`[OUTBOX] Ignoring malformed outbox file ${file}`);
            return [];
        }
        return parsed.data.map(fromRecord);
    } catch (error) {
        logger.warn(`[OUTBOX] Failed to read outbox file ${file}`, error);
        return [];
    }
}
