import { join } from 'node:path';
import { z } from 'zod';
import { PersistedConversationSummarySchema, PersistedMessageSchema } from '@chatsync/protocol';
import { DecodeError } from '@/errors';
import { readJsonFile, removeDirectory, removeFile, writeJsonFileAtomic } from '@/persistence/atomicFile';
import { logger } from '@/ui/logger';
import { AsyncLock } from '@/utils/lock';
import { nowSeconds, type Clock } from '@/utils/time';
import { normalizeConversations, normalizeMessages, pickNewerConversation, safeFileName } from './normalize';
import {
    messageFromRecord,
    messageToRecord,
    summaryFromRecord,
    summaryToRecord,
    type ConversationSummary,
    type Message,
} from './types';

const ConversationsFileSchema = z.array(PersistedConversationSummarySchema);
const MessagesFileSchema = z.array(PersistedMessageSchema);

export type ConversationCacheOptions = {
    directory: string;
    maxConversations?: number;
    maxMessagesPerConversation?: number;
    now?: Clock;
};

export type ConversationPatch = {
    id: string;
    title?: string;
    createdAt?: number;
    updatedAt?: number;
    lastMessage?: string;
    messageCount?: number;
};

/**
 * Local cache of conversation summaries and per-conversation message logs.
 *
 * The cache is never authoritative: unreadable files load as empty, and failed
 * writes are logged and dropped so the caller's in-memory state stays usable.
 * All operations on one instance run one at a time.
 */
export class ConversationCache {
    readonly maxConversations: number;
    readonly maxMessagesPerConversation: number;

    private readonly directory: string;
    private readonly now: Clock;
    private readonly lock = new AsyncLock();

    constructor(opts: ConversationCacheOptions) {
        this.directory = opts.directory;
        this.maxConversations = opts.maxConversations ?? 50;
        this.maxMessagesPerConversation = opts.maxMessagesPerConversation ?? 100;
        this.now = opts.now ?? nowSeconds;
    }

    get conversationsFile(): string {
        return join(this.directory, 'conversations.json');
    }

    messagesFile(conversationId: string): string {
        return join(this.directory, `messages_${safeFileName(conversationId)}.json`);
    }

    //
    // Conversations
    //

    loadConversations(): Promise<ConversationSummary[]> {
        return this.lock.inLock(() => this.readConversations());
    }

    saveConversations(conversations: readonly ConversationSummary[]): Promise<void> {
        return this.lock.inLock(() => this.writeConversations(conversations));
    }

    upsertConversations(batch: readonly ConversationSummary[]): Promise<void> {
        return this.lock.inLock(async () => {
            const merged = await this.readConversations();
            for (const item of batch) {
                const index = merged.findIndex((existing) => existing.id === item.id);
                if (index === -1) {
                    merged.push(item);
                } else {
                    merged[index] = pickNewerConversation(merged[index], item);
                }
            }
            await this.writeConversations(merged);
        });
    }

    upsertConversation(patch: ConversationPatch): Promise<void> {
        const id = patch.id.trim();
        if (!id) {
            return Promise.resolve();
        }

        return this.lock.inLock(async () => {
            const all = await this.readConversations();
            const now = this.now();
            const index = all.findIndex((item) => item.id === id);

            if (index === -1) {
                all.push(withOptionalText({
                    id,
                    createdAt: patch.createdAt ?? now,
                    updatedAt: patch.updatedAt ?? now,
                    messageCount: Math.max(0, patch.messageCount ?? 0),
                }, patch.title, patch.lastMessage));
            } else {
                const current = all[index];
                all[index] = withOptionalText({
                    id,
                    createdAt: patch.createdAt ?? current.createdAt,
                    updatedAt: patch.updatedAt ?? current.updatedAt ?? current.createdAt,
                    messageCount: Math.max(0, patch.messageCount ?? current.messageCount),
                }, patch.title ?? current.title, patch.lastMessage ?? current.lastMessage);
            }

            await this.writeConversations(all);
        });
    }

    removeConversation(conversationId: string): Promise<void> {
        return this.lock.inLock(async () => {
            const remaining = (await this.readConversations()).filter((item) => item.id !== conversationId);
            await this.writeConversations(remaining);
            try {
                await removeFile(this.messagesFile(conversationId));
            } catch (error) {
                logger.warn(`[CACHE] Failed to remove message log for ${conversationId}`, error);
            }
        });
    }

    //
    // Messages
    //

    loadMessages(conversationId: string): Promise<Message[]> {
        return this.lock.inLock(() => this.readMessages(conversationId));
    }

    replaceMessages(conversationId: string, messages: readonly Message[]): Promise<void> {
        return this.lock.inLock(() => this.writeMessages(conversationId, messages));
    }

    upsertMessages(conversationId: string, messages: readonly Message[]): Promise<void> {
        return this.lock.inLock(async () => {
            const current = await this.readMessages(conversationId);
            await this.writeMessages(conversationId, [...current, ...messages]);
        });
    }

    /** Drops every cached file. Used on sign-out. */
    clear(): Promise<void> {
        return this.lock.inLock(async () => {
            try {
                await removeDirectory(this.directory);
            } catch (error) {
                logger.warn('[CACHE] Failed to clear cache directory', error);
            }
        });
    }

    //
    // Internals, only called while holding the lock
    //

    private async readConversations(): Promise<ConversationSummary[]> {
        const records = await this.readRecords(this.conversationsFile, ConversationsFileSchema);
        return normalizeConversations(records.map(summaryFromRecord), this.maxConversations);
    }

    private async writeConversations(conversations: readonly ConversationSummary[]): Promise<void> {
        const normalized = normalizeConversations(conversations, this.maxConversations);
        await this.writeRecords(this.conversationsFile, ConversationsFileSchema, normalized.map(summaryToRecord));
    }

    private async readMessages(conversationId: string): Promise<Message[]> {
        const records = await this.readRecords(this.messagesFile(conversationId), MessagesFileSchema);
        return normalizeMessages(records.map(messageFromRecord), this.maxMessagesPerConversation);
    }

    private async writeMessages(conversationId: string, messages: readonly Message[]): Promise<void> {
        const normalized = normalizeMessages(messages, this.maxMessagesPerConversation);
        await this.writeRecords(this.messagesFile(conversationId), MessagesFileSchema, normalized.map(messageToRecord));
    }

    private async readRecords<T>(path: string, schema: z.ZodType<T[]>): Promise<T[]> {
        try {
            const raw = await readJsonFile(path);
            if (raw === null) {
                return [];
            }
            const parsed = schema.safeParse(raw);
            if (!parsed.success) {
                logger.debug(`[CACHE] Ignoring malformed cache file ${path}`);
                return [];
            }
            return parsed.data;
        } catch (error) {
            logger.debug(`[CACHE] Failed to read ${path}`, error);
            return [];
        }
    }

    private async writeRecords<T>(path: string, schema: z.ZodType<T[]>, records: T[]): Promise<void> {
        // Caller-supplied data that cannot be persisted is a programming error, not disk pressure.
        const parsed = schema.safeParse(records);
        if (!parsed.success) {
            throw new DecodeError(`Refusing to cache invalid records: ${parsed.error.message}`);
        }

        try {
            await writeJsonFileAtomic(path, parsed.data);
        } catch (error) {
            logger.warn(`[CACHE] Failed to write ${path}`, error);
        }
    }
}

function withOptionalText(
    base: Omit<ConversationSummary, 'title' | 'lastMessage'>,
    title: string | undefined,
    lastMessage: string | undefined,
): ConversationSummary {
    return {
        ...base,
        ...(title !== undefined ? { title } : {}),
        ...(lastMessage !== undefined ? { lastMessage } : {}),
    };
}
