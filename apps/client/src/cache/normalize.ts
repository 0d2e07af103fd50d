import { stableHash } from '@/utils/stableHash';
import { effectiveTimestamp, type ConversationSummary, type Message } from './types';

/**
 * Last-writer-wins between two versions of one conversation.
 * The incoming version wins ties so re-applying a server response is idempotent.
 */
export function pickNewerConversation(existing: ConversationSummary, incoming: ConversationSummary): ConversationSummary {
    return effectiveTimestamp(incoming) >= effectiveTimestamp(existing) ? incoming : existing;
}

/**
 * Collapses duplicate ids, sorts by recency (newest first) and keeps the first `maxConversations`.
 */
export function normalizeConversations(conversations: readonly ConversationSummary[], maxConversations: number): ConversationSummary[] {
    const bestById = new Map<string, ConversationSummary>();
    for (const item of conversations) {
        const existing = bestById.get(item.id);
        bestById.set(item.id, existing ? pickNewerConversation(existing, item) : item);
    }

    return [...bestById.values()]
        .sort((a, b) => effectiveTimestamp(b) - effectiveTimestamp(a))
        .slice(0, Math.max(0, maxConversations));
}

/** `id:<id>` for server-known messages, otherwise role, time and content hash. */
export function messageKey(message: Message): string {
    if (message.id.trim()) {
        return `id:${message.id}`;
    }
    return `f:${message.role}:${message.createdAt}:${stableHash(message.content)}`;
}

export function compareMessages(a: Message, b: Message): number {
    if (a.createdAt !== b.createdAt) {
        return a.createdAt - b.createdAt;
    }
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
}

/**
 * Dedups by message key (last seen wins), sorts ascending by (createdAt, id)
 * and keeps the most recent `maxMessages`.
 */
export function normalizeMessages(messages: readonly Message[], maxMessages: number): Message[] {
    const latestByKey = new Map<string, Message>();
    for (const message of messages) {
        latestByKey.set(messageKey(message), message);
    }

    const sorted = [...latestByKey.values()].sort(compareMessages);
    const limit = Math.max(0, maxMessages);
    if (sorted.length <= limit) {
        return sorted;
    }
    return sorted.slice(sorted.length - limit);
}

/** Replaces every character outside [A-Za-z0-9_-] with `_`. */
export function safeFileName(input: string): string {
    return input.replace(/[^A-Za-z0-9_-]/g, '_');
}
