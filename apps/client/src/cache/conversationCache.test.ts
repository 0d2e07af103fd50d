import { existsSync, mkdtempSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import { DecodeError } from '@/errors';
import { ConversationCache } from './conversationCache';
import { effectiveTimestamp, type ConversationSummary, type Message } from './types';

function summary(id: string, createdAt: number, extra: Partial<ConversationSummary> = {}): ConversationSummary {
    return { id, createdAt, messageCount: 0, ...extra };
}

function userMessage(index: number): Message {
    return { id: `m${String(index).padStart(3, '0')}`, role: 'user', content: `message ${index}`, createdAt: 1_000 + index };
}

describe('ConversationCache', () => {
    let directory: string;
    let cache: ConversationCache;

    beforeEach(() => {
        directory = join(mkdtempSync(join(tmpdir(), 'chatsync-cache-')), 'conversation_cache');
        cache = new ConversationCache({ directory, now: () => 5_000 });
    });

    it('returns an empty list when nothing is cached', async () => {
        expect(await cache.loadConversations()).toEqual([]);
        expect(await cache.loadMessages('c1')).toEqual([]);
    });

    it('treats a malformed conversations file as empty', async () => {
        mkdirSync(directory, { recursive: true });
        writeFileSync(join(directory, 'conversations.json'), '{not json', 'utf8');
        expect(await cache.loadConversations()).toEqual([]);

        writeFileSync(join(directory, 'conversations.json'), JSON.stringify([{ id: 'x' }]), 'utf8');
        expect(await cache.loadConversations()).toEqual([]);
    });

    it('stays bounded, sorted and unique across upserts', async () => {
        for (let batch = 0; batch < 4; batch++) {
            const items = Array.from({ length: 20 }, (_, i) => summary(`c${batch * 15 + i}`, batch * 100 + i));
            await cache.upsertConversations(items);

            const persisted = await cache.loadConversations();
            expect(persisted.length).toBeLessThanOrEqual(50);
            expect(new Set(persisted.map((c) => c.id)).size).toBe(persisted.length);
            for (let i = 1; i < persisted.length; i++) {
                expect(effectiveTimestamp(persisted[i - 1])).toBeGreaterThanOrEqual(effectiveTimestamp(persisted[i]));
            }
        }
        expect(await cache.loadConversations()).toHaveLength(50);
    });

    it('lets the incoming summary win when timestamps tie', async () => {
        await cache.upsertConversations([summary('c1', 10, { updatedAt: 20, title: 'Before', messageCount: 1 })]);
        await cache.upsertConversations([summary('c1', 10, { updatedAt: 20, title: 'After', messageCount: 2 })]);

        expect(await cache.loadConversations()).toEqual([summary('c1', 10, { updatedAt: 20, title: 'After', messageCount: 2 })]);
    });

    it('keeps the newer summary when the incoming one is older', async () => {
        await cache.upsertConversations([summary('c1', 10, { updatedAt: 30, title: 'Newer' })]);
        await cache.upsertConversations([summary('c1', 10, { updatedAt: 25, title: 'Stale' })]);

        expect((await cache.loadConversations())[0].title).toBe('Newer');
    });

    it('writes the snake_case record shape', async () => {
        await cache.saveConversations([summary('c1', 10, { lastMessage: 'hey', messageCount: 3 })]);

        const raw: unknown = JSON.parse(readFileSync(join(directory, 'conversations.json'), 'utf8'));
        expect(raw).toEqual([
            { id: 'c1', title: null, last_message: 'hey', created_at: 10, updated_at: null, message_count: 3 },
        ]);
    });

    describe('upsertConversation', () => {
        it('creates a summary with defaults for missing fields', async () => {
            await cache.upsertConversation({ id: 'c1', title: 'Hello' });
            expect(await cache.loadConversations()).toEqual([
                { id: 'c1', title: 'Hello', createdAt: 5_000, updatedAt: 5_000, messageCount: 0 },
            ]);
        });

        it('keeps prior values for unspecified fields and clamps the count', async () => {
            await cache.saveConversations([summary('c1', 100, { title: 'Kept', lastMessage: 'old', messageCount: 4 })]);
            await cache.upsertConversation({ id: 'c1', lastMessage: 'new', messageCount: -3 });

            expect(await cache.loadConversations()).toEqual([
                { id: 'c1', title: 'Kept', lastMessage: 'new', createdAt: 100, updatedAt: 100, messageCount: 0 },
            ]);
        });

        it('ignores a blank id', async () => {
            await cache.upsertConversation({ id: '   ' });
            expect(await cache.loadConversations()).toEqual([]);
        });

        it('does not lose concurrent updates', async () => {
            await Promise.all(Array.from({ length: 10 }, (_, i) => cache.upsertConversation({ id: `c${i}`, updatedAt: i })));
            expect((await cache.loadConversations()).map((c) => c.id)).toEqual(
                ['c9', 'c8', 'c7', 'c6', 'c5', 'c4', 'c3', 'c2', 'c1', 'c0'],
            );
        });
    });

    describe('messages', () => {
        it('keeps the 100 most recent of 150 messages in ascending order', async () => {
            await cache.upsertMessages('c1', Array.from({ length: 150 }, (_, i) => userMessage(i + 1)));

            const loaded = await cache.loadMessages('c1');
            expect(loaded).toHaveLength(100);
            expect(loaded[0].id).toBe('m051');
            expect(loaded[99].id).toBe('m150');
            for (let i = 1; i < loaded.length; i++) {
                expect(loaded[i].createdAt).toBeGreaterThan(loaded[i - 1].createdAt);
            }
        });

        it('round-trips an already normalized log unchanged', async () => {
            const messages: Message[] = [
                userMessage(1),
                { id: 'a1', role: 'assistant', content: 'reply', createdAt: 1_002 },
                { id: '', role: 'user', content: 'queued', createdAt: 1_003, deliveryState: 'sending' },
            ];
            await cache.replaceMessages('c1', messages);
            expect(await cache.loadMessages('c1')).toEqual(messages);
        });

        it('merges new messages into the existing log', async () => {
            await cache.replaceMessages('c1', [userMessage(1), userMessage(2)]);
            await cache.upsertMessages('c1', [{ ...userMessage(2), content: 'edited' }, userMessage(3)]);

            expect((await cache.loadMessages('c1')).map((m) => m.content)).toEqual(['message 1', 'edited', 'message 3']);
        });

        it('stores each conversation under a file-safe name', async () => {
            await cache.replaceMessages('team/chat:1', [userMessage(1)]);
            expect(existsSync(join(directory, 'messages_team_chat_1.json'))).toBe(true);
        });
    });

    it('removes the summary and its message log', async () => {
        await cache.saveConversations([summary('c1', 1), summary('c2', 2)]);
        await cache.replaceMessages('c1', [userMessage(1)]);

        await cache.removeConversation('c1');

        expect((await cache.loadConversations()).map((c) => c.id)).toEqual(['c2']);
        expect(existsSync(join(directory, 'messages_c1.json'))).toBe(false);
    });

    it('clears everything', async () => {
        await cache.saveConversations([summary('c1', 1)]);
        await cache.clear();
        expect(existsSync(directory)).toBe(false);
        expect(await cache.loadConversations()).toEqual([]);
    });

    it('logs and drops writes that cannot reach the disk', async () => {
        const blocker = join(mkdtempSync(join(tmpdir(), 'chatsync-cache-')), 'not-a-directory');
        writeFileSync(blocker, 'x', 'utf8');
        const blocked = new ConversationCache({ directory: blocker, now: () => 5_000 });

        await expect(blocked.upsertConversations([summary('c1', 10)])).resolves.toBeUndefined();
        await expect(blocked.upsertMessages('c1', [userMessage(1)])).resolves.toBeUndefined();

        expect(await blocked.loadConversations()).toEqual([]);
        expect(await blocked.loadMessages('c1')).toEqual([]);
        expect(readFileSync(blocker, 'utf8')).toBe('x');
    });

    it('rejects records that cannot be persisted', async () => {
        await expect(cache.saveConversations([summary('c1', 10, { messageCount: -1 })])).rejects.toBeInstanceOf(DecodeError);
        await expect(cache.upsertConversations([summary('c1', 10, { messageCount: 1.5 })])).rejects.toBeInstanceOf(DecodeError);
        expect(existsSync(join(directory, 'conversations.json'))).toBe(false);
    });
});
