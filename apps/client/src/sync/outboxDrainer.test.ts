import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ApiConversation, ChatMessageResponse } from '@chatsync/protocol';
import { beforeEach, describe, expect, it } from 'vitest';
import type { StreamChunk } from '@/api/sse';
import { ConversationCache } from '@/cache/conversationCache';
import { AbortedError, ApiError, AuthExpiredError } from '@/errors';
import { MessageOutbox } from '@/outbox/messageOutbox';
import { OutboxDrainer, type ChatTransport, type OutboxDrainerOptions } from './outboxDrainer';
import { Reconciler } from './reconciler';

type Scripted<T> = (conversationId: string, message: string) => T | Error;

class FakeTransport implements ChatTransport {
    created: string[] = [];
    chats: string[] = [];
    streams: string[] = [];
    chatScript: Scripted<ChatMessageResponse> = (conversationId, message) => ({
        message_id: `r-${message}`,
        role: 'assistant',
        content: `echo ${message}`,
        conversation_id: conversationId,
        created_at: 150,
    });
    streamScript: Scripted<StreamChunk[]> = () => [];

    async createConversation(): Promise<ApiConversation> {
        const id = `c${this.created.length + 1}`;
        this.created.push(id);
        return { id, title: null, created_at: 90 };
    }

    async chat(conversationId: string, message: string): Promise<ChatMessageResponse> {
        this.chats.push(message);
        const reply = this.chatScript(conversationId, message);
        if (reply instanceof Error) throw reply;
        return reply;
    }

    async *streamChat(
        conversationId: string,
        message: string,
        opts: { signal?: AbortSignal } = {},
    ): AsyncGenerator<StreamChunk, void, undefined> {
        this.streams.push(message);
        const chunks = this.streamScript(conversationId, message);
        if (chunks instanceof Error) throw chunks;
        for (const chunk of chunks) {
            if (opts.signal?.aborted) throw new AbortedError('Stream cancelled');
            yield chunk;
        }
        if (opts.signal?.aborted) throw new AbortedError('Stream cancelled');
    }
}

describe('OutboxDrainer', () => {
    let cache: ConversationCache;
    let outbox: MessageOutbox;
    let api: FakeTransport;

    beforeEach(async () => {
        const dir = mkdtempSync(join(tmpdir(), 'chatsync-drain-'));
        let nextId = 0;
        cache = new ConversationCache({ directory: join(dir, 'cache'), now: () => 300 });
        outbox = await MessageOutbox.open({ file: join(dir, 'outbox.json'), now: () => 100, generateId: () => `p${++nextId}` });
        api = new FakeTransport();
    });

    function createDrainer(overrides: Partial<OutboxDrainerOptions> = {}): OutboxDrainer {
        return new OutboxDrainer({
            outbox,
            api,
            reconciler: new Reconciler({ cache, outbox }),
            retryDelayMs: 0,
            now: () => 200,
            ...overrides,
        });
    }

    it('streams a reply and commits it on the terminal event', async () => {
        api.streamScript = () => [
            { delta: 'Hel', done: false },
            { delta: 'lo', done: false },
            { delta: '', done: true, messageId: 'm1' },
        ];
        const progress: string[] = [];
        const drainer = createDrainer({ onStreamDelta: (event) => progress.push(event.text) });
        await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 1, failed: 0, halted: false });

        expect(progress).toEqual(['Hel', 'Hello']);
        expect(api.chats).toEqual([]);
        expect(await cache.loadMessages('c1')).toEqual([
            { id: '', role: 'user', content: 'hi', createdAt: 100, deliveryState: 'sent' },
            { id: 'm1', role: 'assistant', content: 'Hello', createdAt: 200 },
        ]);
        expect(await outbox.list()).toEqual([]);
    });

    it('falls back to the plain endpoint when the stream yields nothing', async () => {
        const drainer = createDrainer();
        await outbox.enqueue('hi', 'c1');

        await drainer.drain('c1');

        expect(api.streams).toEqual(['hi']);
        expect(api.chats).toEqual(['hi']);
        expect((await cache.loadMessages('c1')).map((message) => message.content)).toEqual(['hi', 'echo hi']);
    });

    it('commits an empty reply from a terminal event without calling the plain endpoint', async () => {
        api.streamScript = () => [{ delta: '', done: true, messageId: 'm1' }];
        const drainer = createDrainer();
        await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 1, failed: 0, halted: false });

        expect(api.streams).toEqual(['hi']);
        expect(api.chats).toEqual([]);
        expect(await cache.loadMessages('c1')).toEqual([
            { id: '', role: 'user', content: 'hi', createdAt: 100, deliveryState: 'sent' },
            { id: 'm1', role: 'assistant', content: '', createdAt: 200 },
        ]);
        expect(await outbox.list()).toEqual([]);
    });

    it('falls back to the plain endpoint when streaming fails before its first event', async () => {
        api.streamScript = () => new ApiError(404, 'not found');
        const drainer = createDrainer();
        await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 1, failed: 0, halted: false });

        expect(api.streams).toEqual(['hi']);
        expect(api.chats).toEqual(['hi']);
        expect((await cache.loadMessages('c1')).map((message) => message.content)).toEqual(['hi', 'echo hi']);
        expect(await outbox.list()).toEqual([]);
    });

    it('halts without the plain endpoint when streaming is rejected as unauthorized', async () => {
        api.streamScript = () => new AuthExpiredError('unauthorized');
        const drainer = createDrainer();
        const { id } = await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 0, failed: 0, halted: true });

        expect(api.chats).toEqual([]);
        expect(await outbox.get(id)).toMatchObject({ status: 'pending', retryCount: 0 });
    });

    it('creates one conversation for every unassigned send', async () => {
        const drainer = createDrainer({ streaming: false });
        await outbox.enqueue('a', null);
        await outbox.enqueue('b', null);

        expect(await drainer.drain()).toEqual({ delivered: 2, failed: 0, halted: false });

        expect(api.created).toEqual(['c1']);
        expect(api.chats).toEqual(['a', 'b']);
        expect((await cache.loadMessages('c1')).map((message) => message.content)).toEqual(['a', 'b', 'echo a', 'echo b']);
        expect(await cache.loadConversations()).toMatchObject([{ id: 'c1', messageCount: 4 }]);
    });

    it('sends unassigned entries into the conversation being drained', async () => {
        const drainer = createDrainer({ streaming: false });
        await outbox.enqueue('early', null);

        await drainer.drain('c7');

        expect(api.created).toEqual([]);
        expect((await cache.loadMessages('c7')).map((message) => message.content)).toEqual(['early', 'echo early']);
    });

    it('retries a transient failure, then fails it and moves on', async () => {
        api.chatScript = (conversationId, message) =>
            message === 'bad'
                ? new ApiError(503, 'unavailable')
                : { message_id: 'r1', role: 'assistant', content: 'ok', conversation_id: conversationId, created_at: 150 };
        const drainer = createDrainer({ streaming: false });
        const bad = await outbox.enqueue('bad', 'c1');
        await outbox.enqueue('good', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 1, failed: 1, halted: false });

        expect(api.chats).toEqual(['bad', 'bad', 'bad', 'good']);
        expect(await outbox.list('c1')).toEqual([
            { id: bad.id, message: 'bad', conversationId: 'c1', createdAt: 100, status: 'failed', retryCount: 3 },
        ]);
    });

    it('sends a failed entry again on manual retry', async () => {
        api.chatScript = () => new ApiError(500, 'boom');
        const drainer = createDrainer({ streaming: false, maxRetries: 1 });
        const { id } = await outbox.enqueue('hi', 'c1');
        await drainer.drain('c1');
        expect((await outbox.get(id))?.status).toBe('failed');

        api.chatScript = (conversationId) => ({ message_id: 'r1', role: 'assistant', content: 'ok', conversation_id: conversationId, created_at: 150 });

        expect(await drainer.retry(id)).toEqual({ delivered: 1, failed: 0, halted: false });
        expect(await outbox.get(id)).toBeNull();
    });

    it('halts on an expired session and resumes after sign-in', async () => {
        api.chatScript = () => new AuthExpiredError('unauthorized');
        const drainer = createDrainer({ streaming: false });
        const { id } = await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 0, failed: 0, halted: true });
        expect(await outbox.get(id)).toMatchObject({ status: 'pending', retryCount: 0 });

        expect(await drainer.drain('c1')).toEqual({ delivered: 0, failed: 0, halted: true });
        expect(api.chats).toEqual(['hi']);

        api.chatScript = (conversationId) => ({ message_id: 'r1', role: 'assistant', content: 'ok', conversation_id: conversationId, created_at: 150 });
        drainer.resume();
        expect(await drainer.drain('c1')).toEqual({ delivered: 1, failed: 0, halted: false });
    });

    it('discards a stream that ends without a terminal event', async () => {
        api.streamScript = () => [{ delta: 'Hel', done: false }];
        const drainer = createDrainer({ maxRetries: 1 });
        const { id } = await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 0, failed: 1, halted: false });

        expect(api.chats).toEqual([]);
        expect(await cache.loadMessages('c1')).toEqual([]);
        expect(await outbox.get(id)).toMatchObject({ status: 'failed', retryCount: 1 });
    });

    it('puts a cancelled send back without spending a retry', async () => {
        api.streamScript = () => [
            { delta: 'a', done: false },
            { delta: 'b', done: true },
        ];
        const drainer: OutboxDrainer = createDrainer({ onStreamDelta: () => drainer.cancel() });
        const { id } = await outbox.enqueue('hi', 'c1');

        expect(await drainer.drain('c1')).toEqual({ delivered: 0, failed: 0, halted: false });
        expect(await outbox.get(id)).toMatchObject({ status: 'pending', retryCount: 0 });
    });

    it('sends each entry once when drains of one conversation overlap', async () => {
        const drainer = createDrainer({ streaming: false });
        await outbox.enqueue('one', 'c1');
        await outbox.enqueue('two', 'c1');

        const results = await Promise.all([drainer.drain('c1'), drainer.drain('c1')]);

        expect(api.chats).toEqual(['one', 'two']);
        expect(results.map((result) => result.delivered)).toEqual([2, 0]);
    });
});
