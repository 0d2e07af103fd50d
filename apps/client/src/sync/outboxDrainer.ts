import type { ApiClient } from '@/api/apiClient';
import { AbortedError, NetworkError, isAuthFailure } from '@/errors';
import type { MessageOutbox, PendingMessage } from '@/outbox/messageOutbox';
import { logger } from '@/ui/logger';
import { AsyncLock } from '@/utils/lock';
import { delay, nowSeconds, type Clock } from '@/utils/time';
import type { Reconciler, SendFailureOutcome, StreamCompletion } from './reconciler';

/** The slice of ApiClient the drainer sends through. */
export type ChatTransport = Pick<ApiClient, 'createConversation' | 'chat' | 'streamChat'>;

export type StreamDeltaEvent = {
    pendingId: string;
    conversationId: string;
    /** Assistant text received so far. */
    text: string;
};

export type OutboxDrainerOptions = {
    outbox: MessageOutbox;
    api: ChatTransport;
    reconciler: Reconciler;
    maxRetries?: number;
    retryDelayMs?: number;
    /** Send through the streaming endpoint first. Defaults to true. */
    streaming?: boolean;
    onStreamDelta?: (event: StreamDeltaEvent) => void;
    now?: Clock;
};

export type DrainResult = {
    delivered: number;
    failed: number;
    halted: boolean;
};

type DeliveryOutcome = 'delivered' | 'cancelled' | SendFailureOutcome;

/**
 * Sends queued messages in order, one conversation at a time.
 *
 * Drains of the same conversation are serialized; different conversations
 * drain concurrently. An expired session halts every drain until resume().
 */
export class OutboxDrainer {
    private readonly outbox: MessageOutbox;
    private readonly api: ChatTransport;
    private readonly reconciler: Reconciler;
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;
    private readonly streaming: boolean;
    private readonly onStreamDelta?: (event: StreamDeltaEvent) => void;
    private readonly now: Clock;

    private readonly locks = new Map<string, AsyncLock>();
    private readonly inFlight = new Set<string>();
    private abortController = new AbortController();
    private halted = false;

    constructor(opts: OutboxDrainerOptions) {
        this.outbox = opts.outbox;
        this.api = opts.api;
        this.reconciler = opts.reconciler;
        this.maxRetries = opts.maxRetries ?? 3;
        this.retryDelayMs = opts.retryDelayMs ?? 800;
        this.streaming = opts.streaming ?? true;
        this.onStreamDelta = opts.onStreamDelta;
        this.now = opts.now ?? nowSeconds;
    }

    get isHalted(): boolean {
        return this.halted;
    }

    /** Stops all draining until resume(). Entries stay queued. */
    halt(): void {
        if (!this.halted) {
            logger.debug('[DRAIN] Halted');
        }
        this.halted = true;
    }

    resume(): void {
        this.halted = false;
    }

    /** Aborts in-flight streams and pending retry waits. The entries go back to pending. */
    cancel(): void {
        this.abortController.abort();
        this.abortController = new AbortController();
    }

    /**
     * Sends every pending entry of `conversationId`, plus unassigned ones.
     * Without a conversation only unassigned entries are sent, and the first
     * one creates the conversation the rest follow into.
     */
    async drain(conversationId?: string | null): Promise<DrainResult> {
        const key = (conversationId ?? '').trim();
        const result: DrainResult = { delivered: 0, failed: 0, halted: false };

        const created = await this.lockFor(key).inLock(() => this.drainLocked(key, result));
        if (created && !result.halted) {
            const rest = await this.drain(created);
            result.delivered += rest.delivered;
            result.failed += rest.failed;
            result.halted = rest.halted;
        }
        return result;
    }

    /** Manual retry of a failed entry with a fresh retry budget. */
    async retry(pendingId: string): Promise<DrainResult> {
        const entry = await this.outbox.get(pendingId);
        if (!entry) {
            return { delivered: 0, failed: 0, halted: this.halted };
        }
        await this.outbox.resetForManualRetry(pendingId);
        return await this.drain(entry.conversationId);
    }

    private lockFor(key: string): AsyncLock {
        let lock = this.locks.get(key);
        if (!lock) {
            lock = new AsyncLock();
            this.locks.set(key, lock);
        }
        return lock;
    }

    /** Returns the id of a conversation created along the way, if any. */
    private async drainLocked(key: string, result: DrainResult): Promise<string | null> {
        let conversationId = key;
        let created: string | null = null;

        while (!this.halted) {
            const next = await this.outbox.nextPending(conversationId);
            if (!next || this.inFlight.has(next.id)) {
                // Another drain owns the head of this queue.
                break;
            }

            const target = next.conversationId || conversationId;
            this.inFlight.add(next.id);
            const { outcome, assigned } = await this.deliver(next, target).finally(() => {
                this.inFlight.delete(next.id);
            });

            if (!conversationId && assigned) {
                conversationId = assigned;
                created = assigned;
            }

            if (outcome === 'delivered') {
                result.delivered += 1;
            } else if (outcome === 'failed') {
                result.failed += 1;
            } else if (outcome === 'halt') {
                this.halt();
            } else if (outcome === 'cancelled') {
                break;
            } else {
                const signal = this.abortController.signal;
                await delay(this.retryDelayMs, signal);
                if (signal.aborted) break;
            }

            if (created) {
                // The remaining entries now belong to the new conversation and drain under its lock.
                break;
            }
        }

        result.halted = this.halted;
        return created;
    }

    private async deliver(entry: PendingMessage, target: string): Promise<{ outcome: DeliveryOutcome; assigned: string }> {
        let conversationId = target;
        const signal = this.abortController.signal;
        try {
            if (!conversationId) {
                const conversation = await this.api.createConversation();
                await this.reconciler.applyCreatedConversation(entry.id, conversation);
                conversationId = conversation.id;
            } else if (!entry.conversationId) {
                await this.outbox.updateConversationId(entry.id, conversationId);
            }

            await this.outbox.markSending(entry.id);
            const sending: PendingMessage = { ...entry, conversationId, status: 'sending' };

            const completion = this.streaming ? await this.sendStreaming(sending, signal) : null;
            if (completion) {
                await this.reconciler.applyStreamCompletion(sending, completion);
            } else {
                const reply = await this.api.chat(conversationId, entry.message);
                await this.reconciler.applyChatReply(sending, reply);
            }
            return { outcome: 'delivered', assigned: conversationId };
        } catch (error) {
            if (error instanceof AbortedError) {
                await this.outbox.markPending(entry.id);
                logger.debug(`[DRAIN] Send of ${entry.id} cancelled`);
                return { outcome: 'cancelled', assigned: conversationId };
            }
            logger.debug(`[DRAIN] Send of ${entry.id} failed`, error);
            const outcome = await this.reconciler.applySendFailure(entry.id, error, this.maxRetries);
            return { outcome, assigned: conversationId };
        }
    }

    /**
     * Returns null when the stream produced no event at all, so the caller can
     * fall back to the plain chat endpoint. That includes a streaming endpoint
     * that fails before its first event. A terminal event always completes the
     * send, even with empty content. Partial output without a terminal event is
     * discarded and counts as a failed send.
     */
    private async sendStreaming(entry: PendingMessage, signal: AbortSignal): Promise<StreamCompletion | null> {
        let text = '';
        let received = false;

        try {
            for await (const chunk of this.api.streamChat(entry.conversationId, entry.message, { signal })) {
                received = true;
                if (chunk.delta) {
                    text += chunk.delta;
                    this.onStreamDelta?.({ pendingId: entry.id, conversationId: entry.conversationId, text });
                }
                if (chunk.done) {
                    return { messageId: chunk.messageId ?? '', content: chunk.content ?? text, createdAt: this.now() };
                }
            }
        } catch (error) {
            if (received || error instanceof AbortedError || isAuthFailure(error)) {
                throw error;
            }
            logger.debug(`[DRAIN] Streaming unavailable for ${entry.id}, using plain chat`, error);
            return null;
        }

        if (!received) {
            return null;
        }
        throw new NetworkError('Stream ended before the reply was complete');
    }
}
