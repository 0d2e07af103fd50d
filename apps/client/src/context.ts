import { join } from 'node:path';
import { ApiClient } from '@/api/apiClient';
import { ConversationCache } from '@/cache/conversationCache';
import type { ConversationSummary, Message } from '@/cache/types';
import type { Configuration } from '@/configuration';
import { MessageOutbox, type PendingMessage } from '@/outbox/messageOutbox';
import { SessionManager } from '@/session/sessionManager';
import { FileTokenStore, type TokenStore } from '@/session/tokenStore';
import { OutboxDrainer, type DrainResult, type StreamDeltaEvent } from '@/sync/outboxDrainer';
import { Reconciler } from '@/sync/reconciler';
import { logger } from '@/ui/logger';

export type SyncContextOptions = {
    /** Defaults to the credentials file from the configuration. */
    tokenStore?: TokenStore;
    onStreamDelta?: (event: StreamDeltaEvent) => void;
};

export type SendResult = {
    pending: PendingMessage;
    drain: DrainResult;
};

/**
 * One wired-up sync core. Components are exposed for direct reads
 * (the UI renders straight from `cache` and `outbox`).
 */
export class SyncContext {
    constructor(
        readonly configuration: Configuration,
        readonly session: SessionManager,
        readonly api: ApiClient,
        readonly cache: ConversationCache,
        readonly outbox: MessageOutbox,
        readonly reconciler: Reconciler,
        readonly drainer: OutboxDrainer,
    ) {}

    async send(text: string, conversationId?: string | null): Promise<SendResult> {
        const pending = await this.outbox.enqueue(text, conversationId);
        const drain = await this.drainer.drain(pending.conversationId);
        return { pending, drain };
    }

    async refreshConversations(opts: { limit?: number; offset?: number } = {}): Promise<ConversationSummary[]> {
        const list = await this.api.listConversations(opts);
        await this.reconciler.applyConversationList(list);
        return await this.cache.loadConversations();
    }

    async openConversation(conversationId: string): Promise<Message[]> {
        const detail = await this.api.getConversation(conversationId);
        await this.reconciler.applyConversationDetail(detail);
        return await this.cache.loadMessages(detail.id);
    }

    async deleteConversation(conversationId: string): Promise<boolean> {
        const deleted = await this.api.deleteConversation(conversationId);
        if (deleted) {
            await this.reconciler.applyDeletedConversation(conversationId);
        }
        return deleted;
    }

    async signIn(token: string, expiresAt?: number | null): Promise<void> {
        await this.session.saveUserToken(token, expiresAt);
        this.drainer.resume();
    }

    async signOut(): Promise<void> {
        this.drainer.cancel();
        this.drainer.halt();
        await this.session.signOut();
        await this.outbox.clear();
        await this.cache.clear();
    }
}

export async function createSyncContext(configuration: Configuration, opts: SyncContextOptions = {}): Promise<SyncContext> {
    logger.configure({ level: configuration.logLevel, logFile: join(configuration.logsDir, 'client.log') });

    const session: SessionManager = new SessionManager({
        store: opts.tokenStore ?? new FileTokenStore(configuration.credentialsFile),
        // The client is built below; refresh only runs once a request is made.
        refresh: (token) => client.refreshToken(token),
        managedToken: configuration.managedDeviceToken,
        tokenTtlSeconds: configuration.tokenTtlSeconds,
        refreshWindowSeconds: configuration.refreshWindowSeconds,
    });

    const client: ApiClient = new ApiClient({
        serverUrl: configuration.serverUrl,
        session,
        requestTimeoutMs: configuration.requestTimeoutMs,
        healthTimeoutMs: configuration.healthTimeoutMs,
        streamTimeoutMs: configuration.streamTimeoutMs,
    });

    const cache = new ConversationCache({
        directory: configuration.cacheDir,
        maxConversations: configuration.maxConversations,
        maxMessagesPerConversation: configuration.maxMessagesPerConversation,
    });
    const outbox = await MessageOutbox.open({ file: configuration.outboxFile });
    const reconciler = new Reconciler({ cache, outbox });
    const drainer = new OutboxDrainer({
        outbox,
        api: client,
        reconciler,
        maxRetries: configuration.maxQueueRetries,
        retryDelayMs: configuration.retryDelayMs,
        onStreamDelta: opts.onStreamDelta,
    });

    session.onSessionExpired((event) => {
        logger.debug(`[SYNC] Session expired (${event.reason}), halting outbox`);
        drainer.halt();
    });

    logger.debug(`[SYNC] Context ready for ${configuration.serverUrl}`);
    return new SyncContext(configuration, session, client, cache, outbox, reconciler, drainer);
}
