import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { z } from 'zod';
import {
    ApiConversationSchema,
    ApiErrorBodySchema,
    ChatMessageResponseSchema,
    ConversationDetailSchema,
    ConversationListResponseSchema,
    DeleteConversationResponseSchema,
    RefreshTokenResponseSchema,
    type ApiConversation,
    type ApiConversationSummary,
    type ChatRequestBody,
    type ChatMessageResponse,
    type ConversationDetail,
} from '@chatsync/protocol';
import { AbortedError, ApiError, AuthExpiredError, DecodeError, NetworkError, ValidationError } from '@/errors';
import type { RefreshedToken, SessionManager } from '@/session/sessionManager';
import { logger } from '@/ui/logger';
import { readSseChunks, type StreamChunk } from './sse';

export type ApiClientOptions = {
    serverUrl: string;
    session: SessionManager;
    requestTimeoutMs?: number;
    healthTimeoutMs?: number;
    streamTimeoutMs?: number;
};

type RequestOptions = {
    method: 'GET' | 'POST' | 'DELETE';
    path: string;
    data?: unknown;
    params?: Record<string, string | number>;
    timeout?: number;
    signal?: AbortSignal;
};

function describeBody(data: unknown, status: number): string {
    const parsed = ApiErrorBodySchema.safeParse(data);
    if (parsed.success) {
        const message = parsed.data.detail ?? parsed.data.error ?? parsed.data.message;
        if (message) return message;
    }
    if (typeof data === 'string' && data.trim()) {
        return data.trim();
    }
    return `Request failed with status ${status}`;
}

function requireText(value: string, what: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
        throw new ValidationError(`${what} is empty`);
    }
    return trimmed;
}

async function readStreamBody(stream: Readable): Promise<string> {
    const parts: Buffer[] = [];
    for await (const part of stream) {
        parts.push(Buffer.isBuffer(part) ? part : Buffer.from(String(part)));
    }
    return Buffer.concat(parts).toString('utf8');
}

function parseErrorBody(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return raw;
    }
}

function isReadable(value: unknown): value is Readable {
    return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

/**
 * REST and SSE client for the gateway.
 * Every call except the token refresh goes through SessionManager.validToken().
 */
export class ApiClient {
    private readonly serverUrl: string;
    private readonly session: SessionManager;
    private readonly requestTimeoutMs: number;
    private readonly healthTimeoutMs: number;
    private readonly streamTimeoutMs: number;

    constructor(opts: ApiClientOptions) {
        this.serverUrl = opts.serverUrl.replace(/\/+$/, '');
        this.session = opts.session;
        this.requestTimeoutMs = opts.requestTimeoutMs ?? 30_000;
        this.healthTimeoutMs = opts.healthTimeoutMs ?? 5_000;
        this.streamTimeoutMs = opts.streamTimeoutMs ?? 300_000;
    }

    async createConversation(opts: { systemPrompt?: string } = {}): Promise<ApiConversation> {
        const systemPrompt = opts.systemPrompt?.trim();
        return await this.authorized(ApiConversationSchema, {
            method: 'POST',
            path: '/v1/conversations',
            data: systemPrompt ? { system_prompt: systemPrompt } : {},
        });
    }

    async listConversations(opts: { limit?: number; offset?: number } = {}): Promise<ApiConversationSummary[]> {
        const limit = Math.max(1, Math.floor(opts.limit ?? 20));
        const offset = Math.max(0, Math.floor(opts.offset ?? 0));
        const response = await this.authorized(ConversationListResponseSchema, {
            method: 'GET',
            path: '/v1/conversations',
            params: { limit, offset },
        });
        return response.conversations;
    }

    async getConversation(conversationId: string): Promise<ConversationDetail> {
        const id = requireText(conversationId, 'Conversation id');
        return await this.authorized(ConversationDetailSchema, {
            method: 'GET',
            path: `/v1/conversations/${encodeURIComponent(id)}`,
        });
    }

    async chat(conversationId: string, message: string): Promise<ChatMessageResponse> {
        const id = requireText(conversationId, 'Conversation id');
        const payload: ChatRequestBody = { message: requireText(message, 'Message text') };
        return await this.authorized(ChatMessageResponseSchema, {
            method: 'POST',
            path: `/v1/conversations/${encodeURIComponent(id)}/chat`,
            data: payload,
        });
    }

    async deleteConversation(conversationId: string): Promise<boolean> {
        const id = requireText(conversationId, 'Conversation id');
        const response = await this.authorized(DeleteConversationResponseSchema, {
            method: 'DELETE',
            path: `/v1/conversations/${encodeURIComponent(id)}`,
        });
        return response.deleted;
    }

    /**
     * Exchanges the current token for a new one. Not routed through the session
     * gate: a 401 here surfaces as ApiError and the session decides what to do.
     */
    async refreshToken(currentToken: string): Promise<RefreshedToken> {
        const response = await this.perform({
            method: 'POST',
            path: '/v1/auth/refresh',
            data: {},
        }, currentToken);
        const body = this.checkResponse(RefreshTokenResponseSchema, response);
        return { token: body.token, expiresAt: body.expires_at ?? null };
    }

    /** Liveness probe with the short timeout. Never throws. */
    async checkHealth(): Promise<boolean> {
        try {
            const response = await this.perform({ method: 'GET', path: '/health', timeout: this.healthTimeoutMs }, null);
            return response.status >= 200 && response.status < 300;
        } catch (error) {
            logger.debug('[API] Health check failed', error);
            return false;
        }
    }

    /**
     * Streams an assistant reply. The iterator ends after the terminal chunk
     * (`done: true`); if it ends without one the reply was interrupted.
     * Aborting `signal` stops consumption and rejects with AbortedError.
     */
    async *streamChat(
        conversationId: string,
        message: string,
        opts: { signal?: AbortSignal } = {},
    ): AsyncGenerator<StreamChunk, void, undefined> {
        const id = requireText(conversationId, 'Conversation id');
        const payload: ChatRequestBody = { message: requireText(message, 'Message text') };
        const token = await this.session.validToken();

        const response = await this.perform({
            method: 'POST',
            path: `/v1/conversations/${encodeURIComponent(id)}/chat/stream`,
            data: payload,
            timeout: this.streamTimeoutMs,
            signal: opts.signal,
        }, token, { stream: true });

        const body: unknown = response.data;
        if (!isReadable(body)) {
            throw new DecodeError('Streaming response has no body');
        }

        if (response.status < 200 || response.status >= 300) {
            await this.throwForStatus(response.status, parseErrorBody(await readStreamBody(body)));
        }

        const lines = createInterface({ input: body, crlfDelay: Infinity });
        try {
            for await (const chunk of readSseChunks(lines)) {
                if (opts.signal?.aborted) break;
                yield chunk;
            }
        } catch (error) {
            if (opts.signal?.aborted) {
                throw new AbortedError('Stream cancelled', { cause: error });
            }
            if (error instanceof DecodeError) {
                throw error;
            }
            throw new NetworkError('Stream interrupted', { cause: error });
        } finally {
            lines.close();
            body.destroy();
        }

        if (opts.signal?.aborted) {
            throw new AbortedError('Stream cancelled');
        }
    }

    //
    // Internals
    //

    private async authorized<S extends z.ZodTypeAny>(schema: S, request: RequestOptions): Promise<z.output<S>> {
        const token = await this.session.validToken();
        const response = await this.perform(request, token);
        if (response.status === 401) {
            await this.throwForStatus(401, response.data);
        }
        return this.checkResponse(schema, response);
    }

    private checkResponse<S extends z.ZodTypeAny>(schema: S, response: AxiosResponse<unknown>): z.output<S> {
        if (response.status < 200 || response.status >= 300) {
            throw new ApiError(response.status, describeBody(response.data, response.status));
        }
        const parsed = schema.safeParse(response.data);
        if (!parsed.success) {
            throw new DecodeError(`Unexpected response shape: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    /** 401 on an authenticated call ends the session; everything else is an ApiError. */
    private async throwForStatus(status: number, data: unknown): Promise<never> {
        if (status === 401) {
            await this.session.handleUnauthorized();
            throw new AuthExpiredError('unauthorized');
        }
        throw new ApiError(status, describeBody(data, status));
    }

    private async perform(
        request: RequestOptions,
        token: string | null,
        opts: { stream?: boolean } = {},
    ): Promise<AxiosResponse<unknown>> {
        const config: AxiosRequestConfig = {
            method: request.method,
            url: `${this.serverUrl}${request.path}`,
            headers: {
                Accept: opts.stream ? 'text/event-stream' : 'application/json',
                'Content-Type': 'application/json',
                ...(token ? { Authorization: `Bearer ${token}` } : {}),
            },
            params: request.params,
            data: request.data,
            timeout: request.timeout ?? this.requestTimeoutMs,
            signal: request.signal,
            responseType: opts.stream ? 'stream' : 'json',
            validateStatus: () => true,
        };

        try {
            return await axios.request<unknown>(config);
        } catch (error) {
            if (request.signal?.aborted || axios.isCancel(error)) {
                throw new AbortedError(`${request.method} ${request.path} cancelled`, { cause: error });
            }
            const timedOut = axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
            logger.debug(`[API] ${request.method} ${request.path} failed${timedOut ? ' (timeout)' : ''}`);
            throw new NetworkError(
                timedOut ? `${request.method} ${request.path} timed out` : `${request.method} ${request.path} failed`,
                { cause: error, timedOut },
            );
        }
    }
}
