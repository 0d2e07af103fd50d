/**
 * Client configuration.
 * Values come from the environment with defaults under ~/.chatsync; tests build
 * their own with createConfiguration(overrides).
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Configuration = Readonly<{
    serverUrl: string;
    homeDir: string;
    cacheDir: string;
    logsDir: string;
    outboxFile: string;
    credentialsFile: string;
    /** Enterprise-managed token; wins over anything in the credentials file. */
    managedDeviceToken: string | null;
    logLevel: LogLevel;

    maxConversations: number;
    maxMessagesPerConversation: number;

    tokenTtlSeconds: number;
    refreshWindowSeconds: number;

    requestTimeoutMs: number;
    healthTimeoutMs: number;
    streamTimeoutMs: number;

    maxQueueRetries: number;
    retryDelayMs: number;
}>;

export const DEFAULT_SERVER_URL = 'http://localhost:8080';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(raw: string | undefined): LogLevel {
    const value = (raw ?? '').trim().toLowerCase();
    return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

function nonEmpty(raw: string | undefined): string | null {
    const value = (raw ?? '').trim();
    return value ? value : null;
}

export function createConfiguration(overrides: Partial<Configuration> = {}): Configuration {
    const homeDir = overrides.homeDir ?? nonEmpty(process.env.CHATSYNC_HOME_DIR) ?? join(homedir(), '.chatsync');
    const serverUrl = (overrides.serverUrl ?? nonEmpty(process.env.CHATSYNC_SERVER_URL) ?? DEFAULT_SERVER_URL).replace(/\/+$/, '');

    return Object.freeze({
        serverUrl,
        homeDir,
        cacheDir: join(homeDir, 'conversation_cache'),
        logsDir: join(homeDir, 'logs'),
        outboxFile: join(homeDir, 'outbox.json'),
        credentialsFile: join(homeDir, 'credentials.json'),
        managedDeviceToken: nonEmpty(process.env.CHATSYNC_DEVICE_TOKEN),
        logLevel: parseLogLevel(process.env.CHATSYNC_LOG_LEVEL),

        maxConversations: 50,
        maxMessagesPerConversation: 100,

        tokenTtlSeconds: 30 * 86_400,
        refreshWindowSeconds: 7 * 86_400,

        requestTimeoutMs: 30_000,
        healthTimeoutMs: 5_000,
        streamTimeoutMs: 300_000,

        maxQueueRetries: 3,
        retryDelayMs: 800,
        ...overrides,
    });
}

export const configuration: Configuration = createConfiguration();
