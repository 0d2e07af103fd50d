import { PersistedCredentialsSchema } from '@chatsync/protocol';
import { readJsonFile, removeFile, writeJsonFileAtomic } from '@/persistence/atomicFile';
import { logger } from '@/ui/logger';

export type StoredCredentials = {
    token: string | null;
    /** Epoch seconds. */
    expiresAt: number | null;
};

/**
 * Secure local store for the device token and its expiry.
 */
export interface TokenStore {
    read(): Promise<StoredCredentials>;
    write(credentials: StoredCredentials): Promise<void>;
    clear(): Promise<void>;
}

const EMPTY: StoredCredentials = { token: null, expiresAt: null };

/**
 * Keeps credentials in a JSON file only the current user can read.
 */
export class FileTokenStore implements TokenStore {
    constructor(private readonly file: string) {}

    async read(): Promise<StoredCredentials> {
        try {
            const raw = await readJsonFile(this.file);
            if (raw === null) {
                return { ...EMPTY };
            }
            const parsed = PersistedCredentialsSchema.safeParse(raw);
            if (!parsed.success) {
                logger.warn('[SESSION] Ignoring malformed credentials file');
                return { ...EMPTY };
            }
            const token = parsed.data.token?.trim();
            return {
                token: token ? token : null,
                expiresAt: parsed.data.expires_at ?? null,
            };
        } catch (error) {
            logger.warn('[SESSION] Failed to read credentials', error);
            return { ...EMPTY };
        }
    }

    async write(credentials: StoredCredentials): Promise<void> {
        await writeJsonFileAtomic(
            this.file,
            { token: credentials.token, expires_at: credentials.expiresAt },
            { mode: 0o600 },
        );
    }

    async clear(): Promise<void> {
        await removeFile(this.file);
    }
}

export class MemoryTokenStore implements TokenStore {
    private credentials: StoredCredentials;

    constructor(initial: Partial<StoredCredentials> = {}) {
        this.credentials = { ...EMPTY, ...initial };
    }

    async read(): Promise<StoredCredentials> {
        return { ...this.credentials };
    }

    async write(credentials: StoredCredentials): Promise<void> {
        this.credentials = { ...credentials };
    }

    async clear(): Promise<void> {
        this.credentials = { ...EMPTY };
    }
}
