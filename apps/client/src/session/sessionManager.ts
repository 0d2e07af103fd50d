import { AuthExpiredError, ValidationError, isAuthFailure, type AuthExpiredReason } from '@/errors';
import { logger } from '@/ui/logger';
import { AsyncLock } from '@/utils/lock';
import { nowSeconds, type Clock } from '@/utils/time';
import type { TokenStore } from './tokenStore';

export type RefreshedToken = {
    token: string;
    /** Epoch seconds; null when the server did not say. */
    expiresAt: number | null;
};

export type RefreshTokenFn = (currentToken: string) => Promise<RefreshedToken>;

export type SessionExpiredEvent = {
    reason: AuthExpiredReason;
    at: number;
};

export type SessionExpiredListener = (event: SessionExpiredEvent) => void;

export type Session = {
    deviceToken: string | null;
    tokenExpiresAt: number | null;
    managed: boolean;
};

export type SessionManagerOptions = {
    store: TokenStore;
    refresh: RefreshTokenFn;
    /** Enterprise-injected token; takes precedence over the store. */
    managedToken?: string | null;
    tokenTtlSeconds?: number;
    refreshWindowSeconds?: number;
    now?: Clock;
};

/**
 * Resolves, refreshes and invalidates the device's bearer token.
 *
 * validToken() is the gate for every authenticated call. Inside the refresh
 * window it refreshes opportunistically; only an authorization failure of the
 * refresh itself ends the session, any other refresh failure keeps the
 * still-valid token. A 401 from any other request ends the session at once.
 */
export class SessionManager {
    readonly tokenTtlSeconds: number;
    readonly refreshWindowSeconds: number;

    private readonly store: TokenStore;
    private readonly refresh: RefreshTokenFn;
    private readonly managedToken: string | null;
    private readonly now: Clock;
    private readonly lock = new AsyncLock();
    private readonly listeners = new Set<SessionExpiredListener>();

    constructor(opts: SessionManagerOptions) {
        this.store = opts.store;
        this.refresh = opts.refresh;
        this.managedToken = opts.managedToken?.trim() || null;
        this.tokenTtlSeconds = opts.tokenTtlSeconds ?? 30 * 86_400;
        this.refreshWindowSeconds = opts.refreshWindowSeconds ?? 7 * 86_400;
        this.now = opts.now ?? nowSeconds;
    }

    /** Current token without side effects: managed override, then the store. */
    async currentToken(): Promise<string | null> {
        if (this.managedToken) {
            return this.managedToken;
        }
        return (await this.store.read()).token;
    }

    async session(): Promise<Session> {
        if (this.managedToken) {
            return { deviceToken: this.managedToken, tokenExpiresAt: null, managed: true };
        }
        const stored = await this.store.read();
        return { deviceToken: stored.token, tokenExpiresAt: stored.expiresAt, managed: false };
    }

    /** Stores a token obtained from sign-in. */
    saveUserToken(token: string, expiresAt?: number | null): Promise<void> {
        const trimmed = token.trim();
        if (!trimmed) {
            return Promise.reject(new ValidationError('Token is empty'));
        }
        return this.lock.inLock(async () => {
            await this.store.write({ token: trimmed, expiresAt: expiresAt ?? this.now() + this.tokenTtlSeconds });
            logger.info('[SESSION] Signed in');
        });
    }

    validToken(): Promise<string> {
        if (this.managedToken) {
            // Managed credentials are rotated by whoever injects them.
            return Promise.resolve(this.managedToken);
        }

        return this.lock.inLock(async () => {
            const stored = await this.store.read();
            if (!stored.token) {
                throw new AuthExpiredError('missing', 'Not signed in');
            }

            const now = this.now();
            let expiresAt = stored.expiresAt;
            if (expiresAt === null) {
                expiresAt = now + this.tokenTtlSeconds;
                await this.store.write({ token: stored.token, expiresAt });
            }

            if (now >= expiresAt) {
                await this.expireLocked('expired');
                throw new AuthExpiredError('expired');
            }

            if (expiresAt - now > this.refreshWindowSeconds) {
                return stored.token;
            }

            return await this.refreshLocked(stored.token, now);
        });
    }

    /** User-initiated sign-out. Clears the store without a session-expired event. */
    signOut(): Promise<void> {
        return this.lock.inLock(async () => {
            await this.store.clear();
            logger.info('[SESSION] Signed out');
        });
    }

    /** Any authenticated request that got a 401. The server is the source of truth. */
    handleUnauthorized(): Promise<void> {
        return this.hardExpire('unauthorized');
    }

    hardExpire(reason: AuthExpiredReason): Promise<void> {
        return this.lock.inLock(() => this.expireLocked(reason));
    }

    onSessionExpired(listener: SessionExpiredListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private async refreshLocked(token: string, now: number): Promise<string> {
        let refreshed: RefreshedToken;
        try {
            refreshed = await this.refresh(token);
        } catch (error) {
            if (isAuthFailure(error)) {
                await this.expireLocked('refresh-rejected');
                throw new AuthExpiredError('refresh-rejected');
            }
            logger.warn('[SESSION] Token refresh failed, keeping current token', error);
            return token;
        }

        const expiresAt = refreshed.expiresAt ?? now + this.tokenTtlSeconds;
        await this.store.write({ token: refreshed.token, expiresAt });
        logger.info('[SESSION] Token refreshed');
        return refreshed.token;
    }

    private async expireLocked(reason: AuthExpiredReason): Promise<void> {
        logger.warn(`[SESSION] Session expired (${reason})`);
        try {
            await this.store.clear();
        } catch (error) {
            logger.error('[SESSION] Failed to clear stored credentials', error);
        }

        const event: SessionExpiredEvent = { reason, at: this.now() };
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (error) {
                logger.error('[SESSION] Session-expired listener threw', error);
            }
        }
    }
}
