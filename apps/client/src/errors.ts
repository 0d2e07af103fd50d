/**
 * Error taxonomy of the sync core.
 * `retryable` tells the outbox drainer whether an automatic retry makes sense.
 */
export abstract class ChatSyncError extends Error {
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Malformed persisted or server JSON. */
export class DecodeError extends ChatSyncError {
    readonly retryable = false;
}

/** I/O failure writing persisted state. */
export class StorageError extends ChatSyncError {
    readonly retryable = true;
}

/** Transport failure or timeout; the request never produced a status. */
export class NetworkError extends ChatSyncError {
    readonly retryable = true;
    readonly timedOut: boolean;

    constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
        super(message, options);
        this.timedOut = options?.timedOut ?? false;
    }
}

/** Non-2xx response other than 401. */
export class ApiError extends ChatSyncError {
    readonly status: number;
    readonly retryable: boolean;

    constructor(status: number, message: string) {
        super(message);
        this.status = status;
        this.retryable = status >= 500 || status === 408 || status === 429;
    }
}

export type AuthExpiredReason = 'missing' | 'expired' | 'unauthorized' | 'refresh-rejected';

/** Session is gone; the UI must sign in again. Never retried automatically. */
export class AuthExpiredError extends ChatSyncError {
    readonly retryable = false;
    readonly reason: AuthExpiredReason;

    constructor(reason: AuthExpiredReason, message = 'Session expired, please sign in again') {
        super(message);
        this.reason = reason;
    }
}

/** Local input check that failed before any I/O. */
export class ValidationError extends ChatSyncError {
    readonly retryable = false;
}

/** A cancelled stream or request. */
export class AbortedError extends ChatSyncError {
    readonly retryable = false;
}

export function isAuthFailure(error: unknown): boolean {
    if (error instanceof AuthExpiredError) return true;
    return error instanceof ApiError && (error.status === 401 || error.status === 403);
}
