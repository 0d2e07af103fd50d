/**
 * Single-permit async mutex. Callers queue in arrival order.
 */
export class AsyncLock {
    private permits = 1;
    private waiters: Array<() => void> = [];

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.lock();
        try {
            return await func();
        } finally {
            this.unlock();
        }
    }

    private lock(): Promise<void> {
        if (this.permits > 0) {
            this.permits -= 1;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private unlock(): void {
        const next = this.waiters.shift();
        if (next) {
            // Hand the permit straight to the next waiter.
            next();
            return;
        }
        this.permits += 1;
    }
}
