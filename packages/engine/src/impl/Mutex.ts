/**
 * @fileoverview Async mutex
 *
 * Serializes async critical sections within one process. Waiters are
 * granted the lock in FIFO order.
 *
 * @module @nestguard/engine/impl/Mutex
 */

/**
 * Releases a held lock. Calling it more than once has no effect.
 */
export type Release = () => void;

/**
 * Mutex - promise-chain lock.
 *
 * @example
 * ```typescript
 * const lock = new Mutex();
 * const value = await lock.runExclusive(async () => {
 *     return await refresh();
 * });
 * ```
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();
    private holders = 0;

    /**
     * Wait for the lock.
     */
    async acquire(): Promise<Release> {
        let release: Release = () => undefined;
        const granted = new Promise<void>((resolve) => {
            let released = false;
            release = () => {
                if (released) {
                    return;
                }
                released = true;
                this.holders--;
                resolve();
            };
        });

        const previous = this.tail;
        this.tail = previous.then(() => granted);
        this.holders++;

        await previous;
        return release;
    }

    /**
     * Run `fn` while holding the lock; the lock is released when it settles.
     */
    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        }
        finally {
            release();
        }
    }

    /**
     * Whether the lock is held or awaited.
     */
    get isLocked(): boolean {
        return this.holders > 0;
    }
}
