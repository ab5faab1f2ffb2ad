import { abortReason } from './async.util';

interface Waiter {
    resolve: (release: () => void) => void;
    reject: (reason: unknown) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Counting semaphore with FIFO hand-off. A waiter whose signal aborts leaves
 * the queue without consuming a permit.
 */
export class Semaphore {
    private available: number;
    private readonly waiters: Waiter[] = [];

    constructor(readonly permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new Error(`Semaphore needs at least one permit, got ${permits}`);
        }
        this.available = permits;
    }

    get inUse(): number {
        return this.permits - this.available;
    }

    get pending(): number {
        return this.waiters.length;
    }

    acquire(signal?: AbortSignal): Promise<() => void> {
        if (signal?.aborted) {
            return Promise.reject(abortReason(signal));
        }
        if (this.available > 0) {
            this.available--;
            return Promise.resolve(this.releaser());
        }
        return new Promise((resolve, reject) => {
            const waiter: Waiter = { resolve, reject, signal };
            if (signal) {
                waiter.onAbort = () => {
                    const index = this.waiters.indexOf(waiter);
                    if (index >= 0) {
                        this.waiters.splice(index, 1);
                    }
                    reject(abortReason(signal));
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            this.waiters.push(waiter);
        });
    }

    async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const release = await this.acquire(signal);
        try {
            return await task();
        } finally {
            release();
        }
    }

    private releaser(): () => void {
        let released = false;
        return () => {
            if (released) {
                return;
            }
            released = true;
            const next = this.waiters.shift();
            if (next) {
                if (next.signal && next.onAbort) {
                    next.signal.removeEventListener('abort', next.onAbort);
                }
                next.resolve(this.releaser());
            } else {
                this.available++;
            }
        };
    }
}
