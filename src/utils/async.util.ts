/**
 * Async helpers shared by the gateway, cache and orchestrator.
 */

export function abortReason(signal: AbortSignal): unknown {
    return signal.reason ?? new Error('Operation aborted');
}

/**
 * Resolve after `ms`, or reject with the signal's reason as soon as it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal ? abortReason(signal) : new Error('Operation aborted'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The underlying
 * work is not stopped; callers pass the same signal down so it can stop itself.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) {
        return promise;
    }
    if (signal.aborted) {
        // Late settlement is discarded, as it is after an abort below.
        promise.catch(() => undefined);
        return Promise.reject(abortReason(signal));
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(abortReason(signal));
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            error => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

/**
 * Combine optional signals into one. Returns undefined when none is given.
 */
export function anySignal(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
    const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
    if (present.length === 0) {
        return undefined;
    }
    if (present.length === 1) {
        return present[0];
    }
    return AbortSignal.any(present);
}
