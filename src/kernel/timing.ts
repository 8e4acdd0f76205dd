/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export const ABORTED: unique symbol = Symbol('aborted');

/**
 * Races `promise` against `signal`. The losing promise is left running; if it
 * later rejects, the rejection is reported through `onLateError`.
 */
export function untilAborted<T>(
    promise: Promise<T>,
    signal: AbortSignal,
    onLateError: (error: unknown) => void
): Promise<T | typeof ABORTED> {
    if (signal.aborted) {
        void promise.catch(onLateError);
        return Promise.resolve(ABORTED);
    }
    return new Promise<T | typeof ABORTED>((resolve, reject) => {
        let settled = false;
        const onAbort = () => {
            if (settled) return;
            settled = true;
            resolve(ABORTED);
        };
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                if (settled) return;
                settled = true;
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                if (settled) {
                    onLateError(error);
                    return;
                }
                settled = true;
                reject(error);
            }
        );
    });
}
