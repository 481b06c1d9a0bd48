/**
 * Resolves after `ms`, or early (without throwing) once `signal` aborts.
 * Callers check `signal.aborted` afterwards to tell the two apart.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) return resolve();

        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;
