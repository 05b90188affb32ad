import { cancelledError } from './fetch-error.js';

/**
 * Sleep for the specified number of milliseconds.
 * Rejects with a Cancelled FetchError if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (!signal) {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }

    return new Promise((resolve, reject) => {
        if (signal.aborted) {
            reject(cancelledError(signal));
            return;
        }

        const onAbort = () => {
            clearTimeout(timer);
            reject(cancelledError(signal));
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);

        signal.addEventListener('abort', onAbort, { once: true });
    });
}
