import { CancelledError, TimeoutError } from './errors.js';

/**
 * Run `task` with a deadline.
 *
 * The task receives an AbortSignal that fires when the deadline passes or when
 * `parent` aborts. The returned promise rejects with `TimeoutError` or
 * `CancelledError` at that moment, without waiting for the task to notice.
 * Callers that own resources started by the task must tear them down
 * themselves after a rejection.
 */
export function withDeadline<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parent?: AbortSignal
): Promise<T> {
    if (parent?.aborted) {
        return Promise.reject(new CancelledError(label));
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onParentAbort: (() => void) | undefined;

    const guard = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(label, timeoutMs));
        }, timeoutMs);

        if (parent) {
            onParentAbort = () => {
                controller.abort();
                reject(new CancelledError(label));
            };
            parent.addEventListener('abort', onParentAbort, { once: true });
        }
    });

    return Promise.race([task(controller.signal), guard]).finally(() => {
        clearTimeout(timer);
        if (parent && onParentAbort) {
            parent.removeEventListener('abort', onParentAbort);
        }
    });
}
