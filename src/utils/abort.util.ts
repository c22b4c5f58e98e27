/**
 * Combine an optional caller signal with a per-call timeout.
 *
 * `timedOut()` tells the two abort reasons apart after the fact. `cleanup()`
 * must run once the call settles so the timer and listener are released.
 */
export function createTimeoutSignal(
    callerSignal: AbortSignal | undefined,
    timeoutMs: number
): { signal: AbortSignal; timedOut: () => boolean; cleanup: () => void } {
    const controller = new AbortController();
    let didTimeOut = false;

    const timer = setTimeout(() => {
        didTimeOut = true;
        controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref?.();

    const onCallerAbort = () => controller.abort(callerSignal?.reason);

    if (callerSignal?.aborted) {
        onCallerAbort();
    } else {
        callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    return {
        signal: controller.signal,
        timedOut: () => didTimeOut,
        cleanup: () => {
            clearTimeout(timer);
            callerSignal?.removeEventListener('abort', onCallerAbort);
        }
    };
}

/**
 * A promise that rejects with the signal's reason once it aborts. Raced
 * against clients that do not honour the signal themselves.
 */
export function rejectOnAbort(signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}
