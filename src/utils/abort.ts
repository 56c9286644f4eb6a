import { RequestTimeoutError, toError } from "./errors";

export interface TimeoutOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

/**
 * Runs `task` with a signal that aborts when the caller's signal aborts or
 * `timeoutMs` elapses. The returned promise settles as soon as either happens,
 * even if the task ignores its signal.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    { timeoutMs, signal }: TimeoutOptions = {}
): Promise<T> {
    if (signal?.aborted) {
        throw toError(signal.reason);
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const aborted = new Promise<never>((_, reject) => {
        controller.signal.addEventListener("abort", () => reject(toError(controller.signal.reason)), { once: true });
    });

    let timer: NodeJS.Timeout | undefined;
    if (timeoutMs && timeoutMs > 0) {
        timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);
    }

    try {
        return await Promise.race([task(controller.signal), aborted]);
    } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", forwardAbort);
    }
}
