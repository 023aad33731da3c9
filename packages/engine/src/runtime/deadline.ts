/**
 * @fileoverview Deadlines and abort-aware delays
 *
 * @module @papertriage/engine/runtime/deadline
 */

import { InvalidInputError, TimeoutError } from "../errors/PipelineError.js";

/**
 * Run `task` with a deadline.
 *
 * When the deadline passes, the signal handed to `task` is aborted with a
 * TimeoutError and the returned promise rejects with that same error.
 * Whatever `task` does afterwards is ignored.
 *
 * @param task - Work to run; should pass `signal` on to its I/O
 * @param timeoutMs - Deadline in milliseconds (positive)
 * @param label - Used in the error message
 *
 * @example
 * ```typescript
 * const body = await withDeadline((signal) => fetchPaper(id, signal), 30_000, "fetch");
 * ```
 */
export async function withDeadline<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label = "operation"
): Promise<T> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new InvalidInputError(`Deadline must be a positive number of milliseconds, got ${timeoutMs}`);
    }

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const expiry = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(`${label} exceeded its ${timeoutMs}ms deadline`, {
                details: { timeoutMs },
            });
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), expiry]);
    }
    finally {
        clearTimeout(timer);
    }
}

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };

        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);

        signal?.addEventListener("abort", onAbort, { once: true });
    });
}
