/**
 * @fileoverview Retry with exponential backoff
 *
 * @module @papertriage/engine/runtime/retry
 */

import { delay } from "./deadline.js";

export interface RetryOptions {
    /** Extra attempts after the first one (default: 1) */
    readonly retries?: number;

    /** Wait before the first retry; doubles for each later one (default: 250) */
    readonly backoffMs?: number;

    /** Stops retrying once aborted */
    readonly signal?: AbortSignal;

    /** Called before each retry with the failed attempt number (1-based) */
    readonly onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Call `task` until it resolves or the retries run out. The last error is
 * rethrown unchanged.
 *
 * @example
 * ```typescript
 * const score = await withRetry(() => scorer.score(excerpt), { retries: 1, backoffMs: 250 });
 * ```
 */
export async function withRetry<T>(
    task: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const retries = options.retries ?? 1;
    const backoffMs = options.backoffMs ?? 250;

    for (let attempt = 1; ; attempt++) {
        options.signal?.throwIfAborted();

        try {
            return await task(attempt);
        }
        catch (error) {
            if (attempt > retries || options.signal?.aborted) {
                throw error;
            }
            options.onRetry?.(attempt, error);
            await delay(backoffMs * 2 ** (attempt - 1), options.signal);
        }
    }
}
