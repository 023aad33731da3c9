/**
 * @fileoverview Bounded concurrent fan-out
 *
 * @module @papertriage/engine/runtime/fanout
 */

import pLimit from "p-limit";
import { InvalidInputError } from "../errors/PipelineError.js";

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight and
 * wait for all of them. Results come back in input order, whatever the
 * completion order; a failing item does not cancel the others.
 *
 * @example
 * ```typescript
 * const settled = await runBounded(candidates, 5, (c) => score(c));
 * const ok = settled.filter((s) => s.status === "fulfilled");
 * ```
 */
export async function runBounded<I, O>(
    items: readonly I[],
    concurrency: number,
    worker: (item: I, index: number) => Promise<O>
): Promise<PromiseSettledResult<O>[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new InvalidInputError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const limit = pLimit(concurrency);
    return Promise.allSettled(items.map((item, index) => limit(() => worker(item, index))));
}
