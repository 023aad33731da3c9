export { withDeadline, delay } from "./deadline.js";
export type { RetryOptions } from "./retry.js";
export { withRetry } from "./retry.js";
export { runBounded } from "./fanout.js";
