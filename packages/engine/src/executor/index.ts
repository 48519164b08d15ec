/**
 * Rate-limited execution of external calls
 */

export { RateLimitedExecutor, createRateLimitedExecutor } from "./rate-limited.js";
export type { ExecutorOptions, ExecutorRequest, ExecutorStats, IExecutor } from "./types.js";
