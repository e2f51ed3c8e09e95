import type { RetryBackoff } from "../config.js";

/**
 * Delay before retry number `retry` (1-based):
 * `min(baseMs * multiplier^(retry-1), maxMs)`.
 */
export function backoffDelay(retry: number, policy: RetryBackoff): number {
  if (retry < 1) return 0;
  return Math.min(policy.baseMs * policy.multiplier ** (retry - 1), policy.maxMs);
}

/**
 * Wait `ms` milliseconds. Resolves `false` early if `signal` aborts,
 * `true` once the full delay has elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  if (ms <= 0) return Promise.resolve(true);

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
