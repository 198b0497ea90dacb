import { setTimeout as sleep } from "node:timers/promises";
import { ReconnectTimeoutError, TransportConfigError, isAbortError } from "./serialTransport";

export const MAX_BACKOFF_MS = 30_000;

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs?: number;
  /** Total time to keep retrying, 0 retries forever */
  timeoutMs: number;
  now?: () => number;
  onRetry?: (err: unknown, delayMs: number) => void;
}

/**
 * Runs `attempt` until it succeeds, doubling the pause after each failure.
 * Aborts and configuration errors are not retried.
 */
export async function retryWithBackoff<T>(
  attempt: () => Promise<T>,
  options: BackoffOptions,
  signal: AbortSignal,
): Promise<T> {
  const now = options.now ?? Date.now;
  const maxDelay = options.maxDelayMs ?? MAX_BACKOFF_MS;
  const deadline = options.timeoutMs > 0 ? now() + options.timeoutMs : Infinity;
  let delay = Math.max(1, options.initialDelayMs);

  for (;;) {
    try {
      return await attempt();
    } catch (err) {
      if (isAbortError(err) || err instanceof TransportConfigError) {
        throw err;
      }
      const remaining = deadline - now();
      if (remaining <= 0) {
        throw new ReconnectTimeoutError(options.timeoutMs, { cause: err });
      }
      // The last pause is cut short so one more attempt lands on the deadline
      const wait = Math.min(delay, remaining);
      options.onRetry?.(err, wait);
      await sleep(wait, undefined, { signal });
      delay = Math.min(delay * 2, maxDelay);
    }
  }
}
