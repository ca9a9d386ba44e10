import sleep from "./sleep";

export interface RateLimiterOptions {
  /**
   * Fixed delay before every request.
   */
  delayMs: number;

  /**
   * Upper bound of the random delay added on top of {@link RateLimiterOptions.delayMs}. Zero disables jitter.
   */
  jitterMs?: number;

  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiter {
  /**
   * Resolves after the configured delay has elapsed, returning the delay that was waited.
   */
  wait(): Promise<number>;
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const random = options.random ?? Math.random;
  const doSleep = options.sleep ?? sleep;
  const jitterMs = Math.max(0, options.jitterMs ?? 0);
  const delayMs = Math.max(0, options.delayMs);

  return {
    async wait() {
      const waitMs = Math.round(delayMs + random() * jitterMs);
      if (waitMs > 0) {
        await doSleep(waitMs);
      }

      return waitMs;
    },
  };
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}
