export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number; // extra attempts after the first one; 0 disables retrying
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Delay before the retry that follows failed attempt number `attempt`
 * (0-based): exponential from `minDelayMs`, or the server-requested delay,
 * capped at `maxDelayMs`, plus up to `jitterRatio` of random jitter.
 */
export const backoffDelay = (
  attempt: number,
  requestedDelayMs: number | undefined,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs"> & { jitterRatio: number; random: number }
): number => {
  const base =
    requestedDelayMs != null && Number.isFinite(requestedDelayMs) && requestedDelayMs >= 0
      ? requestedDelayMs
      : opts.minDelayMs * 2 ** attempt;
  const capped = Math.min(opts.maxDelayMs, base);
  return capped + Math.floor(capped * clamp01(opts.jitterRatio) * clamp01(opts.random));
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, randomFn = Math.random, jitterRatio = 0.2 } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const { retry: again, delayMs } = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;
      if (attempt >= retries || !again) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const waitMs = backoffDelay(attempt, delayMs, { ...opts, jitterRatio, random: randomFn() });
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs);
    }
  }
};
