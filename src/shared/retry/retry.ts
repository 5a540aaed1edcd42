export type RetryContext = { attempt: number; maxAttempts: number; error: unknown };

export type RetryOptions = {
  retries: number;          // attempts after the initial try (3 means up to 4 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: RetryContext & { delayMs: number }) => void;
  onGiveUp?: (ctx: RetryContext) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: (ms: number) => Promise<void>;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

export const backoffDelayMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "jitterRatio"> & { random: number }
): number => {
  const backoff = Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(2, attempt));
  const jitter = Math.floor(backoff * clamp01(opts.jitterRatio ?? 0.2) * clamp01(opts.random));
  return backoff + jitter;
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, shouldRetry, onRetry, onGiveUp, randomFn = Math.random, sleepFn = sleep } = opts;
  const maxAttempts = retries + 1;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err)) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const delayMs = backoffDelayMs(attempt, { ...opts, random: randomFn() });
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleepFn(delayMs);
    }
  }
};
