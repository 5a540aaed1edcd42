import { MongoError, MongoNetworkError } from "mongodb";
import { retry } from "../../shared/retry/retry";

export type MongoWriteRetryOptions = {
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
};

export const defaultWriteRetryOptions: MongoWriteRetryOptions = {
  retries: 3,
  minDelayMs: 100,
  maxDelayMs: 2000
};

export const isTransientMongoError = (err: unknown): boolean => {
  if (err instanceof MongoNetworkError) return true;
  return err instanceof MongoError && err.hasErrorLabel("RetryableWriteError");
};

const errorName = (err: unknown) => (err instanceof Error ? err.name : typeof err);

/**
 * Retries a write on transient driver failures. Logs only the operation name and
 * error class, never the document being written.
 */
export const withWriteRetry = <T>(
  operation: string,
  fn: () => Promise<T>,
  options: MongoWriteRetryOptions
): Promise<T> =>
  retry(fn, {
    ...options,
    shouldRetry: isTransientMongoError,
    onRetry: ({ attempt, maxAttempts, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "db.retry", operation, error: errorName(error), attempt, maxAttempts }));
    },
    onGiveUp: ({ attempt, maxAttempts, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "db.give_up", operation, error: errorName(error), attempt, maxAttempts }));
    }
  });
