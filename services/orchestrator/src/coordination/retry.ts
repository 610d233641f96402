import { DurableWriteError } from "../errors";

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  onRetry?: (attempt: number, err: unknown) => void;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `op` up to `attempts` times with exponential backoff
 * (baseDelayMs, 2×, 4×…). Throws DurableWriteError once attempts run out.
 */
export async function withRetry<T>(operation: string, op: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await op();
    } catch (err) {
      lastError = err;
      if (attempt < options.attempts) {
        options.onRetry?.(attempt, err);
        await sleep(options.baseDelayMs * 2 ** (attempt - 1));
      }
    }
  }
  throw new DurableWriteError(operation, options.attempts, { cause: lastError });
}

/** Resolves to false when `promise` is still pending after `ms`. */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
