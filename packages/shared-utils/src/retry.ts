/**
 * Retry, backoff and timeout helpers
 */

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Fraction of the delay added or removed at random. */
  jitterRatio: number;
}

export interface RetryOptions extends BackoffOptions {
  maxAttempts: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterRatio: 0.1,
};

export type ErrorPredicate = (error: unknown) => boolean;

export class TimeoutError extends Error {
  constructor(
    message: string,
    readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

// Delay before the retry that follows `attempt` (1-based)
export function backoffDelay(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
  const exponential = options.baseDelayMs * options.backoffMultiplier ** (attempt - 1);
  const delay = Math.min(exponential, options.maxDelayMs);
  return delay + delay * options.jitterRatio * (random() * 2 - 1);
}

export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...defaultRetryOptions, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxAttempts || (opts.shouldRetry && !opts.shouldRetry(error, attempt))) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

/** The string `code` a driver or system error carries, if any. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function hasErrorCode(...codes: string[]): ErrorPredicate {
  return (error) => {
    const code = errorCode(error);
    return code !== undefined && codes.includes(code);
  };
}

export function anyOf(...predicates: ErrorPredicate[]): ErrorPredicate {
  return (error) => predicates.some((predicate) => predicate(error));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Rejects with TimeoutError unless `promise` settles within `timeoutMs`
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage = 'Operation timed out'
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(errorMessage, timeoutMs)), timeoutMs);
    void promise.then(resolve, reject).finally(() => clearTimeout(timer));
  });
}
