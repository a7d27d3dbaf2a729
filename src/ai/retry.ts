export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  backoffFactor?: number;
  /** Errors for which this returns false are rethrown without another attempt. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export async function executeWithRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 250,
    backoffFactor = 2,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let attempt = 0;
  let delay = initialDelayMs;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      attempt += 1;
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      onRetry?.(attempt, error, delay);
      await sleep(delay);
      delay *= backoffFactor;
    }
  }
}
