export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Timeout wrapper - race against time limit
 *
 * @param promise - Promise to wrap
 * @param ms - Timeout in milliseconds
 * @param errorMessage - Custom error message
 * @returns Promise that rejects with TimeoutError if the limit is exceeded
 *
 * @example
 * const pong = await withTimeout(connection.ping(), 1000, 'Ping timeout');
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  errorMessage = 'Operation timeout',
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(errorMessage)), ms);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Linear backoff capped at a maximum
 *
 * @param attempt - 1-based attempt number
 *
 * @example
 * linearBackoff(1, 2000, 10000); // 2000
 * linearBackoff(7, 2000, 10000); // 10000
 */
export function linearBackoff(
  attempt: number,
  interval: number,
  maxDelay: number,
): number {
  return Math.min(attempt * interval, maxDelay);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
