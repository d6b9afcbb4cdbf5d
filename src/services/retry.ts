/**
 * Retry Service
 * Fixed-delay retry for a human-supervised CLI: every failure is retried
 * after the same pause, up to a bounded number of attempts.
 */

export interface RetryConfig {
  /** Total number of attempts, including the first (default: 3) */
  tries: number;
  /** Pause between attempts in milliseconds (default: 2000) */
  delayMs: number;
  /** Label used in the exhaustion message, usually the URL */
  target?: string;
  /** Called after a failed attempt that will be retried */
  onRetry?: (error: unknown, attempt: number) => void;
}

export const DEFAULT_RETRY_CONFIG: Omit<RetryConfig, 'target' | 'onRetry'> = {
  tries: 3,
  delayMs: 2000,
};

/**
 * Error thrown when all attempts failed
 */
export class RetriesExhaustedError extends Error {
  public readonly code = 'RETRIES_EXHAUSTED';
  public readonly originalError: unknown;
  public readonly attempts: number;
  public readonly target?: string;

  constructor(message: string, originalError: unknown, attempts: number, target?: string) {
    super(message);
    this.name = 'RetriesExhaustedError';
    this.originalError = originalError;
    this.attempts = attempts;
    this.target = target;
  }
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

/**
 * Execute a function, retrying any failure
 * @param fn The async function to execute
 * @param config Retry configuration
 * @returns The result of the first successful attempt
 * @throws RetriesExhaustedError once `tries` attempts have failed
 */
export async function retry<T>(
  fn: RetryableFunction<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const fullConfig: RetryConfig = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };
  const tries = Math.max(1, Math.floor(fullConfig.tries));

  let lastError: unknown;

  for (let attempt = 1; attempt <= tries; attempt++) {
    try {
      return await fn({ attempt });
    } catch (error) {
      lastError = error;

      if (attempt < tries) {
        fullConfig.onRetry?.(error, attempt);
        await sleep(fullConfig.delayMs);
      }
    }
  }

  const where = fullConfig.target ? ` for ${fullConfig.target}` : '';
  throw new RetriesExhaustedError(
    `Gave up after ${tries} attempt${tries === 1 ? '' : 's'}${where}: ${describeError(lastError)}`,
    lastError,
    tries,
    fullConfig.target
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sleep for the specified duration
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
