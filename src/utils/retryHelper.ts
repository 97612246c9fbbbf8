import { logger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  operationName?: string;
  /** Errors for which this returns false are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

/**
 * Retry helper for network operations with exponential backoff
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    operationName = 'operation',
    shouldRetry = () => true,
    signal,
  } = options;

  for (let i = 0; ; i++) {
    try {
      return await operation();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      if (i >= maxRetries || !shouldRetry(error) || signal?.aborted) {
        if (i > 0) {
          logger.error(`${operationName} failed after ${i} retries`, { error: message });
        }
        throw error;
      }

      const delay = baseDelay * Math.pow(2, i);
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${i + 1}/${maxRetries})`,
        { error: message },
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
