import { HomgarApiError, ErrorCode } from './errors.js';
import type { HomgarLogger } from '../types/index.js';

export interface RetryOptions {
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  logger?: Pick<HomgarLogger, 'debug' | 'warn'>;
}

/**
 * Only transport-level failures are retried: rate limiting, 5xx, timeouts and
 * network errors. An envelope with a non-zero code is an answer, not a failure
 * of the transport, and is never retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HomgarApiError) {
    return error.code === ErrorCode.HOMGAR_RATE_LIMITED || error.code === ErrorCode.HOMGAR_UNAVAILABLE;
  }

  if (error instanceof Error) {
    // fetch raises TypeError for network failures
    return error.name === 'AbortError' || error instanceof TypeError;
  }

  return false;
}

/**
 * min(initial * 2^attempt + jitter, max), with 0-30% jitter.
 */
export function calculateBackoff(attempt: number, initialBackoffMs: number, maxBackoffMs: number): number {
  const exponential = initialBackoffMs * Math.pow(2, attempt);
  const jitter = Math.random() * 0.3 * exponential;
  return Math.min(exponential + jitter, maxBackoffMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RetryHandler {
  private readonly options: RetryOptions;

  constructor(options: Partial<RetryOptions> = {}) {
    this.options = {
      maxRetries: options.maxRetries ?? 3,
      initialBackoffMs: options.initialBackoffMs ?? 1000,
      maxBackoffMs: options.maxBackoffMs ?? 10000,
      logger: options.logger,
    };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const { maxRetries, initialBackoffMs, maxBackoffMs, logger } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isRetryableError(error)) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);

        if (attempt >= maxRetries) {
          logger?.warn(`Giving up after ${attempt + 1} attempts`, { error: message });
          throw error;
        }

        const backoffMs = Math.round(calculateBackoff(attempt, initialBackoffMs, maxBackoffMs));
        logger?.debug(`Retrying in ${backoffMs}ms (attempt ${attempt + 1}/${maxRetries})`, {
          error: message,
          backoffMs,
        });
        await sleep(backoffMs);
      }
    }
  }
}
