import { Injectable, Logger } from '@nestjs/common';
import { RETRY_JITTER_PERCENT } from '../../common/constants/app.constants.js';
import { isWaitAbortedError, toWaitError } from '../../common/errors/cancellation.errors.js';
import type { RetryConfig } from './interfaces/retry.interface.js';

export interface ExecuteWithRetryParams<T> {
  /**
   * Receives the zero-based attempt number
   */
  operation: (attempt: number) => Promise<T>;
  config: RetryConfig;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  signal?: AbortSignal;
}

@Injectable()
export class RetryHandlerService {
  private readonly logger = new Logger(RetryHandlerService.name);

  public isRetryEnabled(config: RetryConfig): boolean {
    return config.enabled && config.maxRetries > 0;
  }

  /**
   * Delay before retry number `attempt` (1-based), capped at `maxDelayMs`.
   * Exponential backoff is randomized by ±RETRY_JITTER_PERCENT.
   */
  public getDelay(
    attempt: number,
    config: Pick<RetryConfig, 'backoffStrategy' | 'baseDelayMs' | 'maxDelayMs'>,
  ): number {
    const { backoffStrategy, baseDelayMs, maxDelayMs } = config;
    if (attempt <= 0) {
      return baseDelayMs;
    }

    let delay: number;
    switch (backoffStrategy) {
      case 'exponential': {
        const exponential = 2 ** (attempt - 1) * baseDelayMs;
        delay = this.applyJitter(exponential);
        break;
      }
      case 'linear':
        delay = attempt * baseDelayMs;
        break;
      default:
        delay = baseDelayMs;
    }

    return Math.min(delay, maxDelayMs);
  }

  /**
   * Resolve after `ms`, or reject with the wait error taxonomy when `signal` aborts
   */
  public async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw toWaitError(signal);
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        if (signal) {
          reject(toWaitError(signal));
        }
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Run `operation`, retrying up to `config.maxRetries` times while `shouldRetry` allows.
   * Cancellation and deadline errors are never retried.
   */
  public async executeWithRetry<T>(params: ExecuteWithRetryParams<T>): Promise<T> {
    const { operation, config, shouldRetry, onRetry, signal } = params;

    if (!this.isRetryEnabled(config)) {
      return operation(0);
    }

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt >= config.maxRetries || isWaitAbortedError(error) || !shouldRetry(error)) {
          throw error;
        }

        const delay = this.getDelay(attempt + 1, config);
        onRetry?.(attempt + 1, error, delay);
        this.logger.debug(`Retry ${attempt + 1}/${config.maxRetries} in ${delay}ms`);

        await this.sleep(delay, signal);
      }
    }
  }

  private applyJitter(delay: number): number {
    const range = (delay * RETRY_JITTER_PERCENT) / 100;
    const jitter = (Math.random() * 2 - 1) * range;
    return Math.max(0, Math.round(delay + jitter));
  }
}
