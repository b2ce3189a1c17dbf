import type { EndpointType, RateLimitConfig, RateLimitStatus } from './interfaces/rate-limiter.interface.js';
import { toWaitError } from '../../common/errors/cancellation.errors.js';
import { MAX_TOKEN_WAIT_MS, TOKEN_WAKE_SLACK_MS } from '../../common/constants/app.constants.js';

export type Clock = () => number;

/**
 * Token bucket with lazy refill.
 *
 * Tokens are recomputed from the elapsed time on every read, so no background timer
 * is needed. Refill and consumption happen in one synchronous step, which makes them
 * atomic with respect to every other caller on the event loop.
 *
 * Waiters are not queued: whoever re-checks first after a wake-up gets the token.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private config: RateLimitConfig;

  // Suspended waiters, woken on config changes so they re-evaluate immediately
  private readonly waiters = new Set<() => void>();

  constructor(
    config: RateLimitConfig,
    private readonly clock: Clock = Date.now,
  ) {
    this.config = { ...config };
    this.tokens = config.burstCapacity;
    this.lastRefill = clock();
  }

  public get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Take a token if one is available right now.
   * Disabled buckets always admit without consuming.
   */
  public tryAcquire(): boolean {
    if (!this.config.enabled) {
      return true;
    }

    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }

    return false;
  }

  /**
   * Resolve once a token has been taken, or once `bypass` returns true.
   *
   * Without a signal this never rejects. With one, it rejects with
   * `DeadlineExceededError` or `RequestCancelledError` as soon as the signal aborts.
   * Availability is checked before the signal, so an already-aborted signal does not
   * fail an admission that needs no wait.
   *
   * `bypass` is re-checked on every wake-up; call {@link wake} after the state it
   * reads changes.
   */
  public async waitForToken(signal?: AbortSignal, bypass?: () => boolean): Promise<void> {
    for (;;) {
      if (bypass?.() || this.tryAcquire()) {
        return;
      }

      if (signal?.aborted) {
        throw toWaitError(signal);
      }

      await this.sleepUntilNextToken(signal);
    }
  }

  /**
   * Update limits in place. Tokens accrued under the previous rate are kept
   * (clamped to the new capacity) and current waiters re-evaluate against the new limits.
   */
  public updateConfig(config: RateLimitConfig): void {
    this.refill();
    this.config = { ...config };
    this.tokens = Math.min(this.tokens, config.burstCapacity);
    this.wake();
  }

  public setEnabled(enabled: boolean): void {
    this.refill();
    this.config = { ...this.config, enabled };
    this.wake();
  }

  /**
   * Make every suspended waiter re-check at once
   */
  public wake(): void {
    for (const resume of [...this.waiters]) {
      resume();
    }
  }

  public getConfig(): RateLimitConfig {
    return { ...this.config };
  }

  /**
   * Snapshot of the bucket as if refilled now. Does not mutate the bucket.
   */
  public getStatus(endpointType: EndpointType): RateLimitStatus {
    const now = this.clock();
    const { requestsPerSecond, burstCapacity, enabled } = this.config;
    const current = this.computeTokens(now);

    let nextRefillAt: Date | null = null;
    if (current < burstCapacity && requestsPerSecond > 0) {
      const secondsToFull = (burstCapacity - current) / requestsPerSecond;
      nextRefillAt = new Date(now + Math.ceil(secondsToFull * 1000));
    }

    return Object.freeze({
      endpointType,
      enabled,
      requestsPerSecond,
      burstCapacity,
      tokensAvailable: Math.floor(current),
      nextRefillAt,
    });
  }

  private computeTokens(now: number): number {
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    return Math.min(
      this.config.burstCapacity,
      this.tokens + elapsedSeconds * this.config.requestsPerSecond,
    );
  }

  private refill(): void {
    const now = this.clock();
    this.tokens = this.computeTokens(now);
    this.lastRefill = now;
  }

  /**
   * Milliseconds until one whole token is available, or Infinity if it never will be
   */
  private msUntilNextToken(): number {
    const { requestsPerSecond, burstCapacity } = this.config;
    if (requestsPerSecond <= 0 || burstCapacity < 1) {
      return Number.POSITIVE_INFINITY;
    }
    const deficit = Math.max(0, 1 - this.tokens);
    return Math.ceil((deficit / requestsPerSecond) * 1000) + TOKEN_WAKE_SLACK_MS;
  }

  private sleepUntilNextToken(signal?: AbortSignal): Promise<void> {
    const delay = this.msUntilNextToken();

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        this.waiters.delete(wake);
        signal?.removeEventListener('abort', onAbort);
      };

      const wake = (): void => {
        cleanup();
        resolve();
      };

      const onAbort = (): void => {
        cleanup();
        if (signal) {
          reject(toWaitError(signal));
        }
      };

      // A non-refilling bucket arms no timer: only an abort or a wake() ends the wait
      if (Number.isFinite(delay)) {
        timer = setTimeout(wake, Math.min(delay, MAX_TOKEN_WAIT_MS));
      }
      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
