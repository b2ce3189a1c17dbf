import { randomUUID } from 'node:crypto';

/**
 * Derives related idempotency keys from one base key.
 * The first `next()` returns the base key; later calls add a short random suffix.
 */
export class IdempotencyKeyBuilder {
  private issued = 0;

  constructor(private readonly baseKey: string) {}

  public getBaseKey(): string {
    return this.baseKey;
  }

  public next(): string {
    this.issued++;
    if (this.issued === 1) {
      return this.baseKey;
    }
    return `${this.baseKey}-${randomUUID().slice(0, 8)}`;
  }

  public withSuffix(suffix: string): string {
    return `${this.baseKey}-${suffix}`;
  }
}
