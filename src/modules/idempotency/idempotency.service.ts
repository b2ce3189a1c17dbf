import { randomUUID } from 'node:crypto';
import { Injectable, Inject } from '@nestjs/common';
import { CLIENT_CONFIG } from '../../config/client-config.provider.js';
import type { ClientConfig } from '../../config/client-config.interface.js';
import type { IdempotencyConfig } from './interfaces/idempotency.interface.js';
import { IdempotencyKeyBuilder } from './idempotency-key.builder.js';

/**
 * Generates `Idempotency-Key` values for retry-safe POST requests
 */
@Injectable()
export class IdempotencyService {
  private config: IdempotencyConfig;

  constructor(@Inject(CLIENT_CONFIG) clientConfig: ClientConfig) {
    this.config = { ...clientConfig.idempotency };
  }

  /**
   * Random UUID v4, as `<prefix>-<uuid>` when a prefix is configured
   */
  public generateKey(): string {
    const uuid = randomUUID();
    return this.config.keyPrefix ? `${this.config.keyPrefix}-${uuid}` : uuid;
  }

  /**
   * The given key if non-empty, else a generated one when auto-generation is on
   */
  public ensureKey(key?: string): string | undefined {
    if (key) {
      return key;
    }
    return this.config.autoGenerate ? this.generateKey() : undefined;
  }

  public newKeyBuilder(baseKey?: string): IdempotencyKeyBuilder {
    return new IdempotencyKeyBuilder(baseKey || this.generateKey());
  }

  /**
   * Run `operation` with `key`, or with a fresh key when none is given
   */
  public async executeIdempotent<T>(
    operation: (key: string) => Promise<T>,
    key?: string,
  ): Promise<T> {
    return operation(key || this.generateKey());
  }

  public getConfig(): IdempotencyConfig {
    return { ...this.config };
  }

  public setConfig(config: Partial<IdempotencyConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
