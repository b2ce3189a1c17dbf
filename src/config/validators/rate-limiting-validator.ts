import { BaseValidator, type ValidationResult } from './config-validator.js';
import type { ClientConfig } from '../client-config.interface.js';
import type {
  CustomerRateLimitConfig,
  RateLimitConfig,
} from '../../modules/rate-limiter/interfaces/rate-limiter.interface.js';

/**
 * Validates a single bucket configuration
 */
export class RateLimitConfigValidator extends BaseValidator<RateLimitConfig> {
  validate(value: unknown, path: string): asserts value is RateLimitConfig {
    this.assertType(value, 'object', path);

    this.assertInteger(value.requestsPerSecond, `${path}.requestsPerSecond`, 0);
    this.assertInteger(value.burstCapacity, `${path}.burstCapacity`, 0);
    this.assertBoolean(value.enabled, `${path}.enabled`);
  }
}

/**
 * Validates the `rateLimiting` section of the client configuration
 */
export class RateLimitingValidator extends BaseValidator<ClientConfig['rateLimiting']> {
  private readonly bucketValidator: RateLimitConfigValidator = new RateLimitConfigValidator();

  validate(value: unknown, path: string): asserts value is ClientConfig['rateLimiting'] {
    this.assertType(value, 'object', path);

    this.assertBoolean(value.enabled, `${path}.enabled`);
    this.bucketValidator.validate(value.general, `${path}.general`);
    this.bucketValidator.validate(value.statistics, `${path}.statistics`);
    this.bucketValidator.validate(value.sendMessage, `${path}.sendMessage`);
  }

  /**
   * Validates partial per-category overrides; absent categories are skipped
   */
  public validateCustomer(value: unknown, path: string): asserts value is CustomerRateLimitConfig {
    this.assertType(value, 'object', path);

    for (const key of ['general', 'statistics', 'sendMessage'] as const) {
      if (value[key] !== undefined) {
        this.bucketValidator.validate(value[key], `${path}.${key}`);
      }
    }
  }
}

/**
 * Check a bucket configuration without throwing.
 * Each invalid field is reported by its path; the input is left untouched.
 */
export function validateRateLimitConfig(value: unknown, path = 'rateLimit'): ValidationResult {
  const validator = new RateLimitConfigValidator();
  const result: ValidationResult = { valid: true, errors: [] };

  if (typeof value !== 'object' || value === null) {
    return validator.check(value, path);
  }

  const fields: Record<string, unknown> = { ...value };
  const baseline: RateLimitConfig = { requestsPerSecond: 0, burstCapacity: 0, enabled: true };

  // Validate one field at a time against an otherwise-valid copy so every bad field is listed
  for (const field of ['requestsPerSecond', 'burstCapacity', 'enabled'] as const) {
    const candidate: Record<string, unknown> = { ...baseline, [field]: fields[field] };
    result.errors.push(...validator.check(candidate, path).errors);
  }

  result.valid = result.errors.length === 0;
  return result;
}
