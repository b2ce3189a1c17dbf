import { BaseValidator, ConfigValidationError } from './config-validator.js';
import {
  BACKOFF_STRATEGIES,
  type RetryConfig,
} from '../../modules/transport/interfaces/retry.interface.js';

export class RetryValidator extends BaseValidator<RetryConfig> {
  validate(value: unknown, path: string): asserts value is RetryConfig {
    this.assertType(value, 'object', path);

    this.assertBoolean(value.enabled, `${path}.enabled`);
    this.assertInteger(value.maxRetries, `${path}.maxRetries`, 0);
    this.assertBoolean(value.retryClientErrors, `${path}.retryClientErrors`);
    this.assertEnum(value.backoffStrategy, BACKOFF_STRATEGIES, `${path}.backoffStrategy`);
    this.assertNumber(value.baseDelayMs, `${path}.baseDelayMs`, 0);
    this.assertNumber(value.maxDelayMs, `${path}.maxDelayMs`, 0);

    if (value.maxDelayMs < value.baseDelayMs) {
      throw new ConfigValidationError(
        `${path}.maxDelayMs (${value.maxDelayMs}) must be >= ${path}.baseDelayMs (${value.baseDelayMs})`,
        `${path}.maxDelayMs`,
      );
    }
  }
}
