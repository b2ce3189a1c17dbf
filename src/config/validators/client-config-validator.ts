import { BaseValidator, ConfigValidationError } from './config-validator.js';
import { RateLimitingValidator } from './rate-limiting-validator.js';
import { RetryValidator } from './retry-validator.js';
import type { ClientConfig } from '../client-config.interface.js';

export class ClientConfigValidator extends BaseValidator<ClientConfig> {
  private readonly rateLimitingValidator: RateLimitingValidator = new RateLimitingValidator();
  private readonly retryValidator: RetryValidator = new RetryValidator();

  public validate(value: unknown, path = 'ClientConfig'): asserts value is ClientConfig {
    this.assertType(value, 'object', path);

    const config = value;

    if (config.apiKey !== undefined) {
      this.assertString(config.apiKey, `${path}.apiKey`);
    }
    this.validateBaseUrl(config.baseUrl, `${path}.baseUrl`);
    this.assertString(config.userAgent, `${path}.userAgent`);
    this.assertBoolean(config.debug, `${path}.debug`);
    this.assertNumber(config.timeoutSecs, `${path}.timeoutSecs`, 0);
    this.validateHeaders(config.defaultHeaders, `${path}.defaultHeaders`);
    this.rateLimitingValidator.validate(config.rateLimiting, `${path}.rateLimiting`);
    this.retryValidator.validate(config.retry, `${path}.retry`);
    this.validateIdempotency(config.idempotency, `${path}.idempotency`);
  }

  private validateBaseUrl(value: unknown, path: string): void {
    this.assertString(value, path);

    let url: URL;
    try {
      url = new URL(value);
    } catch (error) {
      throw new ConfigValidationError(`${path} must be a valid URL, got "${value}"`, path, {
        cause: error,
      });
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigValidationError(
        `${path} must use http or https, got "${url.protocol}"`,
        path,
      );
    }
  }

  private validateHeaders(value: unknown, path: string): void {
    this.assertType(value, 'object', path);

    for (const [name, header] of Object.entries(value)) {
      this.assertString(header, `${path}.${name}`);
    }
  }

  private validateIdempotency(value: unknown, path: string): void {
    this.assertType(value, 'object', path);

    this.assertBoolean(value.autoGenerate, `${path}.autoGenerate`);
    this.assertString(value.keyPrefix, `${path}.keyPrefix`);
  }
}
