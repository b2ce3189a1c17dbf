export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
}

export abstract class BaseValidator<T> {
  public abstract validate(value: unknown, path: string): asserts value is T;

  /**
   * Non-throwing variant of {@link validate}. Never mutates `value`.
   */
  public check(value: unknown, path: string): ValidationResult {
    try {
      this.validate(value, path);
      return { valid: true, errors: [] };
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        return { valid: false, errors: [error] };
      }
      throw error;
    }
  }

  protected assertType(
    value: unknown,
    type: string,
    path: string,
  ): asserts value is Record<string, unknown> {
    if (typeof value !== type || value === null) {
      throw new ConfigValidationError(
        `${path} must be ${type === 'object' ? 'an object' : `a ${type}`}, got ${typeof value === 'object' && value === null ? 'null' : typeof value}`,
        path,
      );
    }
  }

  protected assertString(value: unknown, path: string): asserts value is string {
    if (typeof value !== 'string') {
      throw new ConfigValidationError(
        `${path} must be a string, got ${typeof value} (value: ${String(value)})`,
        path,
      );
    }
  }

  protected assertNumber(value: unknown, path: string, min?: number): asserts value is number {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new ConfigValidationError(
        `${path} must be a number, got ${typeof value} (value: ${String(value)})`,
        path,
      );
    }
    if (min !== undefined && value < min) {
      throw new ConfigValidationError(`${path} must be >= ${min}, got ${value}`, path);
    }
  }

  protected assertInteger(value: unknown, path: string, min?: number): asserts value is number {
    this.assertNumber(value, path, min);
    if (!Number.isInteger(value)) {
      throw new ConfigValidationError(`${path} must be an integer, got ${value}`, path);
    }
  }

  protected assertBoolean(value: unknown, path: string): asserts value is boolean {
    if (typeof value !== 'boolean') {
      throw new ConfigValidationError(
        `${path} must be a boolean, got ${typeof value} (value: ${String(value)})`,
        path,
      );
    }
  }

  protected assertEnum<T extends string>(
    value: unknown,
    allowedValues: readonly T[],
    path: string,
  ): asserts value is T {
    if (typeof value !== 'string' || !allowedValues.some(allowed => allowed === value)) {
      throw new ConfigValidationError(
        `${path} must be one of: ${allowedValues.join(', ')}, got ${typeof value === 'string' ? `"${value}"` : typeof value}`,
        path,
      );
    }
  }
}
