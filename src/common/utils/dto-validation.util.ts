import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import { ApiError } from '../errors/api.errors.js';

interface FieldViolation {
  field: string;
  message: string;
}

function flattenErrors(errors: ValidationError[], parent = ''): FieldViolation[] {
  return errors.flatMap(err => {
    const field = parent ? `${parent}.${err.property}` : err.property;
    const own = err.constraints
      ? [{ field, message: Object.values(err.constraints).join(', ') }]
      : [];
    return [...own, ...flattenErrors(err.children ?? [], field)];
  });
}

/**
 * Check a request body against its class-validator DTO before anything is sent.
 * The payload itself is not modified.
 *
 * @throws ApiError of type `validation`, `field` naming the first offending property
 */
export function validateDto<T extends object>(params: {
  dtoClass: new () => T;
  payload: unknown;
}): T {
  const instance = plainToInstance(params.dtoClass, params.payload);
  const violations = flattenErrors(validateSync(instance));

  const first = violations[0];
  if (first) {
    throw new ApiError({
      type: 'validation',
      message: violations.map(v => `${v.field}: ${v.message}`).join('; '),
      field: first.field,
    });
  }

  return instance;
}
