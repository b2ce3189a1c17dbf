import { ApiError } from '../errors/api.errors.js';

const PATH_PARAM_PATTERN = /\{([^}]+)\}/g;

function validatePathParam(name: string, value: string): void {
  if (value.includes('..') || value.includes('//')) {
    throw new ApiError({
      type: 'validation',
      message: `Invalid path parameter ${name}: potential path traversal detected`,
      field: name,
    });
  }
  if (/[\n\r\t]/.test(value)) {
    throw new ApiError({
      type: 'validation',
      message: `Invalid path parameter ${name}: contains control characters`,
      field: name,
    });
  }
}

/**
 * Substitute `{name}` placeholders in a path template.
 * Every placeholder must be supplied; values are percent-encoded.
 *
 * @example buildPath('/v2/accounts/{account_id}/messages', { account_id: 'abc' })
 * // '/v2/accounts/abc/messages'
 */
export function buildPath(template: string, params: Record<string, string> = {}): string {
  for (const match of template.matchAll(PATH_PARAM_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !(name in params)) {
      throw new ApiError({
        type: 'validation',
        message: `Missing required path parameter: ${name}`,
        field: name,
      });
    }
  }

  return template.replace(PATH_PARAM_PATTERN, (placeholder: string, name: string) => {
    const value = params[name];
    if (value === undefined) {
      return placeholder;
    }
    validatePathParam(name, value);
    return encodeURIComponent(value);
  });
}
