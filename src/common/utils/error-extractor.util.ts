import { ApiError } from '../errors/api.errors.js';

export class ErrorExtractor {
  public static extractErrorMessage(error: unknown): string {
    if (error instanceof ApiError) {
      return error.message;
    }
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    return 'Unknown error';
  }

  /**
   * Aborts raised by axios (`CanceledError`) or by fetch-style APIs (`AbortError`)
   */
  public static isAbortError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }

    if (error.name === 'CanceledError' || error.name === 'AbortError') {
      return true;
    }

    return this.extractNetworkErrorCode(error) === 'ERR_CANCELED';
  }

  private static extractNetworkErrorCode(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
      return error.code;
    }

    // Check cause for wrapped errors
    const { cause } = error;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
      return cause.code;
    }

    return undefined;
  }
}
