import { describe, it, expect } from '@jest/globals';
import { AxiosError, CanceledError } from 'axios';
import { ErrorExtractor } from '../../../src/common/utils/error-extractor.util.js';
import { ApiError } from '../../../src/common/errors/api.errors.js';

describe('ErrorExtractor', () => {
  describe('extractErrorMessage', () => {
    it('should read messages from errors and strings', () => {
      expect(ErrorExtractor.extractErrorMessage(new ApiError({ type: 'server', message: 'down' }))).toBe('down');
      expect(ErrorExtractor.extractErrorMessage(new Error('boom'))).toBe('boom');
      expect(ErrorExtractor.extractErrorMessage('plain')).toBe('plain');
      expect(ErrorExtractor.extractErrorMessage(42)).toBe('Unknown error');
    });
  });

  describe('isAbortError', () => {
    it('should recognise axios cancellations', () => {
      expect(ErrorExtractor.isAbortError(new CanceledError())).toBe(true);
      expect(ErrorExtractor.isAbortError(new AxiosError('canceled', AxiosError.ERR_CANCELED))).toBe(true);
    });

    it('should recognise a wrapped abort code', () => {
      const error = new Error('request failed', { cause: { code: 'ERR_CANCELED' } });

      expect(ErrorExtractor.isAbortError(error)).toBe(true);
    });

    it('should not treat connection failures as aborts', () => {
      expect(ErrorExtractor.isAbortError(new AxiosError('connect ECONNRESET', 'ECONNRESET'))).toBe(false);
      expect(ErrorExtractor.isAbortError('AbortError')).toBe(false);
    });
  });
});
