import { describe, it, expect, vi } from 'vitest';
import { toUserFriendlyError } from '../src/utils/userErrors';
import { PipelineError, isAbortError, toPipelineError } from '../src/utils/errorHandler';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

describe('toUserFriendlyError', () => {
  it('should prefer the message for a known error code', () => {
    const error = new PipelineError('GET /health ECONNREFUSED 127.0.0.1:8100', 'MODEL_UNAVAILABLE', 503);

    expect(toUserFriendlyError(error)).toBe('The face model service is not available right now. Please try again later.');
  });

  it.each([
    ['connect ECONNREFUSED 10.0.0.1:443', 'Unable to connect to the service. Please try again later.'],
    ['timeout of 15000ms exceeded', 'The request timed out. Please try again.'],
    ['Request failed with status code 429', 'Too many requests. Please wait a moment and try again.'],
    ['Input buffer contains unsupported image format', 'That link does not point to a supported image.'],
  ])('should map "%s"', (message, expected) => {
    expect(toUserFriendlyError(new Error(message))).toBe(expected);
  });

  it('should pass validation messages through', () => {
    const error = new PipelineError('Invalid image URL: ftp://example.com/a.jpg', 'INVALID_INPUT', 400);

    expect(toUserFriendlyError(error)).toBe('Invalid image URL: ftp://example.com/a.jpg.');
  });

  it('should hide technical detail it does not recognise', () => {
    expect(toUserFriendlyError(new Error('Cannot read properties of undefined (reading \'x\') at src/a.ts:12'))).toBe(
      'An unexpected error occurred. Please try again later.'
    );
  });
});

describe('isAbortError', () => {
  it('should recognise cancellation from every source', () => {
    const domAbort = new Error('This operation was aborted');
    domAbort.name = 'AbortError';
    const axiosCancel = Object.assign(new Error('canceled'), { code: 'ERR_CANCELED' });

    expect(isAbortError(domAbort)).toBe(true);
    expect(isAbortError(axiosCancel)).toBe(true);
    expect(isAbortError(new PipelineError('stop', 'TRANSFORM_CANCELLED', 499))).toBe(true);
    expect(isAbortError(new PipelineError('bad', 'TRANSFORM_FAILED'))).toBe(false);
    expect(isAbortError('aborted')).toBe(false);
  });
});

describe('toPipelineError', () => {
  it('should keep a PipelineError and wrap anything else', () => {
    const original = new PipelineError('gone', 'SOURCE_UNAVAILABLE', 502);
    const wrapped = toPipelineError(new Error('boom'), 'TRANSFORM_FAILED');

    expect(toPipelineError(original, 'TRANSFORM_FAILED')).toBe(original);
    expect(wrapped).toMatchObject({ code: 'TRANSFORM_FAILED', message: 'boom', statusCode: 500 });
    expect(wrapped.toJSON()).toEqual({ name: 'PipelineError', code: 'TRANSFORM_FAILED', message: 'boom', cause: 'boom' });
  });
});
