import { describe, expect, test } from 'vitest';

import {
  actionableErrorFields,
  asMenderApiError,
  isNotFoundError,
  MenderApiError,
  ValidationError
} from '../../src/errors.js';

describe('actionableErrorFields', () => {
  test('returns retry guidance per code', () => {
    expect(actionableErrorFields('RATE_LIMITED')).toEqual({
      retryable: true,
      fixHint: 'Wait before issuing more requests to the Mender server.',
      suggestedNextToolCalls: []
    });
    expect(actionableErrorFields('AUTH').retryable).toBe(false);
  });

  test('returns independent copies of suggested calls', () => {
    const first = actionableErrorFields('NOT_FOUND');
    const firstArgs = first.suggestedNextToolCalls[0]?.args;
    if (firstArgs) {
      firstArgs.limit = 1;
    }

    expect(actionableErrorFields('NOT_FOUND').suggestedNextToolCalls[0]).toEqual({
      name: 'mender.devices.list',
      args: { limit: 20 }
    });
  });
});

describe('asMenderApiError', () => {
  test('passes Mender errors through', () => {
    const error = new MenderApiError('FORBIDDEN', 'denied', { statusCode: 403 });

    expect(asMenderApiError(error)).toBe(error);
  });

  test('maps aborts to TIMEOUT', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    const mapped = asMenderApiError(abort);
    expect(mapped.code).toBe('TIMEOUT');
    expect(mapped.cause).toBe(abort);
  });

  test('wraps anything else as INTERNAL with a sanitized message', () => {
    const mapped = asMenderApiError(new Error('failed with Bearer abc123'));

    expect(mapped.code).toBe('INTERNAL');
    expect(mapped.message).toBe('Unexpected error: failed with Bearer [TOKEN]');
  });

  test('wraps non-error values', () => {
    expect(asMenderApiError('boom').message).toBe('Unexpected error: boom');
  });
});

test('isNotFoundError checks the HTTP status', () => {
  expect(isNotFoundError(new MenderApiError('NOT_FOUND', 'missing', { statusCode: 404 }))).toBe(true);
  expect(isNotFoundError(new MenderApiError('NOT_FOUND', 'missing'))).toBe(false);
  expect(isNotFoundError(new ValidationError('limit', 'maximum', 'too big'))).toBe(false);
  expect(isNotFoundError(new Error('404'))).toBe(false);
});
