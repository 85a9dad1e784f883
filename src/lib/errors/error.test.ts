import { describe, expect, it } from 'vitest';

import { ErrorCode } from '@/lib/errors/error-codes';
import { errorMessage, isAppError, toPublicError } from '@/lib/errors/error';

import type { AppError } from '@/lib/errors/error';

describe('toPublicError', () => {
  it('returns INTERNAL_ERROR for unknown input', () => {
    expect(toPublicError('x').code).toBe('INTERNAL_ERROR');
  });

  it('passes through a known AppError', () => {
    const err: AppError = {
      code: ErrorCode.TRANSPORT_TIMEOUT,
      category: 'network',
      message: 'probe timed out',
      retryable: true,
      redacted_context: { host: 'host01' },
    };

    expect(toPublicError(err)).toEqual(err);
  });
});

describe('isAppError', () => {
  it('rejects objects missing retryable', () => {
    expect(isAppError({ code: 'X', category: 'network', message: 'm' })).toBe(false);
  });
});

describe('errorMessage', () => {
  it('uses Error.message and stringifies everything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
