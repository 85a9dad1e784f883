import type { ErrorCodeType } from '@/lib/errors/error-codes';

/**
 * JSON value type for error context. Kept plain so records and errors can cross the
 * agent HTTP boundary unchanged.
 */
export type JsonValue = string | number | boolean | null | { [key: string]: JsonValue } | JsonValue[];

export type ErrorCategory = 'auth' | 'permission' | 'config' | 'network' | 'parse' | 'schema' | 'unknown';

export type ErrorDetail = {
  field?: string;
  issue?: string;
  message?: string;
};

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, JsonValue>;
  details?: ErrorDetail[];
};

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  // Minimal structural check; we don't validate codes here to avoid circular deps on constants.
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

export function toPublicError(err: unknown): AppError {
  if (isAppError(err)) return err;
  return { code: 'INTERNAL_ERROR', category: 'unknown', message: 'Internal error', retryable: false };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
