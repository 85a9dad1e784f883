import { EvidenceParseError } from '@/lib/evidence/evidence';
import { errorMessage, isAppError } from '@/lib/errors/error';
import { PowerShellExecError, PowerShellParseError } from '@/lib/powershell/powershell';

import type { AppError } from '@/lib/errors/error';

/** A host could not be probed at all; the record for it is skipped or replaced by a placeholder. */
export class TransportError extends Error {
  readonly appError: AppError;

  constructor(appError: AppError) {
    super(appError.message);
    this.name = 'TransportError';
    this.appError = appError;
  }
}

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

function isTimeoutLike(err: unknown, lower: string): boolean {
  if (err instanceof PowerShellExecError && err.timedOut) return true;
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) return true;
  return lower.includes('timed out') || lower.includes('timeout');
}

/**
 * Classifies whatever a transport threw. Matching is on the message text because WinRM
 * and PowerShell surface failures only as error strings.
 */
export function toTransportError(err: unknown, stage: string): TransportError {
  if (err instanceof TransportError) return err;
  if (isAppError(err)) return new TransportError(err);

  const cause = errorMessage(err);
  const stderr = err instanceof PowerShellExecError ? err.stderr : '';
  const lower = `${cause}\n${stderr}`.toLowerCase();
  const stderrContext: Record<string, string> = stderr ? { stderr_excerpt: excerpt(stderr) } : {};

  if (err instanceof EvidenceParseError || err instanceof PowerShellParseError) {
    return new TransportError({
      code: 'TRANSPORT_BAD_RESPONSE',
      category: 'parse',
      message: 'host returned unreadable evidence',
      retryable: false,
      redacted_context: { stage, cause },
    });
  }

  if (isTimeoutLike(err, lower)) {
    return new TransportError({
      code: 'TRANSPORT_TIMEOUT',
      category: 'network',
      message: 'host request timed out',
      retryable: true,
      redacted_context: { stage, cause },
    });
  }

  if (lower.includes('enoent') || lower.includes('failed to start') || lower.includes('invalid config')) {
    return new TransportError({
      code: 'TRANSPORT_CONFIG_INVALID',
      category: 'config',
      message: 'transport is misconfigured',
      retryable: false,
      redacted_context: { stage, cause, ...stderrContext },
    });
  }

  if (
    lower.includes('access is denied') ||
    lower.includes('accessdenied') ||
    lower.includes('unauthorizedaccess') ||
    lower.includes('failed to process the request: 403')
  ) {
    return new TransportError({
      code: 'TRANSPORT_PERMISSION_DENIED',
      category: 'permission',
      message: 'permission denied on host',
      retryable: false,
      redacted_context: { stage, cause, ...stderrContext },
    });
  }

  if (
    lower.includes('logon failure') ||
    lower.includes('authentication failed') ||
    lower.includes('unauthorized') ||
    lower.includes('kerberos') ||
    lower.includes('failed to process the request: 401') ||
    lower.includes('createshell failed with status 401') ||
    lower.includes('command failed with status 401')
  ) {
    return new TransportError({
      code: 'TRANSPORT_AUTH_FAILED',
      category: 'auth',
      message: 'authentication failed',
      retryable: false,
      redacted_context: { stage, cause, ...stderrContext },
    });
  }

  if (
    lower.includes('winrm cannot complete') ||
    lower.includes('cannot find the computer') ||
    lower.includes('econnrefused') ||
    lower.includes('ehostunreach') ||
    lower.includes('enotfound') ||
    lower.includes('network path')
  ) {
    return new TransportError({
      code: 'TRANSPORT_NETWORK_ERROR',
      category: 'network',
      message: 'host unreachable over transport',
      retryable: true,
      redacted_context: { stage, cause, ...stderrContext },
    });
  }

  return new TransportError({
    code: 'TRANSPORT_EXEC_FAILED',
    category: 'unknown',
    message: 'remote execution failed',
    retryable: false,
    redacted_context: { stage, cause, ...stderrContext },
  });
}
