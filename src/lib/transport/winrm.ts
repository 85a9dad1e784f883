import { runPowershell } from 'winrm-client';

import { PowerShellParseError } from '@/lib/powershell/powershell';

export type WinrmRunner = typeof runPowershell;

export type WinrmOptions = {
  port: number;
  useHttps: boolean;
  rejectUnauthorized: boolean;
  timeoutMs: number;
  username: string;
  password: string;
};

export type WinrmCredentialInput = {
  username: string;
  password: string;
  domain?: string;
  scheme?: 'http' | 'https';
  port?: number;
  tlsVerify?: boolean;
  timeoutMs: number;
};

export function defaultWinrmPort(scheme: 'http' | 'https'): number {
  return scheme === 'https' ? 5986 : 5985;
}

export function buildWinrmOptions(input: WinrmCredentialInput): WinrmOptions {
  const rawUsername = input.username.trim();
  const password = input.password.trim();
  if (!rawUsername) throw new Error('invalid config: missing winrm username');
  if (!password) throw new Error('invalid config: missing winrm password');

  const scheme = input.scheme ?? 'http';
  const domain = input.domain?.trim();
  // winrm-client picks NTLM for DOMAIN\user and Basic otherwise.
  const username = domain ? `${domain}\\${rawUsername}` : rawUsername;

  return {
    port: input.port ?? defaultWinrmPort(scheme),
    useHttps: scheme === 'https',
    rejectUnauthorized: input.tlsVerify ?? true,
    timeoutMs: input.timeoutMs,
    username,
    password,
  };
}

function timeoutError(timeoutMs: number): Error {
  const err = new Error(`timeout after ${timeoutMs}ms`);
  err.name = 'TimeoutError';
  return err;
}

function abortError(): Error {
  const err = new Error('winrm request aborted');
  err.name = 'AbortError';
  return err;
}

/** winrm-client takes no signal, so the caller stops waiting instead of cancelling the shell. */
function withDeadline<T>(promise: Promise<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(abortError());
    };
    const timeout =
      Number.isFinite(timeoutMs) && timeoutMs > 0
        ? setTimeout(() => {
            cleanup();
            reject(timeoutError(timeoutMs));
          }, timeoutMs)
        : undefined;
    const cleanup = () => {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (v) => {
        cleanup();
        resolve(v);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

function stripUtf8Bom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export async function runWinrmJson(args: {
  host: string;
  script: string;
  opts: WinrmOptions;
  signal?: AbortSignal;
  run?: WinrmRunner;
}): Promise<unknown> {
  const { host, script, opts } = args;
  const run = args.run ?? runPowershell;
  if (args.signal?.aborted) throw abortError();
  const text = await withDeadline(
    run(script, host, opts.username, opts.password, opts.port, opts.useHttps, opts.rejectUnauthorized),
    opts.timeoutMs,
    args.signal,
  );

  try {
    return JSON.parse(stripUtf8Bom(text).trim()) as unknown;
  } catch {
    throw new PowerShellParseError('winrm output is not valid json', { stdout: text.slice(0, 2000), stderr: '' });
  }
}
