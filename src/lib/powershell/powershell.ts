import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';

export class PowerShellExecError extends Error {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(message: string, input: { exitCode: number | null; stdout: string; stderr: string; timedOut?: boolean }) {
    super(message);
    this.name = 'PowerShellExecError';
    this.exitCode = input.exitCode;
    this.stdout = input.stdout;
    this.stderr = input.stderr;
    this.timedOut = input.timedOut ?? false;
  }
}

export class PowerShellParseError extends Error {
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, input: { stdout: string; stderr: string }) {
    super(message);
    this.name = 'PowerShellParseError';
    this.stdout = input.stdout;
    this.stderr = input.stderr;
  }
}

export type PowerShellRunOptions = {
  powershellExe?: string;
  script: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

function excerpt(text: string, limit = 2000): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

function stripUtf8Bom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** `-EncodedCommand` takes base64 over UTF-16LE. */
export function encodePowerShellCommand(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

export function buildPowerShellArgs(script: string): string[] {
  return ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-EncodedCommand', encodePowerShellCommand(script)];
}

export async function runPowerShell(opts: PowerShellRunOptions): Promise<string> {
  const powershellExe = opts.powershellExe ?? 'powershell.exe';
  if (opts.signal?.aborted) {
    throw new PowerShellExecError('powershell aborted', { exitCode: null, stdout: '', stderr: '' });
  }

  let child: ChildProcessByStdio<null, Readable, Readable>;
  try {
    child = spawn(powershellExe, buildPowerShellArgs(opts.script), { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });
  } catch (err) {
    throw new PowerShellExecError('powershell spawn failed', {
      exitCode: null,
      stdout: '',
      stderr: excerpt(err instanceof Error ? err.message : String(err)),
    });
  }

  let stdout = '';
  let stderr = '';

  child.stdout.on('data', (buf: Buffer) => {
    stdout += buf.toString('utf8');
  });
  child.stderr.on('data', (buf: Buffer) => {
    stderr += buf.toString('utf8');
  });

  let timedOut = false;
  let aborted = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    child.kill('SIGKILL');
  }, opts.timeoutMs);
  const onAbort = () => {
    aborted = true;
    child.kill('SIGKILL');
  };
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  const exit = await new Promise<{ exitCode: number | null; spawnError?: unknown }>((resolve) => {
    let done = false;
    const finish = (value: { exitCode: number | null; spawnError?: unknown }) => {
      if (done) return;
      done = true;
      resolve(value);
    };
    child.on('error', (err) => finish({ exitCode: null, spawnError: err }));
    child.on('close', (code) => finish({ exitCode: code ?? null }));
  });

  clearTimeout(timeout);
  opts.signal?.removeEventListener('abort', onAbort);

  if (exit.spawnError) {
    throw new PowerShellExecError('powershell failed to start', {
      exitCode: null,
      stdout: excerpt(stdout),
      stderr: excerpt(exit.spawnError instanceof Error ? exit.spawnError.message : String(exit.spawnError)),
    });
  }

  if (timedOut) {
    throw new PowerShellExecError('powershell timed out', {
      exitCode: exit.exitCode ?? -1,
      stdout: excerpt(stdout),
      stderr: excerpt(stderr),
      timedOut: true,
    });
  }

  if (aborted) {
    throw new PowerShellExecError('powershell aborted', { exitCode: exit.exitCode, stdout: excerpt(stdout), stderr: excerpt(stderr) });
  }

  if (exit.exitCode !== 0) {
    throw new PowerShellExecError('powershell exited non-zero', {
      exitCode: exit.exitCode,
      stdout: excerpt(stdout),
      stderr: excerpt(stderr),
    });
  }

  return stdout;
}

export async function runPowerShellJson(opts: PowerShellRunOptions): Promise<unknown> {
  const stdout = await runPowerShell(opts);
  try {
    return JSON.parse(stripUtf8Bom(stdout).trim()) as unknown;
  } catch {
    throw new PowerShellParseError('powershell output is not valid json', { stdout: excerpt(stdout), stderr: '' });
  }
}
