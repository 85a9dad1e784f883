export type LogLevel = 'info' | 'warn' | 'error';
export type ServiceName = 'cli' | 'collector' | 'probe-agent';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

export type LogSink = (event: LogEventInput) => void;

const EXCERPT_LIMIT = 2000;

function getEnv() {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'development';
}

function getVersion() {
  return process.env.VERSION_AUDIT_BUILD_SHA ?? process.env.GIT_SHA ?? 'unknown';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!isRecord(input)) return input;

  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

export function formatLogEvent(input: LogEventInput): string {
  const base = {
    ts: new Date().toISOString(),
    env: getEnv(),
    version: getVersion(),
    ...input,
  };

  return JSON.stringify(truncateExcerptsDeep(base));
}

export function logEvent(input: LogEventInput) {
  console.log(formatLogEvent(input));
}

/** For commands whose stdout carries data. */
export function logEventToStderr(input: LogEventInput) {
  console.error(formatLogEvent(input));
}
