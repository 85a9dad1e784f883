import { isAuthorized } from './auth';

import { EvidenceParseError } from '@/lib/evidence/evidence';
import { PowerShellExecError, PowerShellParseError } from '@/lib/powershell/powershell';
import { isWellFormedVersion } from '@/lib/version/version-comparator';

import type { ProbeAgentLogger } from './logger';
import type { VersionRecord } from '@/lib/probe/types';

export type ProbeRequest = {
  host_identifier: string;
  minimum_version: string;
};

export type ProbeAgentDeps = {
  probe: (input: ProbeRequest) => Promise<VersionRecord>;
};

type AgentOk<T> = { ok: true; data: T };
type AgentErr = { ok: false; error: { code: string; message: string; context?: Record<string, unknown> } };

type Outcome = 'success' | 'auth_failed' | 'invalid_request' | 'permission_denied' | 'ps_error' | 'internal_error';

function json(status: number, body: AgentOk<unknown> | AgentErr): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function nonEmptyString(v: unknown): string | null {
  if (typeof v !== 'string') return null;
  const t = v.trim();
  return t.length > 0 ? t : null;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

function looksLikePermissionDenied(text: string): boolean {
  const lower = text.toLowerCase();
  return (
    lower.includes('access is denied') ||
    lower.includes('unauthorizedaccessexception') ||
    lower.includes('e_accessdenied')
  );
}

function invalidRequest(message: string, context?: Record<string, unknown>): AgentErr {
  return { ok: false, error: { code: 'AGENT_INVALID_REQUEST', message, ...(context ? { context } : {}) } };
}

export function parseProbeRequest(raw: unknown): { ok: true; value: ProbeRequest } | { ok: false; error: AgentErr } {
  if (!isRecord(raw)) return { ok: false, error: invalidRequest('invalid request body') };

  const host_identifier = nonEmptyString(raw.host_identifier);
  const minimum_version = nonEmptyString(raw.minimum_version);

  if (!host_identifier || !minimum_version) {
    return {
      ok: false,
      error: invalidRequest('missing required fields', {
        missing: [...(host_identifier ? [] : ['host_identifier']), ...(minimum_version ? [] : ['minimum_version'])],
      }),
    };
  }

  if (!isWellFormedVersion(minimum_version)) {
    return { ok: false, error: invalidRequest('malformed minimum_version', { minimum_version }) };
  }

  return { ok: true, value: { host_identifier, minimum_version } };
}

function toFailure(err: unknown, requestId: string | null): { status: number; outcome: Outcome; body: AgentErr } {
  const base = requestId ? { request_id: requestId } : {};

  if (err instanceof PowerShellExecError) {
    const permissionDenied = looksLikePermissionDenied(`${err.stderr}\n${err.stdout}`);
    return {
      status: permissionDenied ? 403 : 500,
      outcome: permissionDenied ? 'permission_denied' : 'ps_error',
      body: {
        ok: false,
        error: {
          code: permissionDenied ? 'AGENT_PERMISSION_DENIED' : 'AGENT_PS_ERROR',
          message: permissionDenied ? 'permission denied' : err.message,
          context: {
            ...base,
            exit_code: err.exitCode,
            timed_out: err.timedOut,
            stderr_excerpt: excerpt(err.stderr),
            stdout_excerpt: excerpt(err.stdout),
          },
        },
      },
    };
  }

  if (err instanceof PowerShellParseError || err instanceof EvidenceParseError) {
    return {
      status: 500,
      outcome: 'ps_error',
      body: {
        ok: false,
        error: { code: 'AGENT_PS_ERROR', message: 'powershell output is not valid evidence', context: { ...base, cause: err.message } },
      },
    };
  }

  return {
    status: 500,
    outcome: 'internal_error',
    body: {
      ok: false,
      error: {
        code: 'AGENT_INTERNAL',
        message: 'internal error',
        context: { ...base, cause: err instanceof Error ? err.message : String(err) },
      },
    },
  };
}

export function createHandler(config: {
  token: string;
  deps: ProbeAgentDeps;
  logger: ProbeAgentLogger;
  now?: () => number;
}) {
  const now = config.now ?? Date.now;

  return async function handler(req: Request): Promise<Response> {
    const startedAt = now();
    const url = new URL(req.url);
    const path = url.pathname;
    const requestId = req.headers.get('x-request-id') ?? null;

    const finish = (res: Response, outcome: Outcome, extra: Record<string, unknown> = {}) => {
      const event = {
        event_type: 'agent.request',
        method: req.method,
        path,
        ...(requestId ? { request_id: requestId } : {}),
        status_code: res.status,
        outcome,
        duration_ms: now() - startedAt,
        ...extra,
      };
      if (outcome === 'success') config.logger.info(event);
      else config.logger.error(event);
      return res;
    };

    if (path === '/health') {
      if (req.method !== 'GET') {
        return finish(json(405, invalidRequest('method not allowed')), 'invalid_request');
      }
      return finish(json(200, { ok: true, data: { service: 'probe-agent', ts: new Date().toISOString() } }), 'success');
    }

    if (path !== '/v1/probe') {
      return finish(json(404, invalidRequest('not found')), 'invalid_request');
    }

    if (req.method !== 'POST') {
      return finish(json(405, invalidRequest('method not allowed')), 'invalid_request');
    }

    if (!isAuthorized(req.headers, config.token)) {
      return finish(
        json(401, {
          ok: false,
          error: {
            code: 'AGENT_PERMISSION_DENIED',
            message: 'unauthorized',
            context: { path, ...(requestId ? { request_id: requestId } : {}) },
          },
        }),
        'auth_failed',
      );
    }

    let raw: unknown;
    try {
      raw = await req.json();
    } catch {
      return finish(json(400, invalidRequest('invalid json')), 'invalid_request');
    }

    const parsed = parseProbeRequest(raw);
    if (!parsed.ok) return finish(json(400, parsed.error), 'invalid_request');

    try {
      const record = await config.deps.probe(parsed.value);
      return finish(json(200, { ok: true, data: record }), 'success', {
        host_identifier: record.host_identifier,
        install_check: record.install_check,
        validation_passed: record.validation_passed,
      });
    } catch (err) {
      const failure = toFailure(err, requestId);
      return finish(json(failure.status, failure.body), failure.outcome, { error_code: failure.body.error.code });
    }
  };
}
