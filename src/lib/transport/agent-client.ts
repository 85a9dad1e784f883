import { TransportError } from '@/lib/transport/transport-error';

import type { AppError, JsonValue } from '@/lib/errors/error';

type AgentOkResponse<T> = { ok: true; data: T };
type AgentErrResponse = {
  ok: false;
  error: { code: string; message: string; context?: Record<string, JsonValue> };
};
type AgentResponse<T> = AgentOkResponse<T> | AgentErrResponse;

export type ProbeAgentClientOptions = {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  requestId?: string;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
};

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isAgentResponse(value: unknown): value is AgentResponse<unknown> {
  if (!isRecord(value) || typeof value.ok !== 'boolean') return false;
  return value.ok ? 'data' in value : true;
}

function toNetworkError(input: { stage: string; url: string; cause: string; timeout: boolean }): AppError {
  return {
    code: input.timeout ? 'TRANSPORT_TIMEOUT' : 'TRANSPORT_NETWORK_ERROR',
    category: 'network',
    message: input.timeout ? 'agent request timed out' : 'agent unreachable',
    retryable: true,
    redacted_context: { stage: input.stage, url: input.url, cause: input.cause },
  };
}

function toBadResponseError(input: {
  stage: string;
  url: string;
  status: number;
  bodyExcerpt?: string;
  cause?: string;
}): AppError {
  return {
    code: 'TRANSPORT_BAD_RESPONSE',
    category: 'parse',
    message: 'agent bad response',
    retryable: false,
    redacted_context: {
      stage: input.stage,
      url: input.url,
      status: input.status,
      ...(input.bodyExcerpt ? { body_excerpt: input.bodyExcerpt } : {}),
      ...(input.cause ? { cause: input.cause } : {}),
    },
  };
}

function toStatusError(
  kind: 'auth' | 'permission',
  input: { stage: string; url: string; status: number; bodyExcerpt?: string },
): AppError {
  return {
    code: kind === 'auth' ? 'TRANSPORT_AUTH_FAILED' : 'TRANSPORT_PERMISSION_DENIED',
    category: kind,
    message: kind === 'auth' ? 'agent authentication failed' : 'agent permission denied',
    retryable: false,
    redacted_context: {
      stage: input.stage,
      url: input.url,
      status: input.status,
      ...(input.bodyExcerpt ? { body_excerpt: input.bodyExcerpt } : {}),
    },
  };
}

function toAgentReportedError(input: {
  stage: string;
  url: string;
  status: number;
  agentCode: string;
  agentMessage: string;
  agentContext?: Record<string, JsonValue>;
}): AppError {
  const context = {
    stage: input.stage,
    url: input.url,
    status: input.status,
    agent_code: input.agentCode,
    ...(input.agentContext ? { agent_context: input.agentContext } : {}),
  };

  switch (input.agentCode) {
    case 'AGENT_INVALID_REQUEST':
      return { code: 'TRANSPORT_CONFIG_INVALID', category: 'config', message: 'agent rejected request', retryable: false, redacted_context: context };
    case 'AGENT_PERMISSION_DENIED':
      return { code: 'TRANSPORT_PERMISSION_DENIED', category: 'permission', message: 'agent permission denied', retryable: false, redacted_context: context };
    case 'AGENT_PS_ERROR':
      return {
        code: 'TRANSPORT_EXEC_FAILED',
        category: 'unknown',
        message: 'agent powershell failed',
        retryable: false,
        redacted_context: { ...context, agent_message_excerpt: excerpt(input.agentMessage, 200) },
      };
    default:
      return { code: 'TRANSPORT_EXEC_FAILED', category: 'unknown', message: 'agent request failed', retryable: false, redacted_context: context };
  }
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) return value.map((v) => toJsonValue(v) ?? null);
  if (!isRecord(value)) return undefined;
  const out: Record<string, JsonValue> = {};
  for (const [key, v] of Object.entries(value)) {
    const json = toJsonValue(v);
    if (json !== undefined) out[key] = json;
  }
  return out;
}

function toJsonContext(value: unknown): Record<string, JsonValue> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, JsonValue> = {};
  for (const [key, v] of Object.entries(value)) {
    const json = toJsonValue(v);
    if (json !== undefined) out[key] = json;
  }
  return out;
}

/**
 * POSTs JSON to a probe agent and unwraps its `{ ok, data }` envelope. Every failure is
 * thrown as a `TransportError`.
 */
export async function postAgentJson(
  opts: ProbeAgentClientOptions,
  path: string,
  body: unknown,
  stage: string,
): Promise<unknown> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const url = new URL(path, opts.baseUrl).toString();

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);
  const onAbort = () => controller.abort();
  if (opts.signal?.aborted) controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  let res: Response;
  let text = '';
  try {
    res = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${opts.token}`,
        ...(opts.requestId ? { 'x-request-id': opts.requestId } : {}),
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    text = await res.text();
  } catch (err) {
    const cause = err instanceof Error ? err.message : String(err);
    const timeoutLike = err instanceof Error && err.name === 'AbortError';
    throw new TransportError(toNetworkError({ stage, url, cause, timeout: timeoutLike }));
  } finally {
    clearTimeout(timeout);
    opts.signal?.removeEventListener('abort', onAbort);
  }

  const bodyExcerpt = text ? excerpt(text) : undefined;
  const status = res.status;

  // Prefer mapping auth errors even if body isn't valid JSON.
  if (status === 401) throw new TransportError(toStatusError('auth', { stage, url, status, bodyExcerpt }));
  if (status === 403) throw new TransportError(toStatusError('permission', { stage, url, status, bodyExcerpt }));

  let parsed: unknown = null;
  try {
    parsed = text ? (JSON.parse(text) as unknown) : null;
  } catch (err) {
    const cause = err instanceof Error ? err.message : String(err);
    throw new TransportError(toBadResponseError({ stage, url, status, bodyExcerpt, cause }));
  }

  if (!isAgentResponse(parsed)) {
    throw new TransportError(toBadResponseError({ stage, url, status, bodyExcerpt }));
  }

  if (parsed.ok) return parsed.data;

  const agentErr: unknown = parsed.error;
  throw new TransportError(
    toAgentReportedError({
      stage,
      url,
      status,
      agentCode: isRecord(agentErr) && typeof agentErr.code === 'string' ? agentErr.code : 'AGENT_INTERNAL',
      agentMessage: isRecord(agentErr) && typeof agentErr.message === 'string' ? agentErr.message : 'agent error',
      agentContext: isRecord(agentErr) ? toJsonContext(agentErr.context) : undefined,
    }),
  );
}
