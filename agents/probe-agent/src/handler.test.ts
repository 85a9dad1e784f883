import { describe, expect, it } from 'vitest';

import { createHandler, parseProbeRequest } from './handler';

import { PowerShellExecError, PowerShellParseError } from '@/lib/powershell/powershell';
import { createVersionRecord } from '@/lib/probe/version-record';

import type { ProbeAgentDeps } from './handler';
import type { ProbeAgentLogger } from './logger';

const MIN = '2.9.7653.47581';

describe('probe agent handler', () => {
  function makeLogger(): { logger: ProbeAgentLogger; events: any[] } {
    const events: any[] = [];
    const logger: ProbeAgentLogger = {
      warn: (e) => events.push({ level: 'warn', ...e }),
      info: (e) => events.push({ level: 'info', ...e }),
      error: (e) => events.push({ level: 'error', ...e }),
    };
    return { logger, events };
  }

  const okProbe: ProbeAgentDeps['probe'] = async (input) =>
    createVersionRecord({
      host: input.host_identifier,
      minimumVersion: input.minimum_version,
      installCheck: 'NotInstalled',
      sourceNames: ['installer_version'],
      warnings: [{ code: 'PRODUCT_NOT_INSTALLED', message: 'no matching installer entry' }],
    });

  function probeRequest(body: unknown, token = 'test-secret') {
    return new Request('http://localhost/v1/probe', {
      method: 'POST',
      headers: { 'content-type': 'application/json', authorization: `Bearer ${token}`, 'x-request-id': 'req-1' },
      body: JSON.stringify(body),
    });
  }

  it('serves /health without auth', async () => {
    const { logger, events } = makeLogger();
    const handler = createHandler({ token: 'test-secret', deps: { probe: okProbe }, logger });
    const res = await handler(new Request('http://localhost/health', { method: 'GET' }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as any;
    expect(body.ok).toBe(true);
    expect(body.data.service).toBe('probe-agent');
    expect(typeof body.data.ts).toBe('string');
    expect(events).toHaveLength(1);
    expect(events[0].status_code).toBe(200);
    expect(events[0].outcome).toBe('success');
  });

  it('rejects unauthorized requests', async () => {
    const { logger, events } = makeLogger();
    const handler = createHandler({ token: 'test-secret', deps: { probe: okProbe }, logger });
    const res = await handler(probeRequest({ host_identifier: 'host-a', minimum_version: MIN }, 'wrong'));

    expect(res.status).toBe(401);
    const body = (await res.json()) as any;
    expect(body.error.code).toBe('AGENT_PERMISSION_DENIED');
    expect(events[0].outcome).toBe('auth_failed');
    expect(events[0].request_id).toBe('req-1');
  });

  it('returns the record for the requested host', async () => {
    const { logger, events } = makeLogger();
    const handler = createHandler({ token: 'test-secret', deps: { probe: okProbe }, logger });
    const res = await handler(probeRequest({ host_identifier: 'host-a', minimum_version: MIN }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as any;
    expect(body).toEqual({
      ok: true,
      data: {
        host_identifier: 'host-a',
        validation_passed: false,
        minimum_version: MIN,
        install_check: 'NotInstalled',
        sources: { installer_version: 'Unknown' },
        warnings: [{ code: 'PRODUCT_NOT_INSTALLED', message: 'no matching installer entry' }],
      },
    });
    expect(events[0]).toMatchObject({ level: 'info', outcome: 'success', install_check: 'NotInstalled' });
    expect(JSON.stringify(events[0])).not.toContain('test-secret');
  });

  it('rejects a malformed minimum version', async () => {
    const { logger } = makeLogger();
    const handler = createHandler({ token: 'test-secret', deps: { probe: okProbe }, logger });
    const res = await handler(probeRequest({ host_identifier: 'host-a', minimum_version: 'latest' }));

    expect(res.status).toBe(400);
    const body = (await res.json()) as any;
    expect(body.error).toEqual({
      code: 'AGENT_INVALID_REQUEST',
      message: 'malformed minimum_version',
      context: { minimum_version: 'latest' },
    });
  });

  it('lists missing fields', () => {
    const parsed = parseProbeRequest({ host_identifier: ' ' });
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.error.context).toEqual({ missing: ['host_identifier', 'minimum_version'] });
  });

  it('maps Access is denied to AGENT_PERMISSION_DENIED (403)', async () => {
    const { logger, events } = makeLogger();
    const handler = createHandler({
      token: 'test-secret',
      deps: {
        probe: async () => {
          throw new PowerShellExecError('powershell exited non-zero', { exitCode: 1, stdout: '', stderr: 'Access is denied.' });
        },
      },
      logger,
    });

    const res = await handler(probeRequest({ host_identifier: 'host-a', minimum_version: MIN }));

    expect(res.status).toBe(403);
    const body = (await res.json()) as any;
    expect(body.error.code).toBe('AGENT_PERMISSION_DENIED');
    expect(events[0].outcome).toBe('permission_denied');
    expect(events[0].level).toBe('error');
  });

  it('maps parse errors to AGENT_PS_ERROR', async () => {
    const { logger, events } = makeLogger();
    const handler = createHandler({
      token: 'test-secret',
      deps: {
        probe: async () => {
          throw new PowerShellParseError('powershell output is not valid json', { stdout: 'not-json', stderr: '' });
        },
      },
      logger,
    });

    const res = await handler(probeRequest({ host_identifier: 'host-a', minimum_version: MIN }));

    expect(res.status).toBe(500);
    const body = (await res.json()) as any;
    expect(body.error.code).toBe('AGENT_PS_ERROR');
    expect(events[0].outcome).toBe('ps_error');
    expect(events[0].error_code).toBe('AGENT_PS_ERROR');
  });

  it('answers 404 for unknown paths', async () => {
    const { logger } = makeLogger();
    const handler = createHandler({ token: 'test-secret', deps: { probe: okProbe }, logger });
    const res = await handler(new Request('http://localhost/v1/other', { method: 'POST' }));
    expect(res.status).toBe(404);
  });
});
