import { describe, expect, it, vi } from 'vitest';

import { loadAuditEnv } from '@/lib/env/audit-env';

describe('loadAuditEnv', () => {
  it('applies defaults', () => {
    const env = loadAuditEnv({});
    expect(env.VERSION_AUDIT_TRANSPORT).toBe('remoting');
    expect(env.VERSION_AUDIT_CONCURRENCY).toBe(8);
    expect(env.VERSION_AUDIT_HOST_TIMEOUT_MS).toBe(120_000);
    expect(env.VERSION_AUDIT_ON_TRANSPORT_ERROR).toBe('skip');
    expect(env.VERSION_AUDIT_AGENT_PORT).toBe(8787);
    expect(env.VERSION_AUDIT_MIN_VERSION).toBeUndefined();
  });

  it('coerces numbers and treats empty strings as unset', () => {
    const env = loadAuditEnv({
      VERSION_AUDIT_CONCURRENCY: '3',
      VERSION_AUDIT_TRANSPORT: 'agent',
      VERSION_AUDIT_AGENT_TOKEN: '',
      VERSION_AUDIT_MIN_VERSION: '2.9.7653.47581',
    });
    expect(env.VERSION_AUDIT_CONCURRENCY).toBe(3);
    expect(env.VERSION_AUDIT_TRANSPORT).toBe('agent');
    expect(env.VERSION_AUDIT_AGENT_TOKEN).toBeUndefined();
    expect(env.VERSION_AUDIT_MIN_VERSION).toBe('2.9.7653.47581');
  });

  it('reads WinRM settings', () => {
    const env = loadAuditEnv({
      VERSION_AUDIT_WINRM_USERNAME: 'auditor',
      VERSION_AUDIT_WINRM_PASSWORD: 'test-secret',
      VERSION_AUDIT_WINRM_SCHEME: 'https',
      VERSION_AUDIT_WINRM_PORT: '15986',
      VERSION_AUDIT_WINRM_TLS_VERIFY: 'false',
    });
    expect(env.VERSION_AUDIT_WINRM_USERNAME).toBe('auditor');
    expect(env.VERSION_AUDIT_WINRM_SCHEME).toBe('https');
    expect(env.VERSION_AUDIT_WINRM_PORT).toBe(15986);
    expect(env.VERSION_AUDIT_WINRM_TLS_VERIFY).toBe(false);
    expect(loadAuditEnv({}).VERSION_AUDIT_WINRM_TLS_VERIFY).toBe(true);
  });

  it('rejects invalid values', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => loadAuditEnv({ VERSION_AUDIT_CONCURRENCY: '0' })).toThrow();
    expect(() => loadAuditEnv({ VERSION_AUDIT_TRANSPORT: 'ssh' })).toThrow();
    spy.mockRestore();
  });
});
