import { describe, expect, it } from 'vitest';

import { createLocalProbe } from './probe';

import { PowerShellExecError } from '@/lib/powershell/powershell';
import { FSLOGIX_APPS_PROFILE } from '@/lib/probe/product-profile';

import type { PowerShellRunOptions } from '@/lib/powershell/powershell';

describe('createLocalProbe', () => {
  it('runs the evidence script and probes with the requested identity', async () => {
    const calls: PowerShellRunOptions[] = [];
    const probe = createLocalProbe({
      profile: FSLOGIX_APPS_PROFILE,
      powershellExe: 'pwsh',
      timeoutMs: 5000,
      run: async (opts) => {
        calls.push(opts);
        return { schema_version: 'host-evidence-v1', installer_entries: { ok: true, value: [] } };
      },
    });

    const record = await probe({ host_identifier: 'host-a', minimum_version: '2.9.7653.47581' });

    expect(record.host_identifier).toBe('host-a');
    expect(record.install_check).toBe('NotInstalled');
    expect(calls).toHaveLength(1);
    expect(calls[0]?.powershellExe).toBe('pwsh');
    expect(calls[0]?.timeoutMs).toBe(5000);
    expect(calls[0]?.script).toContain("$pattern = '*FSLogix Apps*'");
  });

  it('lets PowerShell failures reach the handler', async () => {
    const probe = createLocalProbe({
      profile: FSLOGIX_APPS_PROFILE,
      powershellExe: 'pwsh',
      timeoutMs: 5000,
      run: async () => {
        throw new PowerShellExecError('powershell timed out', { exitCode: -1, stdout: '', stderr: '', timedOut: true });
      },
    });

    await expect(probe({ host_identifier: 'host-a', minimum_version: '2.9.7653.47581' })).rejects.toBeInstanceOf(
      PowerShellExecError,
    );
  });
});
