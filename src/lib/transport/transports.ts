import { buildEvidenceScript } from '@/lib/evidence/evidence-script';
import { createEvidenceFacilities, parseHostEvidence } from '@/lib/evidence/evidence';
import { probeHost } from '@/lib/probe/host-probe';
import { listSourceNames } from '@/lib/probe/product-profile';
import { restoreVersionRecord } from '@/lib/probe/version-record';
import { runPowerShellJson } from '@/lib/powershell/powershell';
import { postAgentJson } from '@/lib/transport/agent-client';
import { toTransportError, TransportError } from '@/lib/transport/transport-error';
import { runWinrmJson } from '@/lib/transport/winrm';

import type { PowerShellRunOptions } from '@/lib/powershell/powershell';
import type { ProductProfile } from '@/lib/probe/product-profile';
import type { VersionRecord } from '@/lib/probe/types';
import type { WinrmOptions, WinrmRunner } from '@/lib/transport/winrm';

export type TransportKind = 'local' | 'remoting' | 'agent';

/** Runs the probe on `host` and returns its finalized record; rejects with `TransportError`. */
export type ExecuteRemote = (host: string, minimumVersion: string, signal: AbortSignal) => Promise<VersionRecord>;

export type PowerShellRunner = (opts: PowerShellRunOptions) => Promise<unknown>;

export type PowerShellTransportOptions = {
  profile: ProductProfile;
  timeoutMs: number;
  powershellExe?: string;
  run?: PowerShellRunner;
};

export type RemotingTransportOptions = {
  profile: ProductProfile;
  winrm: WinrmOptions;
  run?: WinrmRunner;
};

export type AgentTransportOptions = {
  profile: ProductProfile;
  token: string;
  port: number;
  scheme?: 'http' | 'https';
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

async function probeFromEvidence(raw: unknown, host: string, minimumVersion: string, profile: ProductProfile) {
  const facilities = createEvidenceFacilities(parseHostEvidence(raw));
  return probeHost(facilities, { host, minimumVersion, profile });
}

/** Probes the machine the audit runs on, whatever the host identifier says. */
export function createLocalTransport(opts: PowerShellTransportOptions): ExecuteRemote {
  const run = opts.run ?? runPowerShellJson;
  const script = buildEvidenceScript(opts.profile);

  return async (host, minimumVersion, signal) => {
    try {
      const raw = await run({ powershellExe: opts.powershellExe, script, timeoutMs: opts.timeoutMs, signal });
      return await probeFromEvidence(raw, host, minimumVersion, opts.profile);
    } catch (err) {
      throw toTransportError(err, 'transport.local');
    }
  };
}

/** Runs the evidence script on each host over WinRM (winrm-client). */
export function createRemotingTransport(opts: RemotingTransportOptions): ExecuteRemote {
  const script = buildEvidenceScript(opts.profile);

  return async (host, minimumVersion, signal) => {
    try {
      const raw = await runWinrmJson({ host, script, opts: opts.winrm, signal, run: opts.run });
      return await probeFromEvidence(raw, host, minimumVersion, opts.profile);
    } catch (err) {
      throw toTransportError(err, 'transport.remoting');
    }
  };
}

export function createAgentTransport(opts: AgentTransportOptions): ExecuteRemote {
  const sourceNames = listSourceNames(opts.profile);
  const scheme = opts.scheme ?? 'http';

  return async (host, minimumVersion, signal) => {
    const baseUrl = `${scheme}://${host}:${opts.port}`;
    const data = await postAgentJson(
      { baseUrl, token: opts.token, timeoutMs: opts.timeoutMs, signal, fetchImpl: opts.fetchImpl },
      '/v1/probe',
      { host_identifier: host, minimum_version: minimumVersion },
      'transport.agent.probe',
    );

    let record: VersionRecord;
    try {
      record = restoreVersionRecord(data, sourceNames);
    } catch (err) {
      throw new TransportError({
        code: 'TRANSPORT_BAD_RESPONSE',
        category: 'parse',
        message: 'agent returned an invalid record',
        retryable: false,
        redacted_context: { stage: 'transport.agent.probe', host, cause: err instanceof Error ? err.message : String(err) },
      });
    }

    if (record.host_identifier !== host || record.minimum_version !== minimumVersion) {
      throw new TransportError({
        code: 'TRANSPORT_BAD_RESPONSE',
        category: 'parse',
        message: 'agent answered for a different request',
        retryable: false,
        redacted_context: {
          stage: 'transport.agent.probe',
          host,
          returned_host: record.host_identifier,
          returned_minimum: record.minimum_version,
        },
      });
    }
    return record;
  };
}
