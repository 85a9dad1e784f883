import { buildEvidenceScript } from '@/lib/evidence/evidence-script';
import { createEvidenceFacilities, parseHostEvidence } from '@/lib/evidence/evidence';
import { runPowerShellJson } from '@/lib/powershell/powershell';
import { probeHost } from '@/lib/probe/host-probe';

import type { ProbeAgentDeps } from './handler';
import type { ProductProfile } from '@/lib/probe/product-profile';
import type { PowerShellRunner } from '@/lib/transport/transports';

/** Probes the machine the agent runs on. PowerShell and evidence errors propagate to the handler. */
export function createLocalProbe(opts: {
  profile: ProductProfile;
  powershellExe: string;
  timeoutMs: number;
  run?: PowerShellRunner;
}): ProbeAgentDeps['probe'] {
  const run = opts.run ?? runPowerShellJson;
  const script = buildEvidenceScript(opts.profile);

  return async (input) => {
    const raw = await run({ powershellExe: opts.powershellExe, script, timeoutMs: opts.timeoutMs });
    return probeHost(createEvidenceFacilities(parseHostEvidence(raw)), {
      host: input.host_identifier,
      minimumVersion: input.minimum_version,
      profile: opts.profile,
    });
  };
}
