import { describe, expect, it } from 'vitest';

import { createEvidenceFacilities, EvidenceParseError, parseHostEvidence } from '@/lib/evidence/evidence';
import { probeHost } from '@/lib/probe/host-probe';
import { FSLOGIX_APPS_PROFILE } from '@/lib/probe/product-profile';
import { SubSourceReadError } from '@/lib/probe/types';

const GOOD = '2.9.7654.46150';

function fullEvidence() {
  return {
    schema_version: 'host-evidence-v1',
    installer_entries: {
      ok: true,
      value: [
        { display_name: 'Microsoft FSLogix Apps', display_version: GOOD, estimated_size: 48000 },
        { display_name: 'Microsoft FSLogix Apps RuleEditor', display_version: '2.9.7654.1', estimated_size: 900 },
      ],
    },
    registry_version: { ok: true, value: GOOD },
    command_output: { ok: true, value: `Service version: ${GOOD}\r\nfrxdrv version: ${GOOD}\r\n` },
    files: {
      'C:\\Program Files\\FSLogix\\Apps\\frxsvc.exe': { ok: true, value: GOOD },
      'C:\\Windows\\System32\\drivers\\frxdrv.sys': { ok: true, value: GOOD },
      'C:\\Windows\\System32\\drivers\\frxccd.sys': {
        ok: false,
        error: "Cannot find path 'C:\\Windows\\System32\\drivers\\frxccd.sys' because it does not exist.",
      },
    },
  };
}

describe('parseHostEvidence', () => {
  it('accepts a single installer entry flattened to an object', async () => {
    const evidence = parseHostEvidence({
      schema_version: 'host-evidence-v1',
      installer_entries: { ok: true, value: { display_name: 'Microsoft FSLogix Apps', display_version: GOOD } },
      registry_version: null,
      command_output: null,
      files: {},
    });

    const entries = await createEvidenceFacilities(evidence).listInstallerEntries();
    expect(entries).toEqual([{ display_name: 'Microsoft FSLogix Apps', display_version: GOOD, estimated_size: null }]);
  });

  it('maps a null installer list to no entries', async () => {
    const evidence = parseHostEvidence({
      schema_version: 'host-evidence-v1',
      installer_entries: { ok: true, value: null },
    });

    expect(await createEvidenceFacilities(evidence).listInstallerEntries()).toEqual([]);
  });

  it('rejects bundles with another schema version', () => {
    expect(() => parseHostEvidence({ schema_version: 'host-evidence-v0' })).toThrow(EvidenceParseError);
  });
});

describe('createEvidenceFacilities', () => {
  it('throws SubSourceReadError for failed and uncollected sources', async () => {
    const facilities = createEvidenceFacilities(parseHostEvidence(fullEvidence()));

    await expect(facilities.readFileVersion('C:\\Windows\\System32\\drivers\\frxccd.sys')).rejects.toBeInstanceOf(
      SubSourceReadError,
    );
    await expect(facilities.readFileVersion('C:\\nope.sys')).rejects.toThrow('C:\\nope.sys was not collected');
  });

  it('drives the host probe end to end', async () => {
    const facilities = createEvidenceFacilities(parseHostEvidence(fullEvidence()));
    const record = await probeHost(facilities, {
      host: 'host07',
      minimumVersion: '2.9.7653.47581',
      profile: FSLOGIX_APPS_PROFILE,
    });

    expect(record.host_identifier).toBe('host07');
    expect(record.sources).toEqual({
      installer_version: GOOD,
      registry_version: GOOD,
      cli_service_version: GOOD,
      cli_driver_version: GOOD,
      service_frxsvc: GOOD,
      driver_frxdrv: GOOD,
      driver_frxccd: 'Unknown',
    });
    expect(record.validation_passed).toBe(false);
    expect(record.warnings).toEqual([
      {
        code: 'SUB_SOURCE_READ_FAILED',
        message: "Cannot find path 'C:\\Windows\\System32\\drivers\\frxccd.sys' because it does not exist.",
        source: 'driver_frxccd',
      },
    ]);
  });
});
