import { describe, expect, it } from 'vitest';

import {
  escapeCsvField,
  renderVersionReportCsv,
  renderVersionReportJson,
  versionReportColumns,
} from '@/lib/exports/version-report';
import { createPlaceholderRecord, createVersionRecord } from '@/lib/probe/version-record';

import type { FleetReport } from '@/lib/fleet/fleet-collector';

const MIN = '2.9.7653.47581';
const SOURCES = ['installer_version', 'driver_frxccd'];

describe('version report csv', () => {
  it('escapes commas, quotes and newlines', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });

  it('puts source columns between the fixed columns and warnings', () => {
    expect(versionReportColumns(SOURCES)).toEqual([
      'host_identifier',
      'validation_passed',
      'minimum_version',
      'install_check',
      'installer_version',
      'driver_frxccd',
      'warnings',
    ]);
  });

  it('renders one line per record', () => {
    const passing = createVersionRecord({
      host: 'host-a',
      minimumVersion: MIN,
      installCheck: 'Installed',
      sourceNames: SOURCES,
      values: { installer_version: '2.9.7654.46150', driver_frxccd: '2.9.7654.46150' },
    });
    const degraded = createVersionRecord({
      host: 'host-b',
      minimumVersion: MIN,
      installCheck: 'Installed',
      sourceNames: SOURCES,
      values: { installer_version: '2.9.7654.46150' },
      warnings: [
        { code: 'SUB_SOURCE_READ_FAILED', message: 'missing', source: 'driver_frxccd' },
        { code: 'INSTALL_AMBIGUOUS', message: 'x' },
      ],
    });

    expect(renderVersionReportCsv([passing, degraded], SOURCES)).toBe(
      [
        'host_identifier,validation_passed,minimum_version,install_check,installer_version,driver_frxccd,warnings',
        'host-a,true,2.9.7653.47581,Installed,2.9.7654.46150,2.9.7654.46150,',
        'host-b,false,2.9.7653.47581,Installed,2.9.7654.46150,Unknown,SUB_SOURCE_READ_FAILED(driver_frxccd); INSTALL_AMBIGUOUS',
        '',
      ].join('\n'),
    );
  });
});

describe('version report json', () => {
  it('wraps the report with a schema version', () => {
    const report: FleetReport = {
      minimum_version: MIN,
      records: [createPlaceholderRecord({ host: 'host-a', minimumVersion: MIN, sourceNames: SOURCES })],
      failures: [],
      summary: {
        total_hosts: 1,
        processed: 1,
        passed: 0,
        not_installed: 0,
        unreachable: 1,
        transport_failed: 0,
        cancelled: false,
      },
    };

    const parsed: unknown = JSON.parse(renderVersionReportJson(report, 'fslogix-apps'));
    expect(parsed).toEqual({
      schema_version: 'version-report-v1',
      product: 'fslogix-apps',
      minimum_version: MIN,
      summary: report.summary,
      records: [
        {
          host_identifier: 'host-a',
          validation_passed: false,
          minimum_version: MIN,
          install_check: 'Unknown',
          sources: { installer_version: 'Unknown', driver_frxccd: 'Unknown' },
          warnings: [],
        },
      ],
      failures: [],
    });
  });
});
