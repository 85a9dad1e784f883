import type { FleetReport } from '@/lib/fleet/fleet-collector';
import type { ProbeWarning, VersionRecord } from '@/lib/probe/types';

export const VERSION_REPORT_SCHEMA_VERSION = 'version-report-v1';

export const VERSION_REPORT_LEADING_COLUMNS = [
  'host_identifier',
  'validation_passed',
  'minimum_version',
  'install_check',
] as const;

export function escapeCsvField(value: string): string {
  // RFC 4180 style:
  // - If field contains comma, quote or newline: wrap in quotes
  // - Escape quote as doubled quote
  if (value.includes('"')) value = value.replaceAll('"', '""');
  if (value.includes(',') || value.includes('\n') || value.includes('\r') || value.includes('"')) return `"${value}"`;
  return value;
}

export function toCsvLine(fields: string[]): string {
  return fields.map(escapeCsvField).join(',');
}

export function versionReportColumns(sourceNames: readonly string[]): string[] {
  return [...VERSION_REPORT_LEADING_COLUMNS, ...sourceNames, 'warnings'];
}

function formatWarning(warning: ProbeWarning): string {
  return warning.source ? `${warning.code}(${warning.source})` : warning.code;
}

export function buildVersionReportRow(record: VersionRecord, sourceNames: readonly string[]): string[] {
  return [
    record.host_identifier,
    record.validation_passed ? 'true' : 'false',
    record.minimum_version,
    record.install_check,
    ...sourceNames.map((name) => record.sources[name] ?? 'Unknown'),
    record.warnings.map(formatWarning).join('; '),
  ];
}

/** One header line, then one line per record in report order. */
export function renderVersionReportCsv(records: readonly VersionRecord[], sourceNames: readonly string[]): string {
  const lines: string[] = [toCsvLine(versionReportColumns(sourceNames))];
  for (const record of records) {
    lines.push(toCsvLine(buildVersionReportRow(record, sourceNames)));
  }
  return `${lines.join('\n')}\n`;
}

export function renderVersionReportJson(report: FleetReport, product: string): string {
  return `${JSON.stringify(
    {
      schema_version: VERSION_REPORT_SCHEMA_VERSION,
      product,
      minimum_version: report.minimum_version,
      summary: report.summary,
      records: report.records,
      failures: report.failures,
    },
    null,
    2,
  )}\n`;
}
