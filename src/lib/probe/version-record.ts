import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import { isWellFormedVersion, meetsMinimum, UNKNOWN_VERSION } from '@/lib/version/version-comparator';

import type { InstallCheck, ProbeWarning, VersionRecord } from '@/lib/probe/types';
import type { VersionValue } from '@/lib/version/version-comparator';

export type VersionRecordDraft = {
  host: string;
  minimumVersion: string;
  installCheck: InstallCheck;
  sourceNames: readonly string[];
  values?: Readonly<Record<string, VersionValue | null | undefined>>;
  warnings?: readonly ProbeWarning[];
};

export function computeValidationPassed(
  record: Pick<VersionRecord, 'install_check' | 'minimum_version' | 'sources'>,
): boolean {
  if (record.install_check !== 'Installed') return false;
  const values = Object.values(record.sources);
  if (values.length === 0) return false;
  return values.every((v) => v !== UNKNOWN_VERSION && meetsMinimum(v, record.minimum_version));
}

function normalizeValue(value: VersionValue | null | undefined): VersionValue {
  if (typeof value !== 'string') return UNKNOWN_VERSION;
  const trimmed = value.trim();
  return isWellFormedVersion(trimmed) ? trimmed : UNKNOWN_VERSION;
}

/**
 * Builds the immutable per-host record. Every source name gets a value; anything that is
 * not a well-formed version becomes `Unknown`, and no source survives without a confirmed
 * installation.
 */
export function createVersionRecord(draft: VersionRecordDraft): VersionRecord {
  const installed = draft.installCheck === 'Installed';
  const sources: Record<string, VersionValue> = {};
  for (const name of draft.sourceNames) {
    sources[name] = installed ? normalizeValue(draft.values?.[name]) : UNKNOWN_VERSION;
  }

  const base = {
    host_identifier: draft.host,
    minimum_version: draft.minimumVersion,
    install_check: draft.installCheck,
    sources: Object.freeze(sources),
  };

  return Object.freeze({
    host_identifier: base.host_identifier,
    validation_passed: computeValidationPassed(base),
    minimum_version: base.minimum_version,
    install_check: base.install_check,
    sources: base.sources,
    warnings: Object.freeze([...(draft.warnings ?? [])]),
  });
}

/** Stand-in for a host that could not be probed at all. */
export function createPlaceholderRecord(input: {
  host: string;
  minimumVersion: string;
  sourceNames: readonly string[];
  warning?: ProbeWarning;
}): VersionRecord {
  return createVersionRecord({
    host: input.host,
    minimumVersion: input.minimumVersion,
    installCheck: 'Unknown',
    sourceNames: input.sourceNames,
    warnings: input.warning ? [input.warning] : [],
  });
}

const ProbeWarningSchema = z.object({
  code: z.enum(ErrorCode),
  message: z.string(),
  source: z.string().optional(),
});

export const VersionRecordSchema = z.object({
  host_identifier: z.string().min(1),
  validation_passed: z.boolean(),
  minimum_version: z.string().min(1),
  install_check: z.enum(['Installed', 'NotInstalled', 'Unknown']),
  sources: z.record(z.string(), z.string()),
  warnings: z.array(ProbeWarningSchema).default([]),
});

/**
 * Re-finalizes a record received over a transport. The sender's `validation_passed` is
 * discarded and recomputed so it always agrees with the fields.
 */
export function restoreVersionRecord(raw: unknown, sourceNames: readonly string[]): VersionRecord {
  const parsed = VersionRecordSchema.parse(raw);
  return createVersionRecord({
    host: parsed.host_identifier,
    minimumVersion: parsed.minimum_version,
    installCheck: parsed.install_check,
    sourceNames,
    values: parsed.sources,
    warnings: parsed.warnings,
  });
}
