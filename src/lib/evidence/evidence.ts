import { z } from 'zod/v4';

import { HOST_EVIDENCE_SCHEMA_VERSION } from '@/lib/evidence/evidence-script';
import { SubSourceReadError } from '@/lib/probe/types';

import type { HostFacilities, InstallerEntry } from '@/lib/probe/types';

function sourceSchema<T extends z.ZodType>(value: T) {
  return z.union([
    z.object({ ok: z.literal(true), value }),
    z.object({ ok: z.literal(false), error: z.string().nullable().default(null) }),
  ]);
}

const InstallerEntrySchema = z.object({
  display_name: z.string(),
  display_version: z.string().nullable().default(null),
  estimated_size: z.number().nullable().default(null),
});

// ConvertTo-Json flattens single-element arrays and emits null for empty pipelines.
const InstallerEntriesSchema = z.preprocess((v) => {
  if (v === null || v === undefined) return [];
  return Array.isArray(v) ? v : [v];
}, z.array(InstallerEntrySchema));

const NullableString = z.string().nullable().default(null);

export const HostEvidenceSchema = z.object({
  schema_version: z.literal(HOST_EVIDENCE_SCHEMA_VERSION),
  installer_entries: sourceSchema(InstallerEntriesSchema),
  registry_version: sourceSchema(NullableString).nullable().default(null),
  command_output: sourceSchema(NullableString).nullable().default(null),
  files: z.record(z.string(), sourceSchema(NullableString)).nullable().default({}),
});

export type HostEvidence = z.infer<typeof HostEvidenceSchema>;

type SourceResult<T> = { ok: true; value: T } | { ok: false; error: string | null };

export class EvidenceParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvidenceParseError';
  }
}

export function parseHostEvidence(raw: unknown): HostEvidence {
  const parsed = HostEvidenceSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EvidenceParseError(
      `invalid host evidence: ${issue ? `${issue.path.map(String).join('.')} ${issue.message}` : 'unknown issue'}`,
    );
  }
  return parsed.data;
}

function unwrap<T>(source: string, result: SourceResult<T> | null | undefined): T {
  if (!result) throw new SubSourceReadError(source, `${source} was not collected`);
  if (!result.ok) throw new SubSourceReadError(source, result.error ?? `${source} read failed`);
  return result.value;
}

/** Serves `HostFacilities` from an evidence bundle collected on the host in one round trip. */
export function createEvidenceFacilities(evidence: HostEvidence): HostFacilities {
  return {
    listInstallerEntries: async (): Promise<InstallerEntry[]> => unwrap('installer_entries', evidence.installer_entries),
    readRegistryVersion: async () => unwrap('registry_version', evidence.registry_version),
    runVersionCommand: async () => unwrap('command_output', evidence.command_output) ?? '',
    readFileVersion: async (filePath) => unwrap(filePath, evidence.files?.[filePath]),
  };
}
