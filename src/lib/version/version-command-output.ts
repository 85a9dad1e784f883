import { isWellFormedVersion, UNKNOWN_VERSION } from '@/lib/version/version-comparator';

import type { VersionValue } from '@/lib/version/version-comparator';

/**
 * Positional schema for a product's "print versions" command: the n-th non-empty
 * output line carries the value for `fields[n]`, after its first colon.
 */
export type VersionCommandSchema = {
  version: string;
  fields: readonly string[];
};

export type ParsedVersionCommandOutput = {
  values: Record<string, VersionValue>;
  /** Fields whose line was present but did not hold a well-formed version. */
  malformed: Array<{ field: string; raw: string }>;
};

/** Output layouts this parser understands, keyed by `VersionCommandSchema.version`. */
export const VERSION_COMMAND_SCHEMA_VERSIONS = ['frx-version-v1'] as const;

export class UnsupportedCommandSchemaError extends Error {
  readonly schemaVersion: string;

  constructor(schemaVersion: string) {
    super(`unsupported version command schema: ${schemaVersion}`);
    this.name = 'UnsupportedCommandSchemaError';
    this.schemaVersion = schemaVersion;
  }
}

export function isSupportedCommandSchemaVersion(version: string): boolean {
  return VERSION_COMMAND_SCHEMA_VERSIONS.some((v) => v === version);
}

function stripUtf8Bom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function valueAfterColon(line: string): string | null {
  const idx = line.indexOf(':');
  if (idx === -1) return null;
  const value = line.slice(idx + 1).trim();
  return value.length > 0 ? value : null;
}

export function parseVersionCommandOutput(rawOutput: string, schema: VersionCommandSchema): ParsedVersionCommandOutput {
  if (!isSupportedCommandSchemaVersion(schema.version)) throw new UnsupportedCommandSchemaError(schema.version);

  const lines = stripUtf8Bom(rawOutput)
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  const values: Record<string, VersionValue> = {};
  const malformed: ParsedVersionCommandOutput['malformed'] = [];

  schema.fields.forEach((field, idx) => {
    const line = lines[idx];
    const raw = line === undefined ? null : valueAfterColon(line);
    if (raw === null) {
      values[field] = UNKNOWN_VERSION;
      return;
    }
    if (isWellFormedVersion(raw)) {
      values[field] = raw;
      return;
    }
    values[field] = UNKNOWN_VERSION;
    malformed.push({ field, raw });
  });

  return { values, malformed };
}
