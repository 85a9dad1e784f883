import type { ErrorCodeType } from '@/lib/errors/error-codes';
import type { VersionValue } from '@/lib/version/version-comparator';

export type InstallCheck = 'Installed' | 'NotInstalled' | 'Unknown';

export type ProbeWarning = {
  code: ErrorCodeType;
  message: string;
  source?: string;
};

export type VersionRecord = {
  readonly host_identifier: string;
  readonly validation_passed: boolean;
  readonly minimum_version: string;
  readonly install_check: InstallCheck;
  readonly sources: Readonly<Record<string, VersionValue>>;
  readonly warnings: readonly ProbeWarning[];
};

export type InstallerEntry = {
  display_name: string;
  display_version: string | null;
  /** Uninstall-key EstimatedSize (KB); absent on some installers. */
  estimated_size: number | null;
};

/** Host-local evidence sources the probe reads from. Each call may fail independently. */
export interface HostFacilities {
  listInstallerEntries(): Promise<InstallerEntry[]>;
  readRegistryVersion(): Promise<string | null>;
  runVersionCommand(): Promise<string>;
  readFileVersion(filePath: string): Promise<string | null>;
}

export class SubSourceReadError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.name = 'SubSourceReadError';
    this.source = source;
  }
}
