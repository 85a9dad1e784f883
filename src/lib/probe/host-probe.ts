import { errorMessage } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import {
  driverSourceName,
  INSTALLER_VERSION_SOURCE,
  listSourceNames,
  REGISTRY_VERSION_SOURCE,
  serviceSourceName,
} from '@/lib/probe/product-profile';
import { createVersionRecord } from '@/lib/probe/version-record';
import { parseVersionCommandOutput } from '@/lib/version/version-command-output';
import { isWellFormedVersion, UNKNOWN_VERSION } from '@/lib/version/version-comparator';

import type { ProductProfile } from '@/lib/probe/product-profile';
import type { HostFacilities, InstallerEntry, ProbeWarning, VersionRecord } from '@/lib/probe/types';
import type { VersionValue } from '@/lib/version/version-comparator';

export type ProbeInput = {
  host: string;
  minimumVersion: string;
  profile: ProductProfile;
};

/**
 * The primary package is the matching entry with the largest installed footprint;
 * entries without a size rank lowest and ties keep the first entry seen.
 */
export function selectPrimaryEntry(entries: readonly InstallerEntry[]): InstallerEntry | null {
  let primary: InstallerEntry | null = null;
  for (const entry of entries) {
    if (!primary || (entry.estimated_size ?? -1) > (primary.estimated_size ?? -1)) primary = entry;
  }
  return primary;
}

class SourceCollector {
  readonly values: Record<string, VersionValue> = {};
  readonly warnings: ProbeWarning[] = [];

  warn(code: ProbeWarning['code'], message: string, source?: string) {
    this.warnings.push({ code, message, ...(source ? { source } : {}) });
  }

  accept(source: string, raw: string | null) {
    const value = raw?.trim() ?? '';
    if (value.length === 0) {
      this.values[source] = UNKNOWN_VERSION;
      return;
    }
    if (!isWellFormedVersion(value)) {
      this.values[source] = UNKNOWN_VERSION;
      this.warn(ErrorCode.MALFORMED_VERSION, `unparseable version "${value}"`, source);
      return;
    }
    this.values[source] = value;
  }

  async read(source: string, fn: () => Promise<string | null>) {
    try {
      this.accept(source, await fn());
    } catch (err) {
      this.values[source] = UNKNOWN_VERSION;
      this.warn(ErrorCode.SUB_SOURCE_READ_FAILED, errorMessage(err), source);
    }
  }
}

/**
 * Reconciles every version source on one host into a `VersionRecord`. Never rejects:
 * a failing source only downgrades its own field to `Unknown`.
 */
export async function probeHost(facilities: HostFacilities, input: ProbeInput): Promise<VersionRecord> {
  const { host, minimumVersion, profile } = input;
  const sourceNames = listSourceNames(profile);
  const collector = new SourceCollector();

  const finish = (installCheck: VersionRecord['install_check']) =>
    createVersionRecord({
      host,
      minimumVersion,
      installCheck,
      sourceNames,
      values: collector.values,
      warnings: collector.warnings,
    });

  let entries: InstallerEntry[];
  try {
    entries = await facilities.listInstallerEntries();
  } catch (err) {
    collector.warn(ErrorCode.SUB_SOURCE_READ_FAILED, errorMessage(err), 'installer_entries');
    return finish('Unknown');
  }

  if (entries.length === 0) {
    collector.warn(ErrorCode.PRODUCT_NOT_INSTALLED, `no installer entry matches "${profile.display_name_pattern}"`);
    return finish('NotInstalled');
  }

  if (entries.length === 1) {
    collector.warn(
      ErrorCode.INSTALL_AMBIGUOUS,
      `expected at least 2 installer entries matching "${profile.display_name_pattern}", found 1`,
    );
    return finish('Installed');
  }

  collector.accept(INSTALLER_VERSION_SOURCE, selectPrimaryEntry(entries)?.display_version ?? null);
  await collector.read(REGISTRY_VERSION_SOURCE, () => facilities.readRegistryVersion());

  const schema = profile.command.schema;
  try {
    const parsed = parseVersionCommandOutput(await facilities.runVersionCommand(), schema);
    Object.assign(collector.values, parsed.values);
    for (const m of parsed.malformed) {
      collector.warn(ErrorCode.MALFORMED_VERSION, `unparseable version "${m.raw}"`, m.field);
    }
  } catch (err) {
    for (const field of schema.fields) {
      collector.values[field] = UNKNOWN_VERSION;
      collector.warn(ErrorCode.SUB_SOURCE_READ_FAILED, errorMessage(err), field);
    }
  }

  for (const service of profile.services) {
    await collector.read(serviceSourceName(service.name), () => facilities.readFileVersion(service.path));
  }
  for (const driver of profile.drivers) {
    await collector.read(driverSourceName(driver.name), () => facilities.readFileVersion(driver.path));
  }

  return finish('Installed');
}
