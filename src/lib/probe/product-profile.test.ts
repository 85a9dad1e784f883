import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import {
  FSLOGIX_APPS_PROFILE,
  listSourceNames,
  loadProductProfile,
  parseProductProfile,
} from '@/lib/probe/product-profile';

describe('product profile', () => {
  it('lists FSLogix sources in stable order', () => {
    expect(listSourceNames(FSLOGIX_APPS_PROFILE)).toEqual([
      'installer_version',
      'registry_version',
      'cli_service_version',
      'cli_driver_version',
      'service_frxsvc',
      'driver_frxdrv',
      'driver_frxccd',
    ]);
  });

  it('applies defaults for optional lists', () => {
    const profile = parseProductProfile({
      name: 'contoso-agent',
      display_name_pattern: 'Contoso Agent*',
      registry: { key: 'HKLM:\\SOFTWARE\\Contoso\\Agent', value: 'Version' },
      command: { path: 'C:\\Contoso\\agent.exe', schema: { version: 'frx-version-v1', fields: ['cli_version'] } },
    });

    expect(profile.command.args).toEqual([]);
    expect(profile.services).toEqual([]);
    expect(listSourceNames(profile)).toEqual(['installer_version', 'registry_version', 'cli_version']);
  });

  it('rejects duplicate source names', () => {
    expect(() =>
      parseProductProfile({
        ...FSLOGIX_APPS_PROFILE,
        command: { ...FSLOGIX_APPS_PROFILE.command, schema: { version: 'frx-version-v1', fields: ['registry_version'] } },
      }),
    ).toThrow(/duplicate source name: registry_version/);
  });

  it('rejects a command schema version the output parser does not know', () => {
    expect(() =>
      parseProductProfile({
        ...FSLOGIX_APPS_PROFILE,
        command: { ...FSLOGIX_APPS_PROFILE.command, schema: { version: 'frx-version-v9', fields: ['cli_version'] } },
      }),
    ).toThrow(/unsupported command schema version/);
  });

  it('rejects unknown keys', () => {
    expect(() => parseProductProfile({ ...FSLOGIX_APPS_PROFILE, extra: true })).toThrow(/invalid product profile/);
  });

  it('loads a profile from a JSON file', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'product-profile-'));
    const file = path.join(dir, 'profile.json');
    writeFileSync(file, JSON.stringify(FSLOGIX_APPS_PROFILE), 'utf8');

    expect(loadProductProfile(file)).toEqual(FSLOGIX_APPS_PROFILE);
  });

  it('ships the default profile as an editable JSON file', () => {
    const file = fileURLToPath(new URL('../../../profiles/fslogix-apps.json', import.meta.url));
    expect(loadProductProfile(file)).toEqual(FSLOGIX_APPS_PROFILE);
  });
});
