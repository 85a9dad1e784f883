import { readFileSync } from 'node:fs';

import { z } from 'zod/v4';

import { isSupportedCommandSchemaVersion } from '@/lib/version/version-command-output';

const BinarySchema = z.object({ name: z.string().min(1), path: z.string().min(1) }).strict();

export const ProductProfileSchema = z
  .object({
    name: z.string().min(1),
    // PowerShell -like wildcard matched against the uninstall entry DisplayName.
    display_name_pattern: z.string().min(1),
    default_minimum_version: z.string().min(1).optional(),
    registry: z.object({ key: z.string().min(1), value: z.string().min(1) }).strict(),
    command: z
      .object({
        path: z.string().min(1),
        args: z.array(z.string()).default([]),
        schema: z
          .object({
            version: z.string().min(1).refine(isSupportedCommandSchemaVersion, {
              message: 'unsupported command schema version',
            }),
            fields: z.array(z.string().min(1)).min(1),
          })
          .strict(),
      })
      .strict(),
    services: z.array(BinarySchema).default([]),
    drivers: z.array(BinarySchema).default([]),
  })
  .strict()
  .superRefine((profile, ctx) => {
    const seen = new Set<string>();
    for (const name of listSourceNames(profile)) {
      if (seen.has(name)) ctx.addIssue({ code: 'custom', message: `duplicate source name: ${name}` });
      seen.add(name);
    }
  });

export type ProductProfile = z.infer<typeof ProductProfileSchema>;

type SourceNameInput = Pick<ProductProfile, 'command' | 'services' | 'drivers'>;

export const INSTALLER_VERSION_SOURCE = 'installer_version';
export const REGISTRY_VERSION_SOURCE = 'registry_version';

export function serviceSourceName(name: string): string {
  return `service_${name}`;
}

export function driverSourceName(name: string): string {
  return `driver_${name}`;
}

/** Stable source order; downstream exports rely on it. */
export function listSourceNames(profile: SourceNameInput): string[] {
  return [
    INSTALLER_VERSION_SOURCE,
    REGISTRY_VERSION_SOURCE,
    ...profile.command.schema.fields,
    ...profile.services.map((s) => serviceSourceName(s.name)),
    ...profile.drivers.map((d) => driverSourceName(d.name)),
  ];
}

export const FSLOGIX_APPS_PROFILE: ProductProfile = {
  name: 'fslogix-apps',
  display_name_pattern: '*FSLogix Apps*',
  default_minimum_version: '2.9.7653.47581',
  registry: { key: 'HKLM:\\SOFTWARE\\FSLogix\\Apps', value: 'InstallVersion' },
  command: {
    path: 'C:\\Program Files\\FSLogix\\Apps\\frx.exe',
    args: ['version'],
    schema: { version: 'frx-version-v1', fields: ['cli_service_version', 'cli_driver_version'] },
  },
  services: [{ name: 'frxsvc', path: 'C:\\Program Files\\FSLogix\\Apps\\frxsvc.exe' }],
  drivers: [
    { name: 'frxdrv', path: 'C:\\Windows\\System32\\drivers\\frxdrv.sys' },
    { name: 'frxccd', path: 'C:\\Windows\\System32\\drivers\\frxccd.sys' },
  ],
};

export function parseProductProfile(raw: unknown): ProductProfile {
  const parsed = ProductProfileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
    throw new Error(`invalid product profile: ${where}${issue?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

export function loadProductProfile(filePath: string): ProductProfile {
  const raw = JSON.parse(readFileSync(filePath, 'utf8')) as unknown;
  return parseProductProfile(raw);
}
