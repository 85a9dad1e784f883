import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

export type RuntimeEnv = Record<string, string | undefined>;

export function loadAuditEnv(runtimeEnv: RuntimeEnv = process.env) {
  return createEnv({
    server: {
      NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

      VERSION_AUDIT_MIN_VERSION: z.string().min(1).optional(),
      VERSION_AUDIT_PROFILE: z.string().min(1).optional(),
      VERSION_AUDIT_TRANSPORT: z.enum(['local', 'remoting', 'agent']).default('remoting'),
      VERSION_AUDIT_CONCURRENCY: z.coerce.number().int().positive().default(8),
      VERSION_AUDIT_HOST_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
      VERSION_AUDIT_REACHABILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
      VERSION_AUDIT_ON_TRANSPORT_ERROR: z.enum(['skip', 'placeholder']).default('skip'),
      VERSION_AUDIT_POWERSHELL_EXE: z.string().min(1).default('powershell.exe'),

      // Remoting transport (WinRM)
      VERSION_AUDIT_WINRM_USERNAME: z.string().min(1).optional(),
      VERSION_AUDIT_WINRM_PASSWORD: z.string().min(1).optional(),
      VERSION_AUDIT_WINRM_DOMAIN: z.string().min(1).optional(),
      VERSION_AUDIT_WINRM_SCHEME: z.enum(['http', 'https']).default('http'),
      VERSION_AUDIT_WINRM_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
      VERSION_AUDIT_WINRM_TLS_VERIFY: z
        .enum(['true', 'false'])
        .default('true')
        .transform((v) => v === 'true'),

      // Agent transport
      VERSION_AUDIT_AGENT_PORT: z.coerce.number().int().min(1).max(65_535).default(8787),
      VERSION_AUDIT_AGENT_SCHEME: z.enum(['http', 'https']).default('http'),
      VERSION_AUDIT_AGENT_TOKEN: z.string().min(1).optional(),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
  });
}

export type AuditEnv = ReturnType<typeof loadAuditEnv>;
