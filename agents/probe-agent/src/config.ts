import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod/v4';

export const DEFAULT_CONFIG_FILE = 'probe-agent.config.json';

const nonEmpty = z.string().trim().min(1);

const ProbeAgentConfigSchema = z.object({
  token: z.string({ error: 'token is required' }).trim().min(1, 'token is required'),
  bind: nonEmpty.default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(8787),
  ps_timeout_ms: z.number().int().positive().default(120_000),
  powershell_exe: nonEmpty.default('powershell.exe'),
  /** Product profile JSON; the built-in FSLogix profile when null. */
  profile_path: nonEmpty.nullable().default(null),
  log: z
    .object({
      dir: nonEmpty.default('logs'),
      level: z.enum(['info', 'warn', 'error']).default('info'),
      retain_days: z.number().int().min(0).default(14),
    })
    .default({ dir: 'logs', level: 'info', retain_days: 14 }),
});

export type ProbeAgentConfig = z.infer<typeof ProbeAgentConfigSchema>;

export type LoadedProbeAgentConfig = {
  configPath: string;
  configDir: string;
  config: ProbeAgentConfig;
};

export function parseConfig(raw: unknown, configDir: string): ProbeAgentConfig {
  const parsed = ProbeAgentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
    throw new Error(`invalid agent config: ${where}${issue?.message ?? 'unknown issue'}`);
  }

  const config = parsed.data;
  if (config.profile_path && !path.isAbsolute(config.profile_path)) {
    config.profile_path = path.join(configDir, config.profile_path);
  }
  return config;
}

// `--config` is relative to the working directory, falling back to the script directory.
function resolveConfigPath(baseDir: string, cwd: string, argv: readonly string[]): string {
  const idx = argv.lastIndexOf('--config');
  if (idx === -1) return path.join(baseDir, DEFAULT_CONFIG_FILE);

  const arg = argv[idx + 1]?.trim();
  if (!arg) throw new Error('--config requires a path');
  if (path.isAbsolute(arg)) return arg;
  const fromCwd = path.join(cwd, arg);
  return existsSync(fromCwd) ? fromCwd : path.join(baseDir, arg);
}

export function loadConfig(args: { argv: readonly string[]; importMetaUrl: string; cwd?: string }): LoadedProbeAgentConfig {
  const baseDir = path.dirname(fileURLToPath(args.importMetaUrl));
  const configPath = resolveConfigPath(baseDir, args.cwd ?? process.cwd(), args.argv);
  const configDir = path.dirname(configPath);
  const raw: unknown = JSON.parse(readFileSync(configPath, 'utf8'));

  return { configPath, configDir, config: parseConfig(raw, configDir) };
}
