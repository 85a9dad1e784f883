import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';

import { z } from 'zod/v4';

import { loadAuditEnv } from '@/lib/env/audit-env';
import { errorMessage } from '@/lib/errors/error';
import { ErrorCode } from '@/lib/errors/error-codes';
import { renderVersionReportCsv, renderVersionReportJson } from '@/lib/exports/version-report';
import { collectAll } from '@/lib/fleet/fleet-collector';
import { HostListError, resolveHostList } from '@/lib/fleet/host-list';
import { defaultReachabilityPort, tcpReachability } from '@/lib/fleet/reachability';
import { FSLOGIX_APPS_PROFILE, listSourceNames, loadProductProfile } from '@/lib/probe/product-profile';
import { createAgentTransport, createLocalTransport, createRemotingTransport } from '@/lib/transport/transports';
import { buildWinrmOptions, defaultWinrmPort } from '@/lib/transport/winrm';
import { MalformedVersionError, parseVersion } from '@/lib/version/version-comparator';

import type { AuditEnv, RuntimeEnv } from '@/lib/env/audit-env';
import type { ErrorCodeType } from '@/lib/errors/error-codes';
import type { CollectorDeps, FleetReport } from '@/lib/fleet/fleet-collector';
import type { LogSink } from '@/lib/logging/logger';
import type { ProductProfile } from '@/lib/probe/product-profile';
import type { ExecuteRemote, TransportKind } from '@/lib/transport/transports';

export const EXIT_OK = 0;
export const EXIT_NOT_COMPLIANT = 1;
export const EXIT_SETUP_ERROR = 2;

export class AuditSetupError extends Error {
  readonly code: ErrorCodeType;

  constructor(code: ErrorCodeType, message: string) {
    super(message);
    this.name = 'AuditSetupError';
    this.code = code;
  }
}

const AuditArgsSchema = z.object({
  host: z.array(z.string().min(1)).default([]),
  'hosts-file': z.string().min(1).optional(),
  'min-version': z.string().min(1).optional(),
  transport: z.enum(['local', 'remoting', 'agent']).optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  'timeout-ms': z.coerce.number().int().positive().optional(),
  profile: z.string().min(1).optional(),
  format: z.enum(['csv', 'json']).default('csv'),
  out: z.string().min(1).optional(),
  'on-transport-error': z.enum(['skip', 'placeholder']).optional(),
});

export type AuditArgs = z.infer<typeof AuditArgsSchema>;

export const AUDIT_USAGE = `usage: audit [--host <name>]... [--hosts-file <path>] [--min-version <a.b.c.d>]
             [--transport local|remoting|agent] [--concurrency <n>] [--timeout-ms <n>]
             [--profile <path>] [--format csv|json] [--out <path>]
             [--on-transport-error skip|placeholder]`;

export function parseAuditArgs(argv: readonly string[]): AuditArgs {
  let values: Record<string, unknown>;
  try {
    values = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        host: { type: 'string', multiple: true },
        'hosts-file': { type: 'string' },
        'min-version': { type: 'string' },
        transport: { type: 'string' },
        concurrency: { type: 'string' },
        'timeout-ms': { type: 'string' },
        profile: { type: 'string' },
        format: { type: 'string' },
        out: { type: 'string' },
        'on-transport-error': { type: 'string' },
      },
    }).values;
  } catch (err) {
    throw new AuditSetupError(ErrorCode.CONFIG_INVALID, errorMessage(err));
  }

  const parsed = AuditArgsSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new AuditSetupError(
      ErrorCode.CONFIG_INVALID,
      issue ? `--${issue.path.map(String).join('.')}: ${issue.message}` : 'invalid arguments',
    );
  }
  return parsed.data;
}

export type AuditPlan = {
  hosts: string[];
  minimumVersion: string;
  profile: ProductProfile;
  transport: TransportKind;
  format: 'csv' | 'json';
  out?: string;
  concurrency: number;
  hostTimeoutMs: number;
  onTransportError: 'skip' | 'placeholder';
  deps: CollectorDeps;
};

export type AuditIo = {
  runtimeEnv: RuntimeEnv;
  log: LogSink;
  writeStdout: (text: string) => void;
  localHostName?: () => string;
  /** Replaces the transport built from flags and env. */
  executeRemote?: ExecuteRemote;
  isReachable?: CollectorDeps['isReachable'];
  signal?: AbortSignal;
};

function loadProfile(profilePath: string | undefined): ProductProfile {
  if (!profilePath) return FSLOGIX_APPS_PROFILE;
  try {
    return loadProductProfile(profilePath);
  } catch (err) {
    throw new AuditSetupError(ErrorCode.CONFIG_PROFILE_INVALID, errorMessage(err));
  }
}

function resolveMinimumVersion(fromArgs: string | undefined, fromEnv: string | undefined, profile: ProductProfile) {
  const minimum = fromArgs ?? fromEnv ?? profile.default_minimum_version;
  if (!minimum) throw new AuditSetupError(ErrorCode.CONFIG_INVALID, 'no minimum version: pass --min-version');
  try {
    parseVersion(minimum);
  } catch (err) {
    if (err instanceof MalformedVersionError) {
      throw new AuditSetupError(ErrorCode.MALFORMED_VERSION, `malformed minimum version: ${minimum}`);
    }
    throw err;
  }
  return minimum;
}

/** Flags override `VERSION_AUDIT_*` env; the profile supplies the last-resort minimum. */
export async function planAudit(args: AuditArgs, io: AuditIo): Promise<AuditPlan> {
  let env: AuditEnv;
  try {
    env = loadAuditEnv(io.runtimeEnv);
  } catch (err) {
    throw new AuditSetupError(ErrorCode.CONFIG_INVALID, errorMessage(err));
  }

  const profile = loadProfile(args.profile ?? env.VERSION_AUDIT_PROFILE);
  const minimumVersion = resolveMinimumVersion(args['min-version'], env.VERSION_AUDIT_MIN_VERSION, profile);
  const transport = args.transport ?? env.VERSION_AUDIT_TRANSPORT;
  const hostTimeoutMs = args['timeout-ms'] ?? env.VERSION_AUDIT_HOST_TIMEOUT_MS;

  let hosts: string[];
  try {
    hosts = await resolveHostList({ hosts: args.host, hostsFile: args['hosts-file'] }, io.localHostName);
  } catch (err) {
    if (err instanceof HostListError) throw new AuditSetupError(ErrorCode.CONFIG_HOST_LIST_EMPTY, err.message);
    throw err;
  }

  let executeRemote = io.executeRemote;
  if (!executeRemote) {
    if (transport === 'agent') {
      const token = env.VERSION_AUDIT_AGENT_TOKEN;
      if (!token) throw new AuditSetupError(ErrorCode.CONFIG_INVALID, 'agent transport needs VERSION_AUDIT_AGENT_TOKEN');
      executeRemote = createAgentTransport({
        profile,
        token,
        port: env.VERSION_AUDIT_AGENT_PORT,
        scheme: env.VERSION_AUDIT_AGENT_SCHEME,
        timeoutMs: hostTimeoutMs,
      });
    } else if (transport === 'remoting') {
      const username = env.VERSION_AUDIT_WINRM_USERNAME;
      const password = env.VERSION_AUDIT_WINRM_PASSWORD;
      if (!username || !password) {
        throw new AuditSetupError(
          ErrorCode.CONFIG_INVALID,
          'remoting transport needs VERSION_AUDIT_WINRM_USERNAME and VERSION_AUDIT_WINRM_PASSWORD',
        );
      }
      executeRemote = createRemotingTransport({
        profile,
        winrm: buildWinrmOptions({
          username,
          password,
          domain: env.VERSION_AUDIT_WINRM_DOMAIN,
          scheme: env.VERSION_AUDIT_WINRM_SCHEME,
          port: env.VERSION_AUDIT_WINRM_PORT,
          tlsVerify: env.VERSION_AUDIT_WINRM_TLS_VERIFY,
          timeoutMs: hostTimeoutMs,
        }),
      });
    } else {
      executeRemote = createLocalTransport({
        profile,
        timeoutMs: hostTimeoutMs,
        powershellExe: env.VERSION_AUDIT_POWERSHELL_EXE,
      });
    }
  }

  let isReachable = io.isReachable;
  if (!isReachable) {
    const winrmPort = env.VERSION_AUDIT_WINRM_PORT ?? defaultWinrmPort(env.VERSION_AUDIT_WINRM_SCHEME);
    const port = defaultReachabilityPort(transport, env.VERSION_AUDIT_AGENT_PORT, winrmPort);
    isReachable =
      port === null
        ? async () => true
        : tcpReachability({ port, timeoutMs: env.VERSION_AUDIT_REACHABILITY_TIMEOUT_MS });
  }

  return {
    hosts,
    minimumVersion,
    profile,
    transport,
    format: args.format,
    out: args.out,
    concurrency: args.concurrency ?? env.VERSION_AUDIT_CONCURRENCY,
    hostTimeoutMs,
    onTransportError: args['on-transport-error'] ?? env.VERSION_AUDIT_ON_TRANSPORT_ERROR,
    deps: { isReachable, executeRemote, sourceNames: listSourceNames(profile), log: io.log },
  };
}

export function exitCodeFor(report: FleetReport): number {
  if (report.summary.cancelled || report.failures.length > 0) return EXIT_NOT_COMPLIANT;
  return report.records.every((r) => r.validation_passed) ? EXIT_OK : EXIT_NOT_COMPLIANT;
}

export async function runAudit(argv: readonly string[], io: AuditIo): Promise<number> {
  let plan: AuditPlan;
  try {
    plan = await planAudit(parseAuditArgs(argv), io);
  } catch (err) {
    if (!(err instanceof AuditSetupError)) throw err;
    io.log({ level: 'error', service: 'cli', event_type: 'cli.setup_failed', code: err.code, message: err.message });
    return EXIT_SETUP_ERROR;
  }

  io.log({
    level: 'info',
    service: 'cli',
    event_type: 'cli.audit_started',
    product: plan.profile.name,
    transport: plan.transport,
    host_count: plan.hosts.length,
    minimum_version: plan.minimumVersion,
  });

  const report = await collectAll(plan.hosts, plan.minimumVersion, plan.deps, {
    concurrency: plan.concurrency,
    hostTimeoutMs: plan.hostTimeoutMs,
    onTransportError: plan.onTransportError,
    signal: io.signal,
    onProgress: (event) => io.log({ level: 'info', service: 'cli', event_type: 'cli.progress', ...event }),
  });

  const sourceNames = listSourceNames(plan.profile);
  const rendered =
    plan.format === 'json'
      ? renderVersionReportJson(report, plan.profile.name)
      : renderVersionReportCsv(report.records, sourceNames);

  if (plan.out) {
    await writeFile(plan.out, rendered, 'utf8');
    io.log({ level: 'info', service: 'cli', event_type: 'cli.report_written', path: plan.out, format: plan.format });
  } else {
    io.writeStdout(rendered);
  }

  const exitCode = exitCodeFor(report);
  io.log({ level: 'info', service: 'cli', event_type: 'cli.audit_finished', exit_code: exitCode, ...report.summary });
  return exitCode;
}
