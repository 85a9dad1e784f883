import { ErrorCode } from '@/lib/errors/error-codes';
import { logEvent } from '@/lib/logging/logger';
import { createPlaceholderRecord } from '@/lib/probe/version-record';
import { toTransportError } from '@/lib/transport/transport-error';
import { parseVersion } from '@/lib/version/version-comparator';

import type { AppError } from '@/lib/errors/error';
import type { LogSink } from '@/lib/logging/logger';
import type { VersionRecord } from '@/lib/probe/types';
import type { ExecuteRemote } from '@/lib/transport/transports';

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_HOST_TIMEOUT_MS = 120_000;

export type HostOutcome = 'probed' | 'unreachable' | 'transport_failed' | 'placeholder';

export type CollectorDeps = {
  isReachable: (host: string, signal?: AbortSignal) => Promise<boolean>;
  executeRemote: ExecuteRemote;
  /** Source names placeholders are built with; the profile's `listSourceNames`. */
  sourceNames: readonly string[];
  log?: LogSink;
};

export type ProgressEvent = {
  host: string;
  completed: number;
  total: number;
  percent: number;
  outcome: HostOutcome;
};

export type CollectorOptions = {
  concurrency?: number;
  hostTimeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  /** `skip` leaves a host with a transport failure out of `records`; `placeholder` reports it like an unreachable host. */
  onTransportError?: 'skip' | 'placeholder';
};

export type HostFailure = {
  host: string;
  error: AppError;
};

export type FleetSummary = {
  total_hosts: number;
  processed: number;
  passed: number;
  not_installed: number;
  unreachable: number;
  transport_failed: number;
  cancelled: boolean;
};

export type FleetReport = {
  minimum_version: string;
  records: VersionRecord[];
  failures: HostFailure[];
  summary: FleetSummary;
};

type HostResult =
  | { kind: 'record'; outcome: HostOutcome; record: VersionRecord; failure?: HostFailure }
  | { kind: 'failed'; failure: HostFailure };

function clampPositiveInt(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  const n = Math.floor(value);
  return n >= 1 ? n : fallback;
}

async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  shouldStop: () => boolean,
  fn: (item: T, index: number) => Promise<R>,
): Promise<(R | undefined)[]> {
  const safeLimit = Math.max(1, Math.floor(limit));
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  let idx = 0;

  const workers = Array.from({ length: Math.min(safeLimit, items.length) }, async () => {
    while (true) {
      if (shouldStop()) return;
      const current = idx++;
      if (current >= items.length) return;
      const item = items[current];
      if (item === undefined) return;
      results[current] = await fn(item, current);
    }
  });

  await Promise.all(workers);
  return results;
}

function timeoutError(host: string, timeoutMs: number): AppError {
  return {
    code: ErrorCode.TRANSPORT_TIMEOUT,
    category: 'network',
    message: 'host probe timed out',
    retryable: true,
    redacted_context: { stage: 'collector.execute', host, timeout_ms: timeoutMs },
  };
}

/** Runs `executeRemote` under a per-host deadline that also aborts the host's signal. */
async function executeWithDeadline(
  executeRemote: ExecuteRemote,
  host: string,
  minimumVersion: string,
  timeoutMs: number,
  batchSignal: AbortSignal | undefined,
): Promise<VersionRecord> {
  const controller = new AbortController();
  const onBatchAbort = () => controller.abort();
  if (batchSignal?.aborted) controller.abort();
  batchSignal?.addEventListener('abort', onBatchAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles as a timeout, not as whatever the abort causes.
      reject(toTransportError(timeoutError(host, timeoutMs), 'collector.execute'));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([executeRemote(host, minimumVersion, controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    batchSignal?.removeEventListener('abort', onBatchAbort);
  }
}

/**
 * Probes every host and merges the results in input order. Only a malformed minimum
 * version rejects; every per-host fault ends up in the report.
 */
export async function collectAll(
  hosts: readonly string[],
  minimumVersion: string,
  deps: CollectorDeps,
  options: CollectorOptions = {},
): Promise<FleetReport> {
  parseVersion(minimumVersion);

  const log = deps.log ?? logEvent;
  const concurrency = clampPositiveInt(options.concurrency, DEFAULT_CONCURRENCY);
  const hostTimeoutMs = clampPositiveInt(options.hostTimeoutMs, DEFAULT_HOST_TIMEOUT_MS);
  const onTransportError = options.onTransportError ?? 'skip';
  const total = hosts.length;
  let completed = 0;

  log({
    level: 'info',
    service: 'collector',
    event_type: 'collector.batch_started',
    total_hosts: total,
    minimum_version: minimumVersion,
    concurrency,
  });

  const unreachable = (host: string, message: string): HostResult => ({
    kind: 'record',
    outcome: 'unreachable',
    record: createPlaceholderRecord({
      host,
      minimumVersion,
      sourceNames: deps.sourceNames,
      warning: { code: ErrorCode.HOST_UNREACHABLE, message },
    }),
  });

  /** `undefined` means the host was never dispatched because the batch was cancelled. */
  const probeOne = async (host: string): Promise<HostResult | undefined> => {
    let reachable: boolean;
    try {
      reachable = await deps.isReachable(host, options.signal);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log({ level: 'warn', service: 'collector', event_type: 'collector.host_unreachable', host, cause: message });
      return unreachable(host, `reachability check failed: ${message}`);
    }
    if (!reachable) {
      log({ level: 'warn', service: 'collector', event_type: 'collector.host_unreachable', host });
      return unreachable(host, 'host did not answer the reachability check');
    }

    if (options.signal?.aborted) return undefined;

    try {
      const record = await executeWithDeadline(deps.executeRemote, host, minimumVersion, hostTimeoutMs, options.signal);
      log({
        level: 'info',
        service: 'collector',
        event_type: 'collector.host_probed',
        host,
        install_check: record.install_check,
        validation_passed: record.validation_passed,
        warning_count: record.warnings.length,
      });
      return { kind: 'record', outcome: 'probed', record };
    } catch (err) {
      const error = toTransportError(err, 'collector.execute').appError;
      log({ level: 'error', service: 'collector', event_type: 'collector.host_failed', host, error });
      if (onTransportError === 'placeholder') {
        return {
          kind: 'record',
          outcome: 'placeholder',
          record: createPlaceholderRecord({
            host,
            minimumVersion,
            sourceNames: deps.sourceNames,
            warning: { code: error.code, message: error.message },
          }),
          failure: { host, error },
        };
      }
      return { kind: 'failed', failure: { host, error } };
    }
  };

  const results = await mapLimit(
    hosts,
    concurrency,
    () => options.signal?.aborted ?? false,
    async (host) => {
      const result = await probeOne(host);
      if (!result) return undefined;
      completed += 1;
      try {
        options.onProgress?.({
          host,
          completed,
          total,
          percent: total === 0 ? 100 : Math.round((completed / total) * 100),
          outcome: result.kind === 'record' ? result.outcome : 'transport_failed',
        });
      } catch (err) {
        log({
          level: 'warn',
          service: 'collector',
          event_type: 'collector.progress_failed',
          host,
          cause: err instanceof Error ? err.message : String(err),
        });
      }
      return result;
    },
  );

  const records: VersionRecord[] = [];
  const failures: HostFailure[] = [];
  const summary: FleetSummary = {
    total_hosts: total,
    processed: 0,
    passed: 0,
    not_installed: 0,
    unreachable: 0,
    transport_failed: 0,
    cancelled: false,
  };

  for (const result of results) {
    if (!result) {
      summary.cancelled = true;
      continue;
    }
    summary.processed += 1;
    if (result.kind === 'failed') {
      failures.push(result.failure);
      summary.transport_failed += 1;
      continue;
    }
    records.push(result.record);
    if (result.outcome === 'unreachable') summary.unreachable += 1;
    if (result.failure) {
      failures.push(result.failure);
      summary.transport_failed += 1;
    }
    if (result.record.validation_passed) summary.passed += 1;
    if (result.record.install_check === 'NotInstalled') summary.not_installed += 1;
  }

  log({ level: summary.cancelled ? 'warn' : 'info', service: 'collector', event_type: 'collector.batch_finished', ...summary });

  return { minimum_version: minimumVersion, records, failures, summary };
}
