import { appendFileSync, mkdirSync, readdirSync, rmSync, statSync } from 'node:fs';
import path from 'node:path';

import { formatLogEvent } from '@/lib/logging/logger';

import type { LogLevel } from '@/lib/logging/logger';

type AgentEvent = { event_type: string } & Record<string, unknown>;

export type ProbeAgentLogger = Record<LogLevel, (event: AgentEvent) => void>;

const LOG_FILE_PREFIX = 'probe-agent-';
const DAY_MS = 24 * 60 * 60 * 1000;
const LEVEL_RANK: Record<LogLevel, number> = { info: 20, warn: 30, error: 40 };

export function formatLocalDate(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

function removeExpiredLogs(logDir: string, retainDays: number, nowMs: number): string[] {
  if (retainDays <= 0) return [];
  const cutoffMs = nowMs - retainDays * DAY_MS;
  const failed: string[] = [];
  for (const name of readdirSync(logDir)) {
    if (!name.startsWith(LOG_FILE_PREFIX) || !name.endsWith('.jsonl')) continue;
    const full = path.join(logDir, name);
    try {
      if (statSync(full).mtimeMs < cutoffMs) rmSync(full, { force: true });
    } catch {
      failed.push(name);
    }
  }
  return failed;
}

/**
 * JSON lines in one file per local day under `config.dir` (relative to `baseDir`).
 * Lines below `config.level` are dropped.
 */
export function createLogger(args: {
  baseDir: string;
  config: { dir: string; level: LogLevel; retain_days: number };
  now?: () => Date;
}): { logger: ProbeAgentLogger; logDir: string } {
  const now = args.now ?? (() => new Date());
  const logDir = path.resolve(args.baseDir, args.config.dir);
  mkdirSync(logDir, { recursive: true });

  const minRank = LEVEL_RANK[args.config.level];
  let writeFailed = false;

  const write = (level: LogLevel, event: AgentEvent) => {
    if (LEVEL_RANK[level] < minRank) return;
    const file = path.join(logDir, `${LOG_FILE_PREFIX}${formatLocalDate(now())}.jsonl`);
    try {
      appendFileSync(file, `${formatLogEvent({ level, service: 'probe-agent', ...event })}\n`, 'utf8');
      writeFailed = false;
    } catch (err) {
      // Once per outage.
      if (!writeFailed) console.error(`[probe-agent] log write failed: ${err instanceof Error ? err.message : String(err)}`);
      writeFailed = true;
    }
  };

  const logger: ProbeAgentLogger = {
    info: (e) => write('info', e),
    warn: (e) => write('warn', e),
    error: (e) => write('error', e),
  };

  const failed = removeExpiredLogs(logDir, args.config.retain_days, now().getTime());
  if (failed.length > 0) logger.warn({ event_type: 'agent.log_cleanup_failed', files: failed });

  return { logger, logDir };
}
