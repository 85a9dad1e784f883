import { readFile } from 'node:fs/promises';
import os from 'node:os';

export type HostListInput = {
  hosts?: readonly string[];
  hostsFile?: string;
};

export class HostListError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HostListError';
  }
}

/** One host per line; `#` starts a comment. */
export function parseHostList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => {
      const hash = line.indexOf('#');
      return (hash >= 0 ? line.slice(0, hash) : line).trim();
    })
    .filter((line) => line.length > 0);
}

/** Case-insensitive; the first spelling wins. */
export function dedupeHosts(hosts: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of hosts) {
    const host = raw.trim();
    if (!host) continue;
    const key = host.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(host);
  }
  return out;
}

/**
 * Explicit hosts and the hosts file are merged in that order. With neither, the audit
 * targets the machine it runs on.
 */
export async function resolveHostList(input: HostListInput, localHostName: () => string = os.hostname): Promise<string[]> {
  const explicit = input.hosts ?? [];
  let fromFile: string[] = [];
  if (input.hostsFile) {
    let text: string;
    try {
      text = await readFile(input.hostsFile, 'utf8');
    } catch (err) {
      throw new HostListError(`cannot read hosts file ${input.hostsFile}: ${err instanceof Error ? err.message : String(err)}`);
    }
    fromFile = parseHostList(text);
  }

  if (explicit.length === 0 && !input.hostsFile) return [localHostName()];

  const hosts = dedupeHosts([...explicit, ...fromFile]);
  if (hosts.length === 0) throw new HostListError('host list is empty');
  return hosts;
}
