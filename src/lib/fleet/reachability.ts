import net from 'node:net';

export type ReachabilityOptions = {
  port: number;
  timeoutMs: number;
};

export type IsReachable = (host: string, signal?: AbortSignal) => Promise<boolean>;

/** TCP connect probe against the transport's port. Never rejects. */
export function tcpReachability(opts: ReachabilityOptions): IsReachable {
  return (host, signal) =>
    new Promise<boolean>((resolve) => {
      if (signal?.aborted) {
        resolve(false);
        return;
      }

      const socket = net.connect({ host, port: opts.port });
      let settled = false;
      const finish = (reachable: boolean) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        resolve(reachable);
      };
      const onAbort = () => finish(false);
      const timer = setTimeout(() => finish(false), opts.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      socket.once('connect', () => finish(true));
      socket.once('error', () => finish(false));
    });
}

export function defaultReachabilityPort(
  transport: 'local' | 'remoting' | 'agent',
  agentPort: number,
  winrmPort = 5985,
): number | null {
  if (transport === 'local') return null;
  return transport === 'agent' ? agentPort : winrmPort;
}
