import { createServer } from 'node:http';

import { loadConfig, DEFAULT_CONFIG_FILE } from './config';
import { createHandler } from './handler';
import { toRequestListener } from './http-bridge';
import { createLogger } from './logger';
import { createLocalProbe } from './probe';

import { FSLOGIX_APPS_PROFILE, loadProductProfile } from '@/lib/probe/product-profile';

import type { LoadedProbeAgentConfig } from './config';
import type { ProductProfile } from '@/lib/probe/product-profile';

let loaded: LoadedProbeAgentConfig;
let profile: ProductProfile;
let agentLog: ReturnType<typeof createLogger>;
try {
  loaded = loadConfig({ argv: process.argv, importMetaUrl: import.meta.url });
  profile = loaded.config.profile_path ? loadProductProfile(loaded.config.profile_path) : FSLOGIX_APPS_PROFILE;
  agentLog = createLogger({ baseDir: loaded.configDir, config: loaded.config.log });
} catch (err) {
  console.error(`[probe-agent] config error: ${err instanceof Error ? err.message : String(err)}`);
  console.error(`[probe-agent] expected config file: ${DEFAULT_CONFIG_FILE} (or pass --config <path>)`);
  process.exit(1);
}

const { config } = loaded;
const { logger, logDir } = agentLog;

const handler = createHandler({
  token: config.token,
  deps: {
    probe: createLocalProbe({ profile, powershellExe: config.powershell_exe, timeoutMs: config.ps_timeout_ms }),
  },
  logger,
});

const startup = {
  config_path: loaded.configPath,
  profile: profile.name,
  bind: config.bind,
  port: config.port,
  logs_dir: logDir,
};

// Print critical runtime info BEFORE listening, so even a listen failure can be debugged.
console.log(`[probe-agent] config: ${startup.config_path}`);
console.log(`[probe-agent] profile: ${startup.profile}`);
console.log(`[probe-agent] logs: ${startup.logs_dir}`);
console.log(`[probe-agent] bind: ${startup.bind}`);
console.log(`[probe-agent] port: ${startup.port}`);

logger.info({ event_type: 'agent.start', ...startup });

const server = createServer(
  toRequestListener(handler, {
    origin: `http://${config.bind}:${config.port}`,
    onError: (err) => logger.error({ event_type: 'agent.bridge_failed', cause: err instanceof Error ? err.message : String(err) }),
  }),
);

server.on('error', (err) => {
  console.error(`[probe-agent] listen failed: ${err.message}`);
  logger.error({ event_type: 'agent.listen_failed', ...startup, cause: err.message });
  process.exit(1);
});

server.listen(config.port, config.bind, () => {
  console.log(`[probe-agent] listening on http://${config.bind}:${config.port}`);
});
