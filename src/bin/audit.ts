import { AUDIT_USAGE, runAudit } from '@/lib/cli/audit-command';
import { errorMessage, toPublicError } from '@/lib/errors/error';
import { logEvent, logEventToStderr } from '@/lib/logging/logger';

async function main() {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(AUDIT_USAGE);
    return 0;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const toStdout = !argv.includes('--out');
  return runAudit(argv, {
    runtimeEnv: process.env,
    // Keep stdout for the report when it is not written to a file.
    log: toStdout ? logEventToStderr : logEvent,
    writeStdout: (text) => process.stdout.write(text),
    signal: controller.signal,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logEventToStderr({
      level: 'error',
      service: 'cli',
      event_type: 'cli.crashed',
      error: toPublicError(err),
      cause: errorMessage(err),
    });
    process.exit(2);
  });
