import { config as loadEnv } from 'dotenv';
import { resolveConfig } from './config';
import { runSession } from './pipeline';
import { createLogger, setLogLevel } from './logger';

const log = createLogger('CLI');

async function main() {
  loadEnv();
  const config = resolveConfig();
  setLogLevel(config.logLevel);
  await runSession(config);
}

main().catch((error: unknown) => {
  log.error(error instanceof Error ? error.message : String(error), error);
  process.exitCode = 1;
});
