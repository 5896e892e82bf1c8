import 'dotenv/config';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { buildServer } from './server';
import { assertRuntimeEnv, runtimeWarnings, shouldRunRuntimePreflight } from './runtimePreflight';

async function main() {
  if (shouldRunRuntimePreflight(process.env)) {
    assertRuntimeEnv(process.env, {
      allowNonProd: process.env.ALLOW_NON_PROD === '1',
      allowMemoryInProduction: process.env.ALLOW_MEMORY_IN_PRODUCTION === '1'
    });
  }

  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  runtimeWarnings(process.env).forEach((warning) => logger.warn(warning));

  const app = buildServer({ config, logger });
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
