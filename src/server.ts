import { createApp } from './app.js';
import { createDependencies } from './bootstrap.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger, setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const app = createApp(await createDependencies(config));

  app.listen(config.port, () => {
    logger.info(`Control Assessment Service listening on port ${config.port}`);
  });
}

main().catch((err: unknown) => {
  logger.error(`Startup failed: ${errorMessage(err)}`);
  process.exit(1);
});
