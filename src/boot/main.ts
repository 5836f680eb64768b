/**
 * Service entry point
 */

import dotenv from 'dotenv';

import { createServer } from '@server/index';
import { createStateStore } from '@system/persistence';
import { now } from '@utils/time';
import { createNodeTimer } from '@utils/timer';

import { initialize } from './init';
import { loadConfig } from './loader';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig(process.env);

  const service = await initialize(config, {
    timer: createNodeTimer(),
    console: console,
    fetch: fetch,
    timeSource: now,
    store: createStateStore(config.STATE_FILE)
  });

  if (!service) {
    process.exitCode = 1;
    return;
  }

  const logger = service.logger;
  const app = createServer({
    controller: service.controller,
    apiToken: config.API_TOKEN,
    logger: logger.scoped('api'),
    timeSource: now
  });

  const server = app.listen(config.HTTP_PORT, () => {
    logger.info('HTTP API listening on port ' + config.HTTP_PORT);
  });

  await service.scheduler.catchUp();
  service.scheduler.start();

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(signal + ' received, shutting down');
    service.scheduler.stop();

    server.close(() => {
      service.store.flush()
        .then(() => logger.close())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('Shutdown failed: ' + (err instanceof Error ? err.message : String(err)));
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('FATAL: ' + (err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
