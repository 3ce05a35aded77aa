/**
 * src/index.ts
 *
 * Process entrypoint: config -> app -> listen, plus graceful shutdown
 * (in-flight audit writes, Redis and Postgres are drained by `close`).
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  const address = await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info('server.listening', { flow: 'server', address, env: config.nodeEnv });

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;

    logger.info('server.shutdown', { flow: 'server', signal });
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('server.shutdown_failed', { flow: 'server', err });
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { flow: 'server', err });
  process.exit(1);
});
