/**
 * Process entry point.
 *
 *   node dist/src/main.js          run the scheduler and the health server
 *   node dist/src/main.js --once   run the report pipeline now and exit
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { createProductionContainer } from './container.production.js';
import { createHealthApp, listen, close } from './server.js';
import { ConfigError, errorMessage } from './errors.js';

async function runOnce(): Promise<number> {
  const container = createProductionContainer(loadConfig(process.env));
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const summary = await container.pipeline.run({ signal: controller.signal });
  await container.logProvider.flush();
  return summary.aborted ? 1 : 0;
}

async function serve(): Promise<void> {
  const config = loadConfig(process.env);
  const container = createProductionContainer(config);
  const logger = container.logProvider;

  container.scheduler.start();
  const server = await listen(createHealthApp(container), config.healthPort);
  logger.info('Health server listening', { port: config.healthPort });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    Promise.all([container.scheduler.stop(), close(server)])
      .then(() => logger.flush())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  try {
    if (process.argv.includes('--once')) {
      process.exitCode = await runOnce();
    } else {
      await serve();
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error('Fatal error:', errorMessage(err));
    }
    process.exitCode = 1;
  }
}

void main();
