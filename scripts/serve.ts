/**
 * Report server
 * Serves the latest report over HTTP, runs the daily schedule and a warm-up
 * run that does not hold up listening.
 *
 * Usage: npx tsx scripts/serve.ts [--web-only] [--no-email]
 */

import 'dotenv/config';
import { buildServer } from '../src/api/server';
import { createRuntime } from '../src/run/runtime';
import { DailyScheduler } from '../src/run/scheduler';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('serve');

async function main(): Promise<void> {
  const webOnly = process.argv.includes('--web-only');
  const notify = !process.argv.includes('--no-email');
  const { env, orchestrator, facade } = createRuntime({ notify });

  const scheduler = webOnly
    ? null
    : new DailyScheduler({
        timeZone: env.timeZone,
        onFire: () => orchestrator.trigger('scheduled'),
      });

  const app = buildServer(facade);

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    scheduler?.stop();
    app
      .close()
      .then(() => orchestrator.whenIdle())
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  orchestrator.warmUp();
  scheduler?.start();

  await app.listen({ port: env.port, host: '0.0.0.0' });
  logger.info(
    { port: env.port, timeZone: env.timeZone, scheduler: scheduler !== null, notify },
    'Report server listening'
  );
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Server failed to start');
  process.exitCode = 1;
});
