/**
 * One-shot Run Script
 * Fetches, scores, renders and publishes a single report, then exits.
 *
 * Usage: npx tsx scripts/run_daily.ts [--no-email]
 */

import 'dotenv/config';
import { createRuntime } from '../src/run/runtime';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_daily');

async function main(): Promise<number> {
  const notify = !process.argv.includes('--no-email');
  const { orchestrator, config } = createRuntime({ notify });

  logger.info(
    { universe: config.universeName, instruments: config.instruments.length, notify },
    'Starting one-shot run'
  );

  const outcome = await orchestrator.trigger('manual');
  if (outcome.status === 'completed') {
    logger.info(
      { runId: outcome.runId, file: outcome.artifact.filePath, degraded: outcome.degradedCount },
      'Report ready'
    );
    return 0;
  }

  logger.error({ outcome }, 'Run did not complete');
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Run crashed');
    process.exitCode = 1;
  });
