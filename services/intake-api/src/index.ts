/**
 * Intake API Server
 */

import { config, createPipeline, logger } from '@docintake/shared';
import { createApp } from './app';
import { createPool, PostgresRecordStore } from './lib/db';

const pool = createPool();
const store = new PostgresRecordStore(pool);
const orchestrator = createPipeline({ store });
const app = createApp({ orchestrator, store });

const server = app.listen(config.port, () => {
  logger.info('Intake API started', {
    port: config.port,
    classifier_strategy: config.classifierStrategy,
  });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await store.close();
  process.exit(0);
}

function handleSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));
