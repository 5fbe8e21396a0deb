/**
 * Contract API entry point
 *
 * PIPELINE_MODE=queue hands runs to the worker service through BullMQ;
 * PIPELINE_MODE=inline runs them in this process.
 */

import {
  logger,
  config,
  createPipelineRuntime,
  BullMqPipelineScheduler,
  InProcessTaskSupervisor,
  type PipelineScheduler,
} from '@contract-pipeline/shared';
import { createApp, SERVICE_NAME } from './app';

const runtime = createPipelineRuntime(config);

const scheduler: PipelineScheduler =
  config.pipelineMode === 'inline'
    ? new InProcessTaskSupervisor((job) => runtime.orchestrator.run(job))
    : new BullMqPipelineScheduler();

const app = createApp({
  store: runtime.store,
  storage: runtime.storage,
  scheduler,
  textClient: runtime.textClient,
  structuredClient: runtime.structuredClient,
  maxFileSize: config.maxFileSize,
});

const server = app.listen(config.port, () => {
  logger.info('Contract API started', {
    service: SERVICE_NAME,
    port: config.port,
    pipeline_mode: config.pipelineMode,
    store_driver: config.storeDriver,
  });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await scheduler.close();
  await runtime.store.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
