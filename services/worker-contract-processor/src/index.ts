/**
 * Contract Processor Worker
 *
 * Consumes process_contract jobs and runs the pipeline for each document.
 * The orchestrator records every failure on the document and resolves, so
 * jobs complete once the run has ended either way.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createPipelineRuntime,
  serveMetrics,
  QUEUE_NAMES,
  type ProcessContractJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@contract-pipeline/shared';

const runtime = createPipelineRuntime(config);

/**
 * Process process_contract job
 */
async function processContract(job: Job<ProcessContractJob, void>): Promise<void> {
  const { correlation_id, document_id, filename } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing process_contract', {
      jobId: job.id,
      document_id,
      filename,
    });

    await runtime.orchestrator.run(job.data);

    const duration = (Date.now() - startTime) / 1000;
    jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PROCESS_CONTRACT, status: 'success' });
    jobDurationHistogram.observe({ queue: QUEUE_NAMES.PROCESS_CONTRACT, status: 'success' }, duration);
  });
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort);

// Create and start the worker
const worker = createWorker<ProcessContractJob, void>(QUEUE_NAMES.PROCESS_CONTRACT, processContract);

logger.info('Contract processor worker started');

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await runtime.store.close();
  metricsServer.close();
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
