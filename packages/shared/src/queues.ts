/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, queue factory functions, and the queue-backed
 * pipeline scheduler.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  PROCESS_CONTRACT: 'process_contract',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * process_contract - Enqueued by the API once the record exists as pending
 */
export interface ProcessContractJob {
  event_type: 'contract.uploaded';
  correlation_id: string;
  document_id: string;
  file_path: string;
  filename: string;
  submitted_at: string;
}

/**
 * Hands a pipeline run off so that it proceeds independently of the
 * submitting request.
 */
export interface PipelineScheduler {
  schedule(job: ProcessContractJob): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (err) {
      logger.warn('Invalid REDIS_URL, using host/port', { error: String(err) });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

/**
 * One attempt per job: the orchestrator records every failure on the document
 * and resolves, so a BullMQ retry would only replay a run that already ended.
 */
export const PROCESS_CONTRACT_JOB_OPTIONS = {
  attempts: 1,
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions: PROCESS_CONTRACT_JOB_OPTIONS,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('stalled', (jobId) => {
    logger.warn('Job stalled, will be redelivered', { queue: queueName, jobId });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency,
  });

  return worker;
}

// ============================================================================
// Queue Metrics
// ============================================================================

export async function getQueueMetrics(queue: Queue): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}

// ============================================================================
// Queue-backed Scheduler
// ============================================================================

/**
 * Enqueues process_contract jobs for the worker service. The document id is
 * the job id, so a second submission of the same document is dropped by Redis.
 */
export class BullMqPipelineScheduler implements PipelineScheduler {
  constructor(
    private readonly queue: Queue<ProcessContractJob, void> = createQueue<ProcessContractJob, void>(
      QUEUE_NAMES.PROCESS_CONTRACT
    )
  ) {}

  async schedule(job: ProcessContractJob): Promise<void> {
    await this.queue.add('process_contract', job, { jobId: job.document_id });

    logger.info('Enqueued process_contract job', {
      document_id: job.document_id,
      queue: QUEUE_NAMES.PROCESS_CONTRACT,
    });
  }

  get underlyingQueue(): Queue<ProcessContractJob, void> {
    return this.queue;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
