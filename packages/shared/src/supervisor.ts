/**
 * In-process Task Supervisor
 *
 * Runs pipeline jobs inside the API process (PIPELINE_MODE=inline). Runs are
 * started on a later tick than the request that scheduled them, and tracked
 * until they settle so shutdown can wait for them.
 */

import { logger } from './logger';
import { runWithContextAsync } from './context';
import type { PipelineScheduler, ProcessContractJob } from './queues';

export type PipelineRunner = (job: ProcessContractJob) => Promise<void>;

export class InProcessTaskSupervisor implements PipelineScheduler {
  private readonly inFlight = new Map<string, Promise<void>>();
  private closed = false;

  constructor(private readonly runner: PipelineRunner) {}

  async schedule(job: ProcessContractJob): Promise<void> {
    if (this.closed) {
      throw new Error('Task supervisor is shut down');
    }

    if (this.inFlight.has(job.document_id)) {
      logger.warn('Run already in flight, ignoring duplicate schedule', {
        document_id: job.document_id,
      });
      return;
    }

    const task = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() =>
        runWithContextAsync(
          { correlationId: job.correlation_id, documentId: job.document_id },
          () => this.runner(job)
        )
      )
      .catch((err: unknown) => {
        logger.error('Supervised run rejected', err, { document_id: job.document_id });
      })
      .finally(() => {
        this.inFlight.delete(job.document_id);
      });

    this.inFlight.set(job.document_id, task);
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolve once every run scheduled so far has settled.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight.values()));
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }
}
