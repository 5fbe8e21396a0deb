/**
 * Contract Pipeline Orchestrator
 *
 * Drives one document from pending to a terminal state:
 *
 *   pending -> processing (10) -> text extracted (50) -> four section calls
 *   -> results written (90) -> completed (100)
 *
 * Text extraction failure and an unusable basic section end the run as
 * failed. Other sections are zero-filled when their call fails. run() never
 * throws; every outcome ends up on the record.
 */

import { logger } from '../logger';
import { getContext, getCorrelationId, runWithContextAsync } from '../context';
import { describeError, SectionValidationError } from '../errors';
import { isTerminalStatus } from '../types';
import type { ScoringFailurePolicy } from '../config';
import type { ProcessContractJob } from '../queues';
import type { DocumentStore } from '../store/types';
import type { LocalFileStorage } from '../storage';
import type { TextExtractionClient } from '../clients/text-extraction';
import type { StructuredExtractionClient } from '../clients/structured-extraction';
import { getTemplateForStage, type ExtractionStage } from '../templates';
import { validateSection } from '../schemas';
import { combine, buildScoringSummary, type SectionPayload } from '../aggregation';
import {
  documentsProcessedCounter,
  sectionOutcomesCounter,
  stageDurationHistogram,
} from '../metrics';

export const PROGRESS = {
  STARTED: 10,
  TEXT_EXTRACTED: 50,
  RESULTS_WRITTEN: 90,
  COMPLETED: 100,
} as const;

export const INTERRUPTED_DETAIL = 'Processing interrupted before completion';
export const BASIC_UNAVAILABLE_DETAIL = 'structured extraction failed: basic contract data unavailable';
export const SCORING_UNAVAILABLE_DETAIL = 'structured extraction failed: scoring section unavailable';

export interface OrchestratorDeps {
  store: DocumentStore;
  storage: LocalFileStorage;
  textClient: TextExtractionClient;
  structuredClient: StructuredExtractionClient;
  scoringFailurePolicy: ScoringFailurePolicy;
}

type SectionStage = Exclude<ExtractionStage, 'simple'>;

export class PipelineOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(job: ProcessContractJob): Promise<void> {
    const documentId = job.document_id;
    const startTime = Date.now();

    try {
      const record = await this.deps.store.get(documentId);

      if (isTerminalStatus(record.status)) {
        logger.info('Document already terminal, skipping run', {
          document_id: documentId,
          status: record.status,
        });
        return;
      }

      // A previous run died after claiming the record
      if (record.status === 'processing') {
        logger.warn('Document found mid-run, marking interrupted', { document_id: documentId });
        await this.fail(documentId, INTERRUPTED_DETAIL);
        return;
      }

      await this.deps.store.updateStatus(documentId, { status: 'processing', progress: PROGRESS.STARTED });

      let rawText: string;
      try {
        rawText = await this.timedStage('text_extraction', async () => {
          const bytes = this.deps.storage.read(record.file_path);
          return this.deps.textClient.extract(bytes, record.filename);
        });
      } catch (err) {
        await this.fail(documentId, `text extraction failed: ${describeError(err)}`);
        return;
      }

      await this.deps.store.updateStatus(documentId, {
        status: 'processing',
        progress: PROGRESS.TEXT_EXTRACTED,
      });

      const basic = await this.runSection('basic', rawText);
      if (!basic) {
        await this.fail(documentId, BASIC_UNAVAILABLE_DETAIL);
        return;
      }

      const financial = await this.runSection('financial', rawText);
      const technical = await this.runSection('technical', rawText);
      const scoring = await this.runSection('scoring', buildScoringSummary(basic, financial, technical));

      if (!scoring && this.deps.scoringFailurePolicy === 'fail') {
        await this.fail(documentId, SCORING_UNAVAILABLE_DETAIL);
        return;
      }

      const analysis = combine(basic, financial, technical, scoring);
      await this.deps.store.updateResult(documentId, rawText, analysis);
      await this.deps.store.updateStatus(documentId, {
        status: 'processing',
        progress: PROGRESS.RESULTS_WRITTEN,
      });
      await this.deps.store.updateStatus(documentId, { status: 'completed', progress: PROGRESS.COMPLETED });

      documentsProcessedCounter.inc({ status: 'completed' });
      logger.info('Contract processed', {
        document_id: documentId,
        total_score: analysis.scoring.total_score,
        duration_seconds: (Date.now() - startTime) / 1000,
      });
    } catch (err) {
      logger.error('Pipeline run failed', err, { document_id: documentId });
      await this.fail(documentId, `Processing error: ${describeError(err)}`);
    }
  }

  /**
   * One structured extraction call plus schema check. Any failure yields
   * null so the caller can decide whether the section is required.
   */
  private async runSection(stage: SectionStage, input: string): Promise<SectionPayload> {
    try {
      const payload = await this.timedStage(stage, async () => {
        const result = await this.deps.structuredClient.extract(input, getTemplateForStage(stage));
        const validation = validateSection(stage, result);
        if (!validation.valid) {
          throw new SectionValidationError(stage, validation.errors ?? []);
        }
        return result;
      });
      sectionOutcomesCounter.inc({ section: stage, status: 'extracted' });
      return payload;
    } catch (err) {
      sectionOutcomesCounter.inc({ section: stage, status: 'missing' });
      logger.warn('Section extraction failed, continuing without it', {
        section: stage,
        error: describeError(err),
      });
      return null;
    }
  }

  private async timedStage<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const context = getContext();
    const startTime = Date.now();
    try {
      const result = await runWithContextAsync(
        { correlationId: getCorrelationId(), documentId: context?.documentId, stage },
        fn
      );
      stageDurationHistogram.observe({ stage, status: 'success' }, (Date.now() - startTime) / 1000);
      return result;
    } catch (err) {
      stageDurationHistogram.observe({ stage, status: 'error' }, (Date.now() - startTime) / 1000);
      throw err;
    }
  }

  private async fail(documentId: string, detail: string): Promise<void> {
    try {
      await this.deps.store.updateStatus(documentId, { status: 'failed', error_detail: detail });
      documentsProcessedCounter.inc({ status: 'failed' });
      logger.warn('Document marked failed', { document_id: documentId, error_detail: detail });
    } catch (err) {
      logger.error('Could not mark document failed', err, { document_id: documentId, error_detail: detail });
    }
  }
}
