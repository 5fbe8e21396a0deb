/**
 * In-process Document Store
 *
 * Backs PIPELINE_MODE=inline deployments without a database, and the tests.
 * Records are copied on the way in and out so callers never share state with
 * the store.
 */

import {
  DocumentNotFoundError,
  DuplicateIdError,
  InvalidTransitionError,
  ResultAlreadyWrittenError,
} from '../errors';
import type { ContractAnalysis, DocumentRecord, NewDocumentRecord } from '../types';
import { computePageInfo } from './pagination';
import {
  canTransition,
  type DocumentPage,
  type DocumentStore,
  type ListQuery,
  type StatusUpdate,
} from './types';

export interface MemoryDocumentStoreOptions {
  now?: () => Date;
}

/**
 * Newest first; equal timestamps fall back to the id so pages are stable.
 */
export function compareNewestFirst(a: DocumentRecord, b: DocumentRecord): number {
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? 1 : -1;
  if (a.document_id === b.document_id) return 0;
  return a.document_id < b.document_id ? 1 : -1;
}

export class MemoryDocumentStore implements DocumentStore {
  private readonly records = new Map<string, DocumentRecord>();
  private readonly now: () => Date;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(input: NewDocumentRecord): Promise<DocumentRecord> {
    if (this.records.has(input.document_id)) {
      throw new DuplicateIdError(input.document_id);
    }

    const timestamp = this.now().toISOString();
    const record: DocumentRecord = {
      ...input,
      status: 'pending',
      progress: 0,
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.records.set(record.document_id, record);
    return structuredClone(record);
  }

  async get(documentId: string): Promise<DocumentRecord> {
    return structuredClone(this.require(documentId));
  }

  async updateStatus(documentId: string, update: StatusUpdate): Promise<DocumentRecord> {
    const current = this.require(documentId);
    if (!canTransition(current.status, update.status)) {
      throw new InvalidTransitionError(documentId, current.status, update.status);
    }

    const timestamp = this.now().toISOString();
    const next: DocumentRecord = {
      ...current,
      status: update.status,
      progress: Math.max(current.progress, update.progress ?? current.progress),
      updated_at: timestamp,
    };
    if (update.status === 'failed') {
      // A failed document carries no result, even one written before the failure
      delete next.raw_text;
      delete next.extraction_result;
      delete next.scoring;
      delete next.gap_analysis;
      if (update.error_detail !== undefined) next.error_detail = update.error_detail;
    }
    if (update.status === 'completed') {
      next.completed_at = timestamp;
    }

    this.records.set(documentId, next);
    return structuredClone(next);
  }

  async updateResult(documentId: string, rawText: string, analysis: ContractAnalysis): Promise<void> {
    const current = this.require(documentId);
    if (current.raw_text !== undefined || current.extraction_result !== undefined) {
      throw new ResultAlreadyWrittenError(documentId);
    }

    this.records.set(documentId, {
      ...current,
      raw_text: rawText,
      extraction_result: structuredClone(analysis.extraction_result),
      scoring: structuredClone(analysis.scoring),
      gap_analysis: structuredClone(analysis.gap_analysis),
      updated_at: this.now().toISOString(),
    });
  }

  async list(query: ListQuery): Promise<DocumentPage> {
    const matching = Array.from(this.records.values())
      .filter((record) => !query.status || record.status === query.status)
      .sort(compareNewestFirst);

    const info = computePageInfo(query.page, query.limit, matching.length);
    return {
      records: matching.slice(info.offset, info.offset + query.limit).map((r) => structuredClone(r)),
      total: matching.length,
      page: query.page,
      limit: query.limit,
      has_next: info.has_next,
      has_prev: info.has_prev,
    };
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    this.records.clear();
  }

  private require(documentId: string): DocumentRecord {
    const record = this.records.get(documentId);
    if (!record) {
      throw new DocumentNotFoundError(documentId);
    }
    return record;
  }
}
