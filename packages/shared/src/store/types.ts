/**
 * Document Record Store contract
 */

import type { ContractAnalysis, DocumentRecord, DocumentStatus, NewDocumentRecord } from '../types';

export interface StatusUpdate {
  status: DocumentStatus;
  progress?: number;
  error_detail?: string;
}

export interface ListQuery {
  page: number;
  limit: number;
  status?: DocumentStatus;
}

export interface DocumentPage {
  records: DocumentRecord[];
  total: number;
  page: number;
  limit: number;
  has_next: boolean;
  has_prev: boolean;
}

/**
 * Durable record of each document. Operations on different ids are
 * independent; status writes that leave a terminal state are rejected.
 */
export interface DocumentStore {
  create(record: NewDocumentRecord): Promise<DocumentRecord>;
  get(documentId: string): Promise<DocumentRecord>;
  updateStatus(documentId: string, update: StatusUpdate): Promise<DocumentRecord>;
  updateResult(documentId: string, rawText: string, analysis: ContractAnalysis): Promise<void>;
  list(query: ListQuery): Promise<DocumentPage>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

/** Source states each target state may be entered from. */
export const ALLOWED_SOURCES: Record<DocumentStatus, readonly DocumentStatus[]> = {
  pending: [],
  processing: ['pending', 'processing'],
  completed: ['processing'],
  failed: ['pending', 'processing'],
};

export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  return ALLOWED_SOURCES[to].includes(from);
}
