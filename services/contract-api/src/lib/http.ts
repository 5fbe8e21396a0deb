/**
 * HTTP helpers: error envelopes, query parsing and multipart intake.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import {
  getCorrelationId,
  runWithContext,
  isDocumentStatus,
  type DocumentRecord,
  type DocumentStatus,
  type ErrorCode,
  type ErrorEnvelope,
  type StatusResponse,
} from '@contract-pipeline/shared';

export function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

export function sendError(res: Response, status: number, code: ErrorCode, message: string): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(envelope);
}

export function toStatusResponse(record: DocumentRecord): StatusResponse {
  const response: StatusResponse = {
    document_id: record.document_id,
    status: record.status,
    progress: record.progress,
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
  if (record.error_detail !== undefined) {
    response.error_detail = record.error_detail;
  }
  return response;
}

// ============================================================================
// List query
// ============================================================================

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface ListParams {
  page: number;
  limit: number;
  status?: DocumentStatus;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

function single(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parsePositiveInt(raw: unknown, name: string, fallback: number, max?: number): ParseResult<number> {
  if (raw === undefined) return { ok: true, value: fallback };
  const text = single(raw);
  if (text === undefined || !/^\d+$/.test(text)) {
    return { ok: false, message: `${name} must be a positive integer` };
  }
  const value = parseInt(text, 10);
  if (value < 1 || (max !== undefined && value > max)) {
    return { ok: false, message: max ? `${name} must be between 1 and ${max}` : `${name} must be at least 1` };
  }
  return { ok: true, value };
}

/**
 * page >= 1, 1 <= limit <= 100, status one of the known values.
 */
export function parseListParams(query: Request['query']): ParseResult<ListParams> {
  const page = parsePositiveInt(query.page, 'page', 1);
  if (!page.ok) return page;

  const limit = parsePositiveInt(query.limit, 'limit', DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
  if (!limit.ok) return limit;

  if (query.status === undefined) {
    return { ok: true, value: { page: page.value, limit: limit.value } };
  }

  const status = single(query.status);
  if (!isDocumentStatus(status)) {
    return {
      ok: false,
      message: 'Invalid status. Must be one of: pending, processing, completed, failed',
    };
  }
  return { ok: true, value: { page: page.value, limit: limit.value, status } };
}

// ============================================================================
// Multipart intake
// ============================================================================

/**
 * Accept a single `file` field held in memory. Oversized files are answered
 * with 413 before any handler runs; the request context is restored for the
 * handler since multer's stream callbacks run outside it.
 */
export function receiveFile(maxFileSize: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileSize, files: 1 },
  }).single('file');

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
        const maxMb = (maxFileSize / 1024 / 1024).toFixed(1);
        sendError(res, 413, 'payload_too_large', `File too large. Maximum size is ${maxMb}MB`);
        return;
      }
      if (err) {
        sendError(res, 400, 'invalid_request', err instanceof Error ? err.message : 'Malformed upload');
        return;
      }
      runWithContext({ correlationId: correlationIdOf(res) }, () => next());
    });
  };
}
