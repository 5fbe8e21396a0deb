/**
 * Error Types
 *
 * Store, client and validation errors raised inside the pipeline.
 */

import { isRecord } from './guards';
import type { DocumentStatus } from './types';

export class DuplicateIdError extends Error {
  constructor(public documentId: string) {
    super(`Document ${documentId} already exists`);
    this.name = 'DuplicateIdError';
  }
}

export class DocumentNotFoundError extends Error {
  constructor(public documentId: string) {
    super(`Document ${documentId} not found`);
    this.name = 'DocumentNotFoundError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public documentId: string,
    public from: DocumentStatus,
    public to: DocumentStatus
  ) {
    super(`Document ${documentId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ResultAlreadyWrittenError extends Error {
  constructor(public documentId: string) {
    super(`Extraction result for document ${documentId} is already written`);
    this.name = 'ResultAlreadyWrittenError';
  }
}

export type TextExtractionFailure = 'transport' | 'remote' | 'empty';

export class TextExtractionError extends Error {
  constructor(
    public reason: TextExtractionFailure,
    message: string
  ) {
    super(message);
    this.name = 'TextExtractionError';
  }
}

export type StructuredExtractionFailure = 'transport' | 'empty' | 'invalid_json';

export class StructuredExtractionError extends Error {
  constructor(
    public reason: StructuredExtractionFailure,
    message: string
  ) {
    super(message);
    this.name = 'StructuredExtractionError';
  }
}

export class SectionValidationError extends Error {
  constructor(
    public section: string,
    public errors: string[]
  ) {
    super(`${section} payload failed validation: ${errors.join('; ')}`);
    this.name = 'SectionValidationError';
  }
}

/**
 * Message of any thrown value, for logs and error_detail. Errors raised by
 * Node internals may come from another realm, so this reads the shape rather
 * than checking the prototype.
 */
export function describeError(error: unknown): string {
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return String(error);
}

/** `code` of a thrown value (SQLSTATE, errno name), when it carries one. */
export function errorCode(error: unknown): string | undefined {
  return isRecord(error) && typeof error.code === 'string' ? error.code : undefined;
}
