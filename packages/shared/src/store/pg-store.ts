/**
 * PostgreSQL Document Store
 *
 * State rules are enforced in the UPDATE itself: a status write only matches
 * rows whose current status may move to the target, and results only match
 * rows that have none yet. A zero row count is then explained by a follow-up
 * read.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../logger';
import { dbQueryDurationHistogram } from '../metrics';
import { isRecord } from '../guards';
import {
  DocumentNotFoundError,
  DuplicateIdError,
  InvalidTransitionError,
  ResultAlreadyWrittenError,
  errorCode,
} from '../errors';
import {
  isDocumentStatus,
  type ContractAnalysis,
  type DocumentRecord,
  type ExtractionResult,
  type GapAnalysis,
  type NewDocumentRecord,
  type ScoreBreakdown,
} from '../types';
import { computePageInfo } from './pagination';
import {
  ALLOWED_SOURCES,
  type DocumentPage,
  type DocumentStore,
  type ListQuery,
  type StatusUpdate,
} from './types';

// ============================================================================
// SQL seam
// ============================================================================

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * The slice of a pg Pool the store talks to.
 */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  end(): Promise<void>;
}

export function poolExecutor(pool: Pool): SqlExecutor {
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    end: () => pool.end(),
  };
}

// ============================================================================
// Migrations location
// ============================================================================

// The .sql files are not copied by tsc, so a build under dist/ looks back at the sources.
const MIGRATIONS_CANDIDATES = [
  path.join(__dirname, 'migrations'),
  path.join(__dirname, '../../../../../packages/shared/src/store/migrations'),
  path.join(process.cwd(), 'packages/shared/src/store/migrations'),
];

export function resolveMigrationsDir(candidates: readonly string[] = MIGRATIONS_CANDIDATES): string {
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Migrations directory not found; looked in ${candidates.join(', ')}`);
  }
  return found;
}

// ============================================================================
// Row mapping
// ============================================================================

const UNIQUE_VIOLATION = '23505';
// Raised by a legacy UUID document_id column for ids that are not UUIDs
const INVALID_TEXT_REPRESENTATION = '22P02';

const COLUMNS = `document_id, filename, file_path, file_size, mime_type, status, progress,
  error_detail, raw_text, extraction_result, scoring, gap_analysis,
  created_at, updated_at, completed_at`;

// List pages carry status fields only; large result columns are left out.
const SUMMARY_COLUMNS = `document_id, filename, file_path, file_size, mime_type, status, progress,
  error_detail, NULL AS raw_text, NULL AS extraction_result, NULL AS scoring, NULL AS gap_analysis,
  created_at, updated_at, completed_at`;

type Row = Record<string, unknown>;

class RowShapeError extends Error {
  constructor(column: string, value: unknown) {
    super(`Unexpected value in column ${column}: ${JSON.stringify(value)}`);
    this.name = 'RowShapeError';
  }
}

function textColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw new RowShapeError(column, value);
  return value;
}

function nullableText(row: Row, column: string): string | null {
  return row[column] === null ? null : textColumn(row, column);
}

// DOUBLE PRECISION and INTEGER arrive as numbers; NUMERIC or BIGINT would arrive as strings
function numberColumn(row: Row, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) throw new RowShapeError(column, value);
  return parsed;
}

function timestampColumn(row: Row, column: string): string {
  const value = row[column];
  const date = typeof value === 'string' ? new Date(value) : value;
  if (!(date instanceof Date) || Number.isNaN(date.getTime())) throw new RowShapeError(column, value);
  return date.toISOString();
}

function nullableTimestamp(row: Row, column: string): string | null {
  return row[column] === null ? null : timestampColumn(row, column);
}

function jsonColumn<T>(row: Row, column: string, guard: (value: unknown) => value is T): T | null {
  const raw = row[column];
  if (raw === null || raw === undefined) return null;
  // JSONB is parsed by the driver; plain JSON text is not
  const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (!guard(value)) throw new RowShapeError(column, value);
  return value;
}

function isExtractionResult(value: unknown): value is ExtractionResult {
  return isRecord(value) && Array.isArray(value.parties) && isRecord(value.section_status);
}

function isScoreBreakdown(value: unknown): value is ScoreBreakdown {
  return isRecord(value) && typeof value.total_score === 'number';
}

function isGapAnalysis(value: unknown): value is GapAnalysis {
  return isRecord(value) && Array.isArray(value.missing_fields) && Array.isArray(value.recommendations);
}

export function toRecord(row: unknown): DocumentRecord {
  if (!isRecord(row)) throw new RowShapeError('*', row);

  const documentId = textColumn(row, 'document_id');
  const status = row.status;
  if (!isDocumentStatus(status)) {
    throw new Error(`Document ${documentId} has unknown status ${String(status)}`);
  }

  const record: DocumentRecord = {
    document_id: documentId,
    filename: textColumn(row, 'filename'),
    file_path: textColumn(row, 'file_path'),
    file_size: numberColumn(row, 'file_size'),
    mime_type: textColumn(row, 'mime_type'),
    status,
    progress: numberColumn(row, 'progress'),
    created_at: timestampColumn(row, 'created_at'),
    updated_at: timestampColumn(row, 'updated_at'),
  };

  const errorDetail = nullableText(row, 'error_detail');
  const rawText = nullableText(row, 'raw_text');
  const extractionResult = jsonColumn(row, 'extraction_result', isExtractionResult);
  const scoring = jsonColumn(row, 'scoring', isScoreBreakdown);
  const gapAnalysis = jsonColumn(row, 'gap_analysis', isGapAnalysis);
  const completedAt = nullableTimestamp(row, 'completed_at');

  if (errorDetail !== null) record.error_detail = errorDetail;
  if (rawText !== null) record.raw_text = rawText;
  if (extractionResult !== null) record.extraction_result = extractionResult;
  if (scoring !== null) record.scoring = scoring;
  if (gapAnalysis !== null) record.gap_analysis = gapAnalysis;
  if (completedAt !== null) record.completed_at = completedAt;
  return record;
}

function totalOf(rows: unknown[]): number {
  const first = rows[0];
  return isRecord(first) ? numberColumn(first, 'total') : 0;
}

// ============================================================================
// Store
// ============================================================================

export interface PgDocumentStoreOptions {
  now?: () => Date;
}

export class PgDocumentStore implements DocumentStore {
  private readonly now: () => Date;

  constructor(
    private readonly sql: SqlExecutor,
    options: PgDocumentStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async create(input: NewDocumentRecord): Promise<DocumentRecord> {
    const timestamp = this.now();
    try {
      const result = await this.timed('create', () =>
        this.sql.query(
          `INSERT INTO contract_documents
             (document_id, filename, file_path, file_size, mime_type, status, progress, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, 'pending', 0, $6, $6)
           RETURNING ${COLUMNS}`,
          [input.document_id, input.filename, input.file_path, input.file_size, input.mime_type, timestamp]
        )
      );
      return toRecord(result.rows[0]);
    } catch (error) {
      if (errorCode(error) === UNIQUE_VIOLATION) {
        throw new DuplicateIdError(input.document_id);
      }
      throw error;
    }
  }

  async get(documentId: string): Promise<DocumentRecord> {
    const result = await this.keyed(
      documentId,
      'get',
      `SELECT ${COLUMNS} FROM contract_documents WHERE document_id = $1`,
      [documentId]
    );
    if (result.rows.length === 0) {
      throw new DocumentNotFoundError(documentId);
    }
    return toRecord(result.rows[0]);
  }

  async updateStatus(documentId: string, update: StatusUpdate): Promise<DocumentRecord> {
    const result = await this.keyed(
      documentId,
      'update_status',
      `UPDATE contract_documents SET
         status = $2,
         progress = GREATEST(progress, COALESCE($3, progress)),
         error_detail = CASE WHEN $2 = 'failed' THEN COALESCE($4, error_detail) ELSE error_detail END,
         raw_text = CASE WHEN $2 = 'failed' THEN NULL ELSE raw_text END,
         extraction_result = CASE WHEN $2 = 'failed' THEN NULL ELSE extraction_result END,
         scoring = CASE WHEN $2 = 'failed' THEN NULL ELSE scoring END,
         gap_analysis = CASE WHEN $2 = 'failed' THEN NULL ELSE gap_analysis END,
         completed_at = CASE WHEN $2 = 'completed' THEN $5 ELSE completed_at END,
         updated_at = $5
       WHERE document_id = $1 AND status = ANY($6::text[])
       RETURNING ${COLUMNS}`,
      [
        documentId,
        update.status,
        update.progress ?? null,
        update.error_detail ?? null,
        this.now(),
        ALLOWED_SOURCES[update.status],
      ]
    );

    if (result.rows.length > 0) {
      return toRecord(result.rows[0]);
    }

    const current = await this.get(documentId);
    throw new InvalidTransitionError(documentId, current.status, update.status);
  }

  async updateResult(documentId: string, rawText: string, analysis: ContractAnalysis): Promise<void> {
    const result = await this.keyed(
      documentId,
      'update_result',
      `UPDATE contract_documents SET
         raw_text = $2,
         extraction_result = $3,
         scoring = $4,
         gap_analysis = $5,
         updated_at = $6
       WHERE document_id = $1 AND raw_text IS NULL AND extraction_result IS NULL`,
      [
        documentId,
        rawText,
        JSON.stringify(analysis.extraction_result),
        JSON.stringify(analysis.scoring),
        JSON.stringify(analysis.gap_analysis),
        this.now(),
      ]
    );

    if (!result.rowCount) {
      // Raises DocumentNotFoundError when the row is absent
      await this.get(documentId);
      throw new ResultAlreadyWrittenError(documentId);
    }
  }

  async list(query: ListQuery): Promise<DocumentPage> {
    const filter = query.status ? 'WHERE status = $1' : '';
    const filterParams = query.status ? [query.status] : [];

    const countResult = await this.timed('count', () =>
      this.sql.query(`SELECT COUNT(*)::int AS total FROM contract_documents ${filter}`, filterParams)
    );
    const total = totalOf(countResult.rows);
    const info = computePageInfo(query.page, query.limit, total);

    const limitIndex = filterParams.length + 1;
    const rowsResult = await this.timed('list', () =>
      this.sql.query(
        `SELECT ${SUMMARY_COLUMNS} FROM contract_documents ${filter}
         ORDER BY created_at DESC, document_id DESC
         LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`,
        [...filterParams, query.limit, info.offset]
      )
    );

    return {
      records: rowsResult.rows.map(toRecord),
      total,
      page: query.page,
      limit: query.limit,
      has_next: info.has_next,
      has_prev: info.has_prev,
    };
  }

  async ping(): Promise<void> {
    await this.sql.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.sql.end();
  }

  /** Runs a statement addressed by document id; an id the column type rejects is an unknown id. */
  private async keyed(
    documentId: string,
    operation: string,
    text: string,
    values: unknown[]
  ): Promise<SqlResult> {
    try {
      return await this.timed(operation, () => this.sql.query(text, values));
    } catch (error) {
      if (errorCode(error) === INVALID_TEXT_REPRESENTATION) {
        throw new DocumentNotFoundError(documentId);
      }
      throw error;
    }
  }

  private async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await fn();
    } finally {
      dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
    }
  }
}

export function createPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

/**
 * Apply every .sql file in the migrations directory, in name order.
 */
export async function runMigrations(
  pool: Pool,
  migrationsDir: string = resolveMigrationsDir()
): Promise<string[]> {
  const migrationFiles = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const client = await pool.connect();
  try {
    for (const file of migrationFiles) {
      logger.info('Running migration', { file });
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      await client.query(sql);
      logger.info('Migration complete', { file });
    }
  } finally {
    client.release();
  }

  return migrationFiles;
}
