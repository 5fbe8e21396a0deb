/**
 * Contract API
 *
 * Upload, status, results, listing, download and synchronous simple parse,
 * mounted under /api/v1. Collaborators are injected so the same app runs
 * against Postgres + BullMQ in production and in-process stand-ins in tests.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import { v4 as uuidv4 } from 'uuid';
import {
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  reportQueueMetrics,
  BullMqPipelineScheduler,
  QUEUE_NAMES,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  describeError,
  simpleParse,
  DocumentNotFoundError,
  TextExtractionError,
  type DocumentRecord,
  type DocumentStore,
  type LocalFileStorage,
  type PipelineScheduler,
  type ProcessContractJob,
  type TextExtractionClient,
  type StructuredExtractionClient,
  type UploadResponse,
  type DocumentListResponse,
} from '@contract-pipeline/shared';
import {
  correlationIdOf,
  parseListParams,
  receiveFile,
  sendError,
  toStatusResponse,
} from './lib/http';

export interface AppDeps {
  store: DocumentStore;
  storage: LocalFileStorage;
  scheduler: PipelineScheduler;
  textClient: TextExtractionClient;
  structuredClient: StructuredExtractionClient;
  maxFileSize: number;
}

export const SERVICE_NAME = 'contract-api';

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json());

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header ? header : ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  app.get('/', (req: Request, res: Response) => {
    res.json({ service: SERVICE_NAME, status: 'running', api: '/api/v1' });
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.store.ping();

      res.json({
        status: 'healthy',
        service: SERVICE_NAME,
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: SERVICE_NAME,
        database: 'disconnected',
        error: describeError(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      if (deps.scheduler instanceof BullMqPipelineScheduler) {
        await reportQueueMetrics([
          { name: QUEUE_NAMES.PROCESS_CONTRACT, queue: deps.scheduler.underlyingQueue },
        ]);
      }
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Failed to collect metrics', error);
      res.status(500).end();
    }
  });

  app.use('/api/v1', createContractsRouter(deps));

  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `No route for ${req.method} ${req.path}`);
  });

  return app;
}

function createContractsRouter(deps: AppDeps): express.Router {
  const router = express.Router();
  const intake = receiveFile(deps.maxFileSize);

  /**
   * POST /contracts/upload
   * Stores the file, creates the pending record and schedules the run
   */
  router.post('/contracts/upload', intake, async (req: Request, res: Response) => {
    const file = req.file;
    if (!file || !file.originalname) {
      sendError(res, 400, 'invalid_request', 'No file provided');
      return;
    }

    const documentId = uuidv4();

    try {
      const filePath = deps.storage.save(documentId, file.originalname, file.buffer);

      let record: DocumentRecord;
      try {
        record = await deps.store.create({
          document_id: documentId,
          filename: file.originalname,
          file_path: filePath,
          file_size: file.size,
          mime_type: file.mimetype || 'application/pdf',
        });
      } catch (error) {
        // No record points at the file, so nothing would ever read or clean it up
        deps.storage.remove(filePath);
        throw error;
      }

      const job: ProcessContractJob = {
        event_type: 'contract.uploaded',
        correlation_id: correlationIdOf(res),
        document_id: documentId,
        file_path: filePath,
        filename: file.originalname,
        submitted_at: new Date().toISOString(),
      };

      try {
        await deps.scheduler.schedule(job);
      } catch (error) {
        logger.error('Failed to schedule contract processing', error, { document_id: documentId });
        await deps.store.updateStatus(documentId, {
          status: 'failed',
          error_detail: `Scheduling failed: ${describeError(error)}`,
        });
        sendError(res, 500, 'internal_error', 'Failed to schedule contract processing');
        return;
      }

      logger.info('Contract uploaded and queued for processing', {
        document_id: documentId,
        filename: file.originalname,
        size_bytes: file.size,
      });

      const response: UploadResponse = {
        document_id: record.document_id,
        message: 'Contract uploaded successfully and queued for processing',
        status: record.status,
      };
      res.json(response);
    } catch (error) {
      logger.error('Failed to upload contract', error, { document_id: documentId });
      sendError(res, 500, 'internal_error', 'Failed to upload contract');
    }
  });

  /**
   * POST /contracts/simple-parse
   * Synchronous text extraction plus one flat-field call, no record kept
   */
  router.post('/contracts/simple-parse', intake, async (req: Request, res: Response) => {
    const file = req.file;
    if (!file || !file.originalname) {
      sendError(res, 400, 'invalid_request', 'No file provided');
      return;
    }

    try {
      const result = await simpleParse(deps, file.buffer, file.originalname);
      res.json(result);
    } catch (error) {
      if (error instanceof TextExtractionError) {
        sendError(res, 400, 'invalid_request', `Failed to extract text: ${error.message}`);
        return;
      }
      logger.error('Simple parse failed', error, { filename: file.originalname });
      sendError(res, 500, 'internal_error', 'Failed to parse contract');
    }
  });

  /**
   * GET /contracts
   * Newest first, optional status filter
   */
  router.get('/contracts', async (req: Request, res: Response) => {
    const params = parseListParams(req.query);
    if (!params.ok) {
      sendError(res, 400, 'invalid_request', params.message);
      return;
    }

    try {
      const page = await deps.store.list(params.value);
      const response: DocumentListResponse = {
        documents: page.records.map(toStatusResponse),
        total: page.total,
        page: page.page,
        limit: page.limit,
        has_next: page.has_next,
        has_prev: page.has_prev,
      };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list contracts', error);
      sendError(res, 500, 'internal_error', 'Failed to list contracts');
    }
  });

  /**
   * GET /contracts/:id/status
   */
  router.get('/contracts/:id/status', async (req: Request<{ id: string }>, res: Response) => {
    const { id } = req.params;

    try {
      const record = await deps.store.get(id);
      res.json(toStatusResponse(record));
    } catch (error) {
      if (error instanceof DocumentNotFoundError) {
        sendError(res, 404, 'not_found', 'Contract not found');
        return;
      }
      logger.error('Failed to get contract status', error, { document_id: id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve contract status');
    }
  });

  /**
   * GET /contracts/:id/download
   * Original bytes under the original filename
   */
  router.get('/contracts/:id/download', async (req: Request<{ id: string }>, res: Response) => {
    const { id } = req.params;

    try {
      const record = await deps.store.get(id);
      if (!deps.storage.exists(record.file_path)) {
        sendError(res, 404, 'not_found', 'Contract file not found');
        return;
      }

      res.attachment(record.filename);
      res.type(record.mime_type);
      res.send(deps.storage.read(record.file_path));
    } catch (error) {
      if (error instanceof DocumentNotFoundError) {
        sendError(res, 404, 'not_found', 'Contract not found');
        return;
      }
      logger.error('Failed to download contract', error, { document_id: id });
      sendError(res, 500, 'internal_error', 'Failed to download contract');
    }
  });

  /**
   * GET /contracts/:id
   * Full record, only once processing completed
   */
  router.get('/contracts/:id', async (req: Request<{ id: string }>, res: Response) => {
    const { id } = req.params;

    try {
      const record = await deps.store.get(id);
      if (record.status !== 'completed') {
        sendError(
          res,
          400,
          'not_ready',
          `Contract processing not complete. Current status: ${record.status}`
        );
        return;
      }
      res.json(record);
    } catch (error) {
      if (error instanceof DocumentNotFoundError) {
        sendError(res, 404, 'not_found', 'Contract not found');
        return;
      }
      logger.error('Failed to get contract data', error, { document_id: id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve contract');
    }
  });

  return router;
}
