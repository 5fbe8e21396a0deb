/**
 * Prometheus Metrics
 *
 * Metrics for monitoring queue depth, pipeline stages, and system health.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { describeError } from './errors';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: describeError(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'contract_pipeline_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const queueMetricsGauge = new promClient.Gauge({
  name: 'contract_pipeline_queue_metrics',
  help: 'Queue metrics by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'contract_pipeline_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'contract_pipeline_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'contract_pipeline_documents_processed_total',
  help: 'Total number of documents that reached a terminal state',
  labelNames: ['status'],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'contract_pipeline_stage_duration_seconds',
  help: 'Duration of a single pipeline stage',
  labelNames: ['stage', 'status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const sectionOutcomesCounter = new promClient.Counter({
  name: 'contract_pipeline_section_outcomes_total',
  help: 'Structured extraction section calls by outcome',
  labelNames: ['section', 'status'],
  registers: [register],
});

export const ocrRequestsCounter = new promClient.Counter({
  name: 'contract_pipeline_ocr_requests_total',
  help: 'Total number of OCR requests',
  labelNames: ['status'],
  registers: [register],
});

export const ocrRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_pipeline_ocr_request_duration_seconds',
  help: 'Duration of OCR requests',
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'contract_pipeline_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_pipeline_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'contract_pipeline_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'contract_pipeline_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'contract_pipeline_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths and state metrics to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      const depth = m.waiting + m.active;
      queueDepthGauge.set({ queue: name }, depth);
      queueMetricsGauge.set({ queue: name, state: 'waiting' }, m.waiting);
      queueMetricsGauge.set({ queue: name, state: 'active' }, m.active);
      queueMetricsGauge.set({ queue: name, state: 'completed' }, m.completed);
      queueMetricsGauge.set({ queue: name, state: 'failed' }, m.failed);
      queueMetricsGauge.set({ queue: name, state: 'delayed' }, m.delayed);
    } catch (err) {
      logger.warn('Queue metrics unavailable', { queue: name, error: String(err) });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
