/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, createLogger, type Logger, type LogContext } from './logger';

// Config
export {
  config,
  loadConfig,
  type Config,
  type PipelineMode,
  type StoreDriver,
  type ScoringFailurePolicy,
  type LogLevel,
  LOG_LEVELS,
} from './config';

// Types
export * from './types';
export { isRecord, type JsonObject } from './guards';

// Errors
export {
  DuplicateIdError,
  DocumentNotFoundError,
  InvalidTransitionError,
  ResultAlreadyWrittenError,
  TextExtractionError,
  StructuredExtractionError,
  SectionValidationError,
  describeError,
  errorCode,
  type TextExtractionFailure,
  type StructuredExtractionFailure,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  PROCESS_CONTRACT_JOB_OPTIONS,
  type QueueName,
  type ProcessContractJob,
  type PipelineScheduler,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  BullMqPipelineScheduler,
  type WorkerOptions,
} from './queues';
export { InProcessTaskSupervisor, type PipelineRunner } from './supervisor';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  stageDurationHistogram,
  sectionOutcomesCounter,
  ocrRequestsCounter,
  ocrRequestDurationHistogram,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateSection, SECTION_SCHEMA_FILES, type ValidationResult } from './schemas';

// Templates (sectioned extraction)
export {
  getTemplateForStage,
  truncateInput,
  renderUserPrompt,
  BASIC_TEMPLATE,
  FINANCIAL_TEMPLATE,
  TECHNICAL_TEMPLATE,
  SCORING_TEMPLATE,
  SIMPLE_TEMPLATE,
  type ExtractionStage,
  type ExtractionTemplate,
} from './templates';

// Clients
export * from './clients';

// Store
export * from './store';
export { LocalFileStorage } from './storage';

// Aggregation
export * from './aggregation';

// Pipeline
export * from './pipeline';
export { createStore, createPipelineRuntime, type PipelineRuntime } from './runtime';
