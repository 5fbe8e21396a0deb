/**
 * Production wiring shared by the API and the worker.
 */

import type { Config } from './config';
import { logger } from './logger';
import { createPool, PgDocumentStore, poolExecutor } from './store/pg-store';
import { MemoryDocumentStore } from './store/memory-store';
import type { DocumentStore } from './store/types';
import { LocalFileStorage } from './storage';
import { OcrSpaceClient } from './clients/text-extraction';
import { OpenAiStructuredExtractionClient } from './clients/structured-extraction';
import { PipelineOrchestrator } from './pipeline/orchestrator';

export function createStore(config: Config): DocumentStore {
  if (config.storeDriver === 'memory') {
    logger.warn('Using in-memory document store; records are lost on restart');
    return new MemoryDocumentStore();
  }
  return new PgDocumentStore(poolExecutor(createPool(config.databaseUrl)));
}

export interface PipelineRuntime {
  store: DocumentStore;
  storage: LocalFileStorage;
  textClient: OcrSpaceClient;
  structuredClient: OpenAiStructuredExtractionClient;
  orchestrator: PipelineOrchestrator;
}

export function createPipelineRuntime(config: Config): PipelineRuntime {
  const store = createStore(config);
  const storage = new LocalFileStorage(config.uploadDir);
  const textClient = new OcrSpaceClient({
    apiKey: config.ocrSpaceApiKey,
    url: config.ocrSpaceUrl,
    timeoutMs: config.ocrRequestTimeoutMs,
  });
  const structuredClient = new OpenAiStructuredExtractionClient({
    apiKey: config.openaiApiKey,
    model: config.llmModelText,
    timeoutMs: config.llmRequestTimeoutMs,
  });
  const orchestrator = new PipelineOrchestrator({
    store,
    storage,
    textClient,
    structuredClient,
    scoringFailurePolicy: config.scoringFailurePolicy,
  });

  return { store, storage, textClient, structuredClient, orchestrator };
}
