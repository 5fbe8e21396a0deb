export {
  ALLOWED_SOURCES,
  canTransition,
  type DocumentStore,
  type DocumentPage,
  type ListQuery,
  type StatusUpdate,
} from './types';
export { computePageInfo, type PageInfo } from './pagination';
export { MemoryDocumentStore, compareNewestFirst, type MemoryDocumentStoreOptions } from './memory-store';
export {
  PgDocumentStore,
  createPool,
  poolExecutor,
  runMigrations,
  resolveMigrationsDir,
  toRecord,
  type SqlExecutor,
  type SqlResult,
  type PgDocumentStoreOptions,
} from './pg-store';
