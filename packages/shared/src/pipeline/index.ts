export {
  PipelineOrchestrator,
  PROGRESS,
  INTERRUPTED_DETAIL,
  BASIC_UNAVAILABLE_DETAIL,
  SCORING_UNAVAILABLE_DETAIL,
  type OrchestratorDeps,
} from './orchestrator';
export { simpleParse, type SimpleParseDeps } from './simple-parse';
