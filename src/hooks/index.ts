export { useSubmissionOrchestrator } from './useSubmissionOrchestrator';
export type {
  UseSubmissionOrchestratorOptions,
  UseSubmissionOrchestratorReturn,
} from './useSubmissionOrchestrator';
