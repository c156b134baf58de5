/**
 * asset-handover-form
 *
 * Browser form that collects an asset handover request, validates it,
 * submits it and offers the generated document for download while the
 * server streams its progress.
 *
 * @example
 * ```tsx
 * import { AssetHandoverForm, loadFormConfigFromElement } from 'asset-handover-form';
 *
 * function App() {
 *   return <AssetHandoverForm config={loadFormConfigFromElement(document, 'form-config')} />;
 * }
 * ```
 */

// Import default styles (extracted to separate CSS file during build)
import './styles/default.css';

// Main form component
export {
  AssetHandoverForm,
  DEFAULT_ROLE_OPTIONS,
  DEFAULT_DEPARTMENT_OPTIONS,
  type AssetHandoverFormProps,
} from './components/AssetHandoverForm';

// Helper components (for custom layouts)
export { FieldWrapper, fieldInputId } from './components/FieldWrapper';
export { AssetGroupList } from './components/AssetGroupList';
export { NoticeStack } from './components/NoticeStack';
export { ProgressOverlay } from './components/ProgressOverlay';
export { SuccessOverlay } from './components/SuccessOverlay';

// Hooks
export * from './hooks';

// Framework-agnostic core
export {
  SubmissionOrchestrator,
  formatErrorCount,
  describeTransportFailure,
  SUBMIT_LABEL,
  SUBMIT_BUSY_LABEL,
  type FormEffects,
  type OrchestratorSnapshot,
  type SubmissionOrchestratorOptions,
  type SubmitControl,
} from './core/submission-orchestrator';
export { FormState, SCALAR_FIELDS, parseFieldKey } from './core/form-state';
export { FieldGroupManager, BASE_GROUP_ID } from './core/field-group-manager';
export { buildGroupView, groupFieldKey, type FieldGroupView } from './core/field-group-view';
export { ErrorPresenter } from './core/error-presenter';
export { resolveRule, validateValue } from './core/field-validator';
export {
  DEFAULT_RULES,
  FIELD_LABELS,
  OTHER_ROLE_VALUE,
  type ValidationRule,
  type ValidationRuleSet,
} from './core/validation-rules';
export { ProgressChannel, type ProgressSource } from './core/progress-channel';
export { ProgressMessageQueue, type ProgressDisplay } from './core/progress-queue';
export {
  VALID_TRANSITIONS,
  assertValidTransition,
  type OrchestratorState,
} from './core/state-machine';
export { InvalidStateTransitionError, ConfigurationError } from './core/errors';

// API client
export * from './api';

// Configuration and logging
export {
  formConfigSchema,
  loadFormConfig,
  loadFormConfigFromElement,
  type FormConfig,
  type FormConfigInput,
} from './config';
export { createLogger, getLogger, setLogger, createChildLogger, type LogLevel } from './logging';

// Utilities
export { buildDownloadFilename, sanitizeNameToken, DEFAULT_NAME_TOKEN } from './utils/filename';
export { createDomEffects, saveFile, scrollToField } from './utils/domEffects';

// Types
export type * from './types';
