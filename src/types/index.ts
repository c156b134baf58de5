/**
 * Type exports for the asset handover form
 */

export type {
  ScalarFieldName,
  GroupFieldKind,
  RuleName,
  GroupFieldKey,
  FieldKey,
  FieldStatus,
  Field,
  GroupPhase,
  FieldGroup,
  GroupLayout,
  SubmissionPayload,
  ChoiceOption,
} from './form';

export type {
  CheckKind,
  FieldValidationResult,
  ClientValidationError,
  FormValidationReport,
  ServerFieldError,
  TransportFailureReason,
  SubmissionResult,
  SubmissionOutcome,
  Notice,
} from './error';
