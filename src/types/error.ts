/**
 * Error and result types for validation and submission
 */

import type { FieldKey } from './form';

/**
 * Kinds of checks a validation rule can fail
 */
export type CheckKind =
  | 'required'
  | 'minLength'
  | 'maxLength'
  | 'pattern'
  | 'phoneMinDigits'
  | 'phoneMaxDigits';

/**
 * Result of validating a single value
 */
export type FieldValidationResult =
  | { valid: true }
  | { valid: false; check: CheckKind; message: string };

/**
 * Client-side validation error
 */
export interface ClientValidationError {
  /** Field the error is annotated on */
  field: FieldKey;
  /** Error message to display */
  message: string;
}

/**
 * Outcome of a full-form validation pass
 */
export interface FormValidationReport {
  valid: boolean;
  errors: ClientValidationError[];
}

/**
 * Field error as returned by the server
 */
export interface ServerFieldError {
  /** Field name as the server knows it, e.g. "telefone" */
  field: string;
  message: string;
}

/**
 * Why a submission did not produce a usable response
 */
export type TransportFailureReason =
  | 'network'
  | 'timeout'
  | 'server'
  | 'malformed'
  | 'unexpected';

/**
 * Classified server response
 */
export type SubmissionResult =
  | { kind: 'success'; payload: Blob; contentType: string }
  | { kind: 'validation_failure'; errors: ServerFieldError[] }
  | { kind: 'transport_failure'; reason: TransportFailureReason; message: string };

/**
 * What a call to submit() ended with
 */
export type SubmissionOutcome = 'ignored' | 'invalid' | SubmissionResult['kind'];

/**
 * Transient global notice
 */
export interface Notice {
  id: number;
  message: string;
  /** Optional bold prefix, usually a field label */
  label?: string;
  phase: 'visible' | 'leaving';
}
