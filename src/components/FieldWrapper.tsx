/**
 * FieldWrapper component - Wraps a form control with its label and annotation
 */

import React from 'react';
import type { FieldKey, FieldStatus } from '../types/form';

/**
 * Element id of the control of a field, e.g. "field-patrimonio-2"
 */
export function fieldInputId(key: FieldKey): string {
  return `field-${key.replace(/[^a-zA-Z0-9_-]+/g, '-').replace(/-+$/, '')}`;
}

/**
 * Props for FieldWrapper component
 */
export interface FieldWrapperProps {
  fieldKey: FieldKey;
  /** Field label to display */
  label: string;
  /** Whether to mark the field as required */
  required?: boolean;
  status?: FieldStatus;
  /** Annotation to display below the control */
  error?: string;
  /** Child input element(s) */
  children: React.ReactNode;
  /** Custom CSS class */
  className?: string;
}

/**
 * FieldWrapper - consistent layout for a labelled control
 *
 * The wrapper carries the field key so the form can scroll to it.
 *
 * @example
 * ```tsx
 * <FieldWrapper fieldKey="telefone" label="Telefone" required error={error}>
 *   <input id={fieldInputId('telefone')} value={value} onChange={handleChange} />
 * </FieldWrapper>
 * ```
 */
export const FieldWrapper: React.FC<FieldWrapperProps> = ({
  fieldKey,
  label,
  required = false,
  status = 'pristine',
  error,
  children,
  className = '',
}) => {
  const fieldId = fieldInputId(fieldKey);
  const errorId = error ? `${fieldId}-error` : undefined;

  return (
    <div
      className={`handover-field handover-field--${status} ${className}`.trim()}
      data-field-key={fieldKey}
    >
      <label htmlFor={fieldId} className="handover-field__label">
        {label}
        {required && (
          <span className="handover-field__required" aria-label="obrigatório">
            *
          </span>
        )}
      </label>

      <div className="handover-field__control">{children}</div>

      {error && (
        <div id={errorId} className="handover-field__error" role="alert">
          {error}
        </div>
      )}
    </div>
  );
};

FieldWrapper.displayName = 'FieldWrapper';
