/**
 * AssetHandoverForm component - The asset handover request form
 * Identity fields, repeatable asset entries, notices and submission overlays
 */

import React from 'react';
import {
  useSubmissionOrchestrator,
  type UseSubmissionOrchestratorOptions,
} from '../hooks/useSubmissionOrchestrator';
import { FIELD_LABELS, OTHER_ROLE_VALUE } from '../core/validation-rules';
import { getLogger } from '../logging';
import type { ChoiceOption, Field, ScalarFieldName } from '../types/form';
import { AssetGroupList } from './AssetGroupList';
import { FieldWrapper, fieldInputId } from './FieldWrapper';
import { NoticeStack } from './NoticeStack';
import { ProgressOverlay } from './ProgressOverlay';
import { SuccessOverlay } from './SuccessOverlay';

export const DEFAULT_ROLE_OPTIONS: readonly ChoiceOption[] = [
  { value: 'analista', label: 'Analista' },
  { value: 'assistente', label: 'Assistente' },
  { value: 'coordenador', label: 'Coordenador' },
  { value: 'gerente', label: 'Gerente' },
  { value: 'diretor', label: 'Diretor' },
  { value: 'estagiario', label: 'Estagiário' },
  { value: OTHER_ROLE_VALUE, label: 'Outros' },
];

export const DEFAULT_DEPARTMENT_OPTIONS: readonly ChoiceOption[] = [
  { value: 'ti', label: 'TI' },
  { value: 'rh', label: 'People & Culture' },
  { value: 'administrativo', label: 'ADM/Financeiro' },
  { value: 'marketing', label: 'Marketing' },
  { value: 'comercial', label: 'Comercial' },
  { value: 'desenvolvimento', label: 'Desenvolvimento' },
  { value: 'central', label: 'Central de REL.' },
  { value: 'juridico', label: 'Jurídico' },
];

/**
 * Props for AssetHandoverForm component
 */
export interface AssetHandoverFormProps extends UseSubmissionOrchestratorOptions {
  /** Choices for `funcao`; the "outros" value reveals a free-text field */
  roleOptions?: readonly ChoiceOption[];
  departmentOptions?: readonly ChoiceOption[];
  /** Choices for `empresa`; a text input is rendered when omitted */
  companyOptions?: readonly ChoiceOption[];
  /** Form title (default: "Termo de Entrega") */
  title?: string;
  /** Custom CSS class */
  className?: string;
}

/**
 * AssetHandoverForm - renders the form and forwards every interaction to
 * the orchestrator
 *
 * @example
 * ```tsx
 * <AssetHandoverForm
 *   config={loadFormConfigFromElement(document, 'form-config')}
 *   companyOptions={[{ value: 'matriz', label: 'Matriz' }]}
 * />
 * ```
 */
export const AssetHandoverForm: React.FC<AssetHandoverFormProps> = ({
  roleOptions = DEFAULT_ROLE_OPTIONS,
  departmentOptions = DEFAULT_DEPARTMENT_OPTIONS,
  companyOptions,
  title = 'Termo de Entrega',
  className = '',
  ...options
}) => {
  const { snapshot, setFieldValue, blurField, addGroup, removeGroup, submit } =
    useSubmissionOrchestrator(options);
  const { fields, annotations, submitControl } = snapshot;
  const busy = snapshot.state !== 'idle';

  const handleSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    submit().catch((err: unknown) => {
      getLogger().error({ err, logger: 'form' }, 'Submission aborted');
    });
  };

  const wrap = (name: ScalarFieldName, control: React.ReactNode) => (
    <FieldWrapper
      fieldKey={name}
      label={FIELD_LABELS[name]}
      required
      status={fields[name].status}
      error={annotations[name]}
    >
      {control}
    </FieldWrapper>
  );

  const controlProps = (field: Field, name: ScalarFieldName) => ({
    id: fieldInputId(name),
    name,
    value: field.value,
    disabled: busy,
    'aria-invalid': field.status === 'invalid',
    onBlur: () => blurField(name),
  });

  const renderInput = (name: ScalarFieldName, type: 'text' | 'tel' = 'text') =>
    wrap(
      name,
      <input
        type={type}
        className="handover-form__input"
        {...controlProps(fields[name], name)}
        onChange={(e) => setFieldValue(name, e.target.value)}
      />
    );

  const renderSelect = (name: ScalarFieldName, choices: readonly ChoiceOption[]) =>
    wrap(
      name,
      <select
        className="handover-form__select"
        {...controlProps(fields[name], name)}
        onChange={(e) => setFieldValue(name, e.target.value)}
      >
        <option value="">Selecione</option>
        {choices.map((choice) => (
          <option key={choice.value} value={choice.value}>
            {choice.label}
          </option>
        ))}
      </select>
    );

  return (
    <form className={`handover-form ${className}`.trim()} onSubmit={handleSubmit} noValidate>
      <div className="handover-form__header">
        <h2 className="handover-form__title">{title}</h2>
      </div>

      <NoticeStack notices={snapshot.notices} />

      <div className="handover-form__fields">
        {renderInput('nome')}
        {renderSelect('funcao', roleOptions)}
        {fields.funcao.value === OTHER_ROLE_VALUE && renderInput('outrosFuncao')}
        {renderSelect('departamento', departmentOptions)}
        {renderInput('telefone', 'tel')}
        {companyOptions ? renderSelect('empresa', companyOptions) : renderInput('empresa')}
      </div>

      <AssetGroupList
        groups={snapshot.groups}
        layout={snapshot.layout}
        annotations={annotations}
        statuses={snapshot.groupStatuses}
        canAdd={snapshot.canAddGroup}
        onAdd={() => addGroup()}
        onRemove={(id) => removeGroup(id)}
        onChange={setFieldValue}
        onBlur={(key) => blurField(key)}
        disabled={busy}
      />

      <div className="handover-form__actions">
        <button
          type="submit"
          className="handover-form__submit"
          disabled={submitControl.disabled}
        >
          {submitControl.label}
        </button>
      </div>

      <ProgressOverlay visible={snapshot.state === 'submitting'} progress={snapshot.progress} />
      <SuccessOverlay
        visible={snapshot.successVisible}
        reloadDelaySeconds={Math.round(snapshot.config.success.reloadDelayMs / 1000)}
      />
    </form>
  );
};

AssetHandoverForm.displayName = 'AssetHandoverForm';
