/**
 * AssetGroupList component - Renders the repeatable asset-entry groups
 * with add/remove controls
 */

import React from 'react';
import type { FieldGroupView, GroupFieldView } from '../core/field-group-view';
import type { FieldKey, FieldStatus, GroupLayout } from '../types/form';
import { FieldWrapper, fieldInputId } from './FieldWrapper';
import { FIELD_LABELS } from '../core/validation-rules';

/**
 * Props for AssetGroupList component
 */
export interface AssetGroupListProps {
  groups: readonly FieldGroupView[];
  layout: GroupLayout;
  annotations: Readonly<Partial<Record<FieldKey, string>>>;
  statuses: Readonly<Partial<Record<FieldKey, FieldStatus>>>;
  /** Whether the add control is armed */
  canAdd: boolean;
  onAdd: () => void;
  onRemove: (id: number) => void;
  onChange: (key: FieldKey, value: string) => void;
  onBlur: (key: FieldKey) => void;
  disabled?: boolean;
  /** Custom CSS class */
  className?: string;
}

/**
 * AssetGroupList - one fieldset per group, built from the group view-model
 *
 * A single group renders inline; two or more switch the container to the
 * grouped layout, whose width grows with each group.
 *
 * @example
 * ```tsx
 * <AssetGroupList
 *   groups={snapshot.groups}
 *   layout={snapshot.layout}
 *   annotations={snapshot.annotations}
 *   statuses={snapshot.groupStatuses}
 *   canAdd={snapshot.canAddGroup}
 *   onAdd={addGroup}
 *   onRemove={removeGroup}
 *   onChange={setFieldValue}
 *   onBlur={blurField}
 * />
 * ```
 */
export const AssetGroupList: React.FC<AssetGroupListProps> = ({
  groups,
  layout,
  annotations,
  statuses,
  canAdd,
  onAdd,
  onRemove,
  onChange,
  onBlur,
  disabled = false,
  className = '',
}) => {
  const renderControl = (field: GroupFieldView) => {
    const common = {
      id: fieldInputId(field.key),
      name: field.name,
      value: field.value,
      placeholder: field.placeholder,
      maxLength: field.maxLength,
      disabled,
      'aria-invalid': statuses[field.key] === 'invalid',
      className: `handover-group__${field.control}`,
      onBlur: () => onBlur(field.key),
    };

    return field.control === 'textarea' ? (
      <textarea {...common} onChange={(e) => onChange(field.key, e.target.value)} />
    ) : (
      <input type="text" {...common} onChange={(e) => onChange(field.key, e.target.value)} />
    );
  };

  return (
    <div
      className={`handover-groups ${layout.grouped ? 'handover-groups--grouped' : ''} ${className}`.trim()}
      style={layout.grouped ? { width: `${layout.widthPx}px` } : undefined}
      data-testid="asset-groups"
    >
      <div className="handover-groups__items" role="list">
        {groups.map((group, index) => (
          <fieldset
            key={group.id}
            className={`handover-group handover-group--${group.phase}`}
            role="listitem"
            data-group-id={group.id}
            aria-label={`Item ${index + 1}`}
          >
            {group.fields.map((field) => (
              <FieldWrapper
                key={field.key}
                fieldKey={field.key}
                label={FIELD_LABELS[field.kind]}
                status={statuses[field.key]}
                error={annotations[field.key]}
              >
                {renderControl(field)}
              </FieldWrapper>
            ))}

            {group.removable && (
              <button
                type="button"
                className="handover-group__remove"
                onClick={() => onRemove(group.id)}
                disabled={disabled || group.phase === 'leaving'}
                aria-label={`Remover item ${index + 1}`}
              >
                ×
              </button>
            )}
          </fieldset>
        ))}
      </div>

      <button
        type="button"
        className="handover-groups__add"
        onClick={onAdd}
        disabled={disabled || !canAdd}
      >
        Adicionar patrimônio
      </button>
    </div>
  );
};

AssetGroupList.displayName = 'AssetGroupList';
