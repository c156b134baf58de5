/**
 * Field Group View - typed view-model of an asset-entry group
 *
 * Renderers build a group's inputs from this structure instead of
 * assembling markup by hand.
 */

import type { FieldGroup, GroupFieldKey, GroupFieldKind, GroupPhase } from '../types/form';
import { BASE_GROUP_ID } from './field-group-manager';

export interface GroupFieldView {
  key: GroupFieldKey;
  kind: GroupFieldKind;
  /** Form field name sent to the server */
  name: 'patrimonio[]' | 'observacao[]';
  control: 'input' | 'textarea';
  placeholder: string;
  maxLength: number;
  value: string;
}

export interface FieldGroupView {
  id: number;
  phase: GroupPhase;
  removable: boolean;
  fields: [GroupFieldView, GroupFieldView];
}

export function groupFieldKey(kind: GroupFieldKind, groupId: number): GroupFieldKey {
  return `${kind}[${groupId}]`;
}

export function buildGroupView(group: FieldGroup): FieldGroupView {
  return {
    id: group.id,
    phase: group.phase,
    removable: group.id !== BASE_GROUP_ID,
    fields: [
      {
        key: groupFieldKey('patrimonio', group.id),
        kind: 'patrimonio',
        name: 'patrimonio[]',
        control: 'input',
        placeholder: 'Patrimônio',
        maxLength: 50,
        value: group.asset,
      },
      {
        key: groupFieldKey('observacao', group.id),
        kind: 'observacao',
        name: 'observacao[]',
        control: 'textarea',
        placeholder: 'Observação',
        maxLength: 500,
        value: group.note,
      },
    ],
  };
}
