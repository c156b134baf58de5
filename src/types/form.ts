/**
 * Form data types for the asset handover request form
 */

/**
 * Identity and role fields rendered once per form
 */
export type ScalarFieldName =
  | 'nome'
  | 'funcao'
  | 'outrosFuncao'
  | 'departamento'
  | 'telefone'
  | 'empresa';

/**
 * Fields repeated once per asset-entry group
 */
export type GroupFieldKind = 'patrimonio' | 'observacao';

/**
 * Name a validation rule is registered under
 */
export type RuleName = ScalarFieldName | GroupFieldKind;

/**
 * Key of a group field, e.g. "patrimonio[3]"
 */
export type GroupFieldKey = `${GroupFieldKind}[${number}]`;

/**
 * Key identifying any field of the form
 */
export type FieldKey = ScalarFieldName | GroupFieldKey;

export type FieldStatus = 'pristine' | 'valid' | 'invalid';

export interface Field {
  name: FieldKey;
  value: string;
  status: FieldStatus;
}

/**
 * Animation phase of a field group
 */
export type GroupPhase = 'entering' | 'present' | 'leaving';

/**
 * One asset entry: a code and a free-text note
 */
export interface FieldGroup {
  /** Never reused, even after removal */
  readonly id: number;
  asset: string;
  note: string;
  phase: GroupPhase;
}

/**
 * Layout of the asset-entry container
 */
export interface GroupLayout {
  /** Whether groups are rendered side by side in a grouped container */
  grouped: boolean;
  /** Container width in pixels */
  widthPx: number;
}

/**
 * Payload sent to the server, asset lists in group order
 */
export interface SubmissionPayload {
  nome: string;
  funcao: string;
  outrosFuncao: string;
  departamento: string;
  telefone: string;
  empresa: string;
  patrimonio: string[];
  observacao: string[];
}

/**
 * Selectable option of a choice field
 */
export interface ChoiceOption {
  value: string;
  label: string;
}
