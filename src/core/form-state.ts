/**
 * Form State - the single mutable state of the form
 *
 * Owned by the orchestrator and handed to the presenter and the group
 * manager by reference. Scalar values live here; asset-entry values live in
 * the group manager and are reached through their group field keys.
 */

import type {
  Field,
  FieldKey,
  FieldStatus,
  GroupFieldKind,
  RuleName,
  ScalarFieldName,
  SubmissionPayload,
} from '../types/form';
import { FieldGroupManager, type FieldGroupManagerOptions } from './field-group-manager';
import { groupFieldKey } from './field-group-view';
import { Observable } from './observable';

/** Scalar fields in display and submission order */
export const SCALAR_FIELDS: readonly ScalarFieldName[] = [
  'nome',
  'funcao',
  'outrosFuncao',
  'departamento',
  'telefone',
  'empresa',
];

const SCALAR_FIELD_SET: ReadonlySet<string> = new Set(SCALAR_FIELDS);

export type ParsedFieldKey =
  | { kind: 'scalar'; name: ScalarFieldName }
  | { kind: 'group'; field: GroupFieldKind; groupId: number };

const GROUP_KEY_PATTERN = /^(patrimonio|observacao)\[(\d+)\]$/;

function isScalarFieldName(value: string): value is ScalarFieldName {
  return SCALAR_FIELD_SET.has(value);
}

function isGroupFieldKind(value: string): value is GroupFieldKind {
  return value === 'patrimonio' || value === 'observacao';
}

/**
 * Parse a field key such as "telefone" or "patrimonio[2]"
 */
export function parseFieldKey(key: string): ParsedFieldKey | null {
  if (isScalarFieldName(key)) {
    return { kind: 'scalar', name: key };
  }
  const match = GROUP_KEY_PATTERN.exec(key);
  if (match) {
    const [, field, id] = match;
    if (field !== undefined && id !== undefined && isGroupFieldKind(field)) {
      return { kind: 'group', field, groupId: Number(id) };
    }
  }
  return null;
}

/**
 * Name of the validation rule that applies to a field
 */
export function ruleNameOf(key: FieldKey): RuleName {
  if (isScalarFieldName(key)) {
    return key;
  }
  return key.startsWith('patrimonio[') ? 'patrimonio' : 'observacao';
}

function emptyValues(): Record<ScalarFieldName, string> {
  return {
    nome: '',
    funcao: '',
    outrosFuncao: '',
    departamento: '',
    telefone: '',
    empresa: '',
  };
}

export class FormState extends Observable {
  readonly groups: FieldGroupManager;
  private values = emptyValues();
  private statuses = new Map<FieldKey, FieldStatus>();

  constructor(groupOptions: Omit<FieldGroupManagerOptions, 'onRemoved'>) {
    super();
    this.groups = new FieldGroupManager({
      ...groupOptions,
      onRemoved: (group) => {
        this.statuses.delete(groupFieldKey('patrimonio', group.id));
        this.statuses.delete(groupFieldKey('observacao', group.id));
      },
    });
  }

  getScalar(name: ScalarFieldName): string {
    return this.values[name];
  }

  /**
   * Current value of a field, or undefined for a group that no longer exists
   */
  getValue(key: FieldKey): string | undefined {
    const parsed = parseFieldKey(key);
    if (!parsed) return undefined;
    if (parsed.kind === 'scalar') {
      return this.values[parsed.name];
    }
    return this.groups.getValue(parsed.groupId, parsed.field);
  }

  setValue(key: FieldKey, value: string): void {
    const parsed = parseFieldKey(key);
    if (!parsed) return;
    if (parsed.kind === 'group') {
      this.groups.setValue(parsed.groupId, parsed.field, value);
      return;
    }
    this.values = { ...this.values, [parsed.name]: value };
    this.notify();
  }

  has(key: FieldKey): boolean {
    return this.getValue(key) !== undefined;
  }

  getStatus(key: FieldKey): FieldStatus {
    return this.statuses.get(key) ?? 'pristine';
  }

  setStatus(key: FieldKey, status: FieldStatus): void {
    if (this.getStatus(key) === status) return;
    if (status === 'pristine') {
      this.statuses.delete(key);
    } else {
      this.statuses.set(key, status);
    }
    this.notify();
  }

  getField(key: FieldKey): Field | undefined {
    const value = this.getValue(key);
    if (value === undefined) return undefined;
    return { name: key, value, status: this.getStatus(key) };
  }

  /**
   * Keys of every field taking part in validation, in display order
   */
  fieldKeys(): FieldKey[] {
    const keys: FieldKey[] = [...SCALAR_FIELDS];
    for (const group of this.groups.active()) {
      keys.push(groupFieldKey('patrimonio', group.id), groupFieldKey('observacao', group.id));
    }
    return keys;
  }

  /**
   * First field currently marked invalid, in display order
   */
  firstInvalid(): FieldKey | undefined {
    return this.fieldKeys().find((key) => this.getStatus(key) === 'invalid');
  }

  toPayload(): SubmissionPayload {
    const groups = this.groups.active();
    return {
      ...this.values,
      patrimonio: groups.map((group) => group.asset),
      observacao: groups.map((group) => group.note),
    };
  }

  /** Destroy every field value and status */
  reset(): void {
    this.values = emptyValues();
    this.statuses.clear();
    this.groups.reset();
    this.notify();
  }
}
