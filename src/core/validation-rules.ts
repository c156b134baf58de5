/**
 * Validation Rules - per-field constraints and messages
 *
 * The rule set is immutable configuration. A rule whose requirement depends on
 * another field describes that dependency instead of a cached boolean, so it is
 * resolved against the current form values on every validation pass.
 */

import type { CheckKind } from '../types/error';
import type { RuleName, ScalarFieldName } from '../types/form';

/**
 * Requirement derived from the value of another field
 */
export interface DerivedRequirement {
  whenField: ScalarFieldName;
  equals: string;
}

export type Requirement = boolean | DerivedRequirement;

/**
 * Checks that go beyond length and pattern
 */
export type SpecializedCheck = 'phone';

export interface ValidationRule {
  required: Requirement;
  minLength?: number;
  maxLength?: number;
  pattern?: RegExp;
  specializedCheck?: SpecializedCheck;
  messages: Readonly<Partial<Record<CheckKind, string>>>;
}

export type ValidationRuleSet = Readonly<Record<RuleName, ValidationRule>>;

/** Value of `funcao` that makes `outrosFuncao` mandatory */
export const OTHER_ROLE_VALUE = 'outros';

export const DEFAULT_RULES: ValidationRuleSet = {
  nome: {
    required: true,
    minLength: 2,
    maxLength: 100,
    pattern: /^[a-zA-ZÀ-ÿ\s]+$/,
    messages: {
      required: 'Nome é obrigatório',
      minLength: 'Nome deve ter pelo menos 2 caracteres',
      maxLength: 'Nome deve ter no máximo 100 caracteres',
      pattern: 'Nome deve conter apenas letras e espaços',
    },
  },
  telefone: {
    required: true,
    pattern: /^[\d\s()\-+]+$/,
    specializedCheck: 'phone',
    messages: {
      required: 'Telefone é obrigatório',
      pattern: 'Telefone deve conter apenas números, espaços, parênteses e hífens',
      phoneMinDigits: 'Telefone deve ter pelo menos 10 dígitos',
      phoneMaxDigits: 'Telefone deve ter no máximo 11 dígitos',
    },
  },
  funcao: {
    required: true,
    minLength: 3,
    maxLength: 100,
    messages: {
      required: 'Função é obrigatória',
      minLength: 'Função deve ter pelo menos 3 caracteres',
      maxLength: 'Função deve ter no máximo 100 caracteres',
    },
  },
  outrosFuncao: {
    required: { whenField: 'funcao', equals: OTHER_ROLE_VALUE },
    minLength: 3,
    maxLength: 100,
    messages: {
      required: 'Especifique a função',
      minLength: 'Função deve ter pelo menos 3 caracteres',
      maxLength: 'Função deve ter no máximo 100 caracteres',
    },
  },
  departamento: {
    required: true,
    messages: {
      required: 'Departamento é obrigatório',
    },
  },
  empresa: {
    required: true,
    messages: {
      required: 'Empresa é obrigatória',
    },
  },
  // Individual asset fields are optional; "at least one asset" is a
  // cross-field rule enforced by the orchestrator with the required message.
  patrimonio: {
    required: false,
    pattern: /^[A-Z]{2,}\d+$/i,
    messages: {
      required: 'Pelo menos um patrimônio é obrigatório',
      pattern:
        'Formato inválido. Deve ter pelo menos 2 letras seguidas de números. Ex: CEL001, PC123, FON456',
    },
  },
  observacao: {
    required: false,
    maxLength: 500,
    messages: {
      maxLength: 'Observação deve ter no máximo 500 caracteres',
    },
  },
};

/**
 * Human-readable field labels
 */
export const FIELD_LABELS: Readonly<Record<RuleName, string>> = {
  nome: 'Nome',
  funcao: 'Função',
  outrosFuncao: 'Função específica',
  departamento: 'Departamento',
  telefone: 'Telefone',
  empresa: 'Empresa',
  patrimonio: 'Patrimônio',
  observacao: 'Observação',
};
