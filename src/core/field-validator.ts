/**
 * Field Validator - evaluates one value against one rule
 *
 * Checks run in a fixed order and stop at the first failure:
 * required, empty-and-optional, minLength, maxLength, pattern, specialized.
 */

import type { CheckKind, FieldValidationResult } from '../types/error';
import type { ScalarFieldName } from '../types/form';
import type { Requirement, SpecializedCheck, ValidationRule } from './validation-rules';

/**
 * A rule whose requirement has been resolved against the current form values
 */
export type ResolvedRule = Omit<ValidationRule, 'required'> & { required: boolean };

const FALLBACK_MESSAGE = 'Valor inválido';

/**
 * Resolve a rule's requirement. Derived requirements read the controlling
 * field through `readValue` every time; nothing is cached.
 */
export function resolveRule(
  rule: ValidationRule,
  readValue: (field: ScalarFieldName) => string
): ResolvedRule {
  return { ...rule, required: isRequired(rule.required, readValue) };
}

function isRequired(
  requirement: Requirement,
  readValue: (field: ScalarFieldName) => string
): boolean {
  if (typeof requirement === 'boolean') {
    return requirement;
  }
  return readValue(requirement.whenField) === requirement.equals;
}

function fail(rule: ResolvedRule, check: CheckKind): FieldValidationResult {
  return {
    valid: false,
    check,
    message: rule.messages[check] ?? FALLBACK_MESSAGE,
  };
}

/**
 * Validate a value against a resolved rule
 * @returns `{ valid: true }` or the first failing check and its message
 */
export function validateValue(rawValue: string, rule: ResolvedRule): FieldValidationResult {
  const value = rawValue.trim();

  if (rule.required && !value) {
    return fail(rule, 'required');
  }

  if (!value) {
    return { valid: true };
  }

  if (rule.minLength !== undefined && value.length < rule.minLength) {
    return fail(rule, 'minLength');
  }

  if (rule.maxLength !== undefined && value.length > rule.maxLength) {
    return fail(rule, 'maxLength');
  }

  if (rule.pattern && !rule.pattern.test(value)) {
    return fail(rule, 'pattern');
  }

  if (rule.specializedCheck) {
    const failed = runSpecializedCheck(rule.specializedCheck, value);
    if (failed) {
      return fail(rule, failed);
    }
  }

  return { valid: true };
}

function runSpecializedCheck(check: SpecializedCheck, value: string): CheckKind | null {
  switch (check) {
    case 'phone': {
      const digits = value.replace(/\D/g, '');
      if (digits.length < 10) return 'phoneMinDigits';
      if (digits.length > 11) return 'phoneMaxDigits';
      return null;
    }
  }
}
