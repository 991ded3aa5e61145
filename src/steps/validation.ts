/**
 * ValidationResult helpers.
 *
 * All functions here are pure so that validate() stays repeatable.
 *
 * @module steps/validation
 */

import type { ContextReader } from '../context/types.js';
import type { FieldError } from '../errors/types.js';
import type { ValidationResult } from './types.js';

export function validationResult(errors: FieldError[] = []): ValidationResult {
  return { valid: errors.length === 0, errors: [...errors] };
}

/**
 * Concatenate results in order; valid only when every part is valid.
 */
export function mergeValidationResults(...results: ValidationResult[]): ValidationResult {
  return validationResult(results.flatMap((r) => r.errors));
}

/**
 * Errors for required context keys that are missing or not finalized.
 *
 * This is the gate between steps: a step cannot run onNext until every
 * key it requires has been committed by an earlier step.
 */
export function requirementErrors(context: ContextReader, requires: readonly string[]): FieldError[] {
  const errors: FieldError[] = [];
  for (const key of requires) {
    if (!context.has(key)) {
      errors.push({ field: key, message: 'is required from an earlier step' });
    } else if (!context.isFinalized(key)) {
      errors.push({ field: key, message: 'has not been confirmed by an earlier step' });
    }
  }
  return errors;
}

/**
 * Error when a field is empty: undefined, null, blank string or empty array.
 */
export function requireValue(field: string, value: unknown, message = 'is required'): FieldError[] {
  const empty =
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === '') ||
    (Array.isArray(value) && value.length === 0);
  return empty ? [{ field, message }] : [];
}
