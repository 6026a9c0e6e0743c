/**
 * Validation helpers for DSL builder inputs.
 *
 * Invalid input is rejected at the call-site rather than deferred until
 * `build()`.
 *
 * @module
 */

import { isEncodableIdentifier } from '../../persistence/triple-format.js';
import { DslValidationError } from './errors.js';

/**
 * Asserts that `value` is a non-empty string.
 *
 * @param label - A human-readable parameter name used in the error message.
 * @throws {DslValidationError} If `value` is not a string or is empty.
 */
export function requireNonEmptyString(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DslValidationError(`${label} must be a non-empty string`);
  }
}

/**
 * Asserts that `value` can be used as a predicate or entity id
 * (non-empty, no whitespace, no angle brackets).
 *
 * @throws {DslValidationError} If `value` cannot be written in the triple format.
 */
export function requireIdentifier(value: unknown, label: string): asserts value is string {
  requireNonEmptyString(value, label);
  if (!isEncodableIdentifier(value)) {
    throw new DslValidationError(`${label} must not contain whitespace or angle brackets, got ${JSON.stringify(value)}`);
  }
}
