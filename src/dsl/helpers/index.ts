export { requireNonEmptyString, requireIdentifier } from './validators.js';
export { DslError, DslValidationError } from './errors.js';
