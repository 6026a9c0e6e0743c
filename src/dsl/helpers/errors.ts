/**
 * Chybové třídy DSL vrstvy (šablony, YAML loadery).
 *
 * Všechny dědí z {@link DslError}, takže jedna podmínka odchytí chybu
 * builderu i loaderu:
 *
 * ```typescript
 * try {
 *   loadTemplatesFromYAML(text);
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // neplatná definice šablony nebo grafu
 *   }
 * }
 * ```
 */

import { ReasonerError } from '../../core/errors.js';

/**
 * Společný předek DSL chyb ({@link DslValidationError}, YamlLoadError, YamlValidationError).
 */
export class DslError extends ReasonerError {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/**
 * Neplatný vstup do builderu nebo neúplný builder při volání `build()`.
 *
 * @example
 * ```typescript
 * try {
 *   QueryTemplateBuilder.create('rule-status').param('rule').param('rule');
 * } catch (err) {
 *   if (err instanceof DslValidationError) {
 *     console.error('Neplatná šablona:', err.message);
 *   }
 * }
 * ```
 */
export class DslValidationError extends DslError {
  constructor(message: string) {
    super(message);
    this.name = 'DslValidationError';
  }
}
