/**
 * DSL for **kg-reasoner** query templates and graph seeds.
 *
 * Two complementary ways to define templates:
 *
 * 1. **Fluent Builder API**, typed and checked at `build()`.
 * 2. **YAML Loader** for external template and graph files.
 *
 * @example
 * ```typescript
 * import { QueryTemplateBuilder } from 'kg-reasoner/dsl';
 *
 * const template = QueryTemplateBuilder.create('transaction-compliance')
 *   .param('transaction', { kind: 'Transaction' })
 *   .expand('$transaction')
 *   .requires('$transaction', 'is_compliant')
 *   .multiValued('compliantWith', 'violatesRule')
 *   .keywords('compliant', 'compliance')
 *   .build();
 * ```
 *
 * @module dsl
 */

// Template builder
export { QueryTemplateBuilder } from './template/index.js';
export type { QueryParamOptions } from './template/index.js';

// Terms
export { variable, binding, parseTerm, formatTerm } from './template/index.js';
export type { TermInput, TermPosition } from './template/index.js';

// Template validation
export {
  validateBindings,
  validateTemplateDefinition,
  coerceBinding,
  TEMPLATE_PARAM_TYPES,
} from './template/index.js';
export type { EntityKindResolver } from './template/index.js';

// YAML loader
export { parseYamlDocument, loadYamlFile, YamlLoadError } from './yaml/index.js';
export { validateTemplate, validateGraphSeed, parseScalar, YamlValidationError } from './yaml/index.js';
export { loadTemplatesFromYAML, loadTemplatesFromFile } from './yaml/index.js';
export { parseGraphYAML, loadGraphFromYAML, loadGraphFromYAMLFile } from './yaml/index.js';
export type { GraphSeedOptions } from './yaml/index.js';

// Errors
export { DslError, DslValidationError } from './helpers/index.js';
