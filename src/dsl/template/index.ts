export { QueryTemplateBuilder } from './template-builder.js';
export type { QueryParamOptions } from './template-builder.js';
export { variable, binding, parseTerm, formatTerm } from './terms.js';
export type { TermInput, TermPosition } from './terms.js';
export {
  validateBindings,
  validateTemplateDefinition,
  coerceBinding,
  TEMPLATE_PARAM_TYPES,
} from './validation.js';
export type { EntityKindResolver } from './validation.js';
