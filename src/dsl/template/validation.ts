/**
 * Query template validation.
 *
 * Two checks live here: the structural check of a template definition
 * (run once, when the template is built or registered) and the check of
 * caller-supplied bindings against the declared parameters (run on every
 * query). Both collect every issue before throwing.
 *
 * @module
 */

import type { ScalarValue } from '../../types/graph.js';
import type {
  QueryTemplate,
  TemplateBindings,
  TemplateParam,
  TemplateParamType,
  TermSpec,
} from '../../types/template.js';
import {
  InvalidBindingError,
  MissingBindingError,
  TemplateDefinitionError,
} from '../../core/errors.js';
import { isEncodableIdentifier } from '../../persistence/triple-format.js';
import { isScalarValue } from '../../utils/relation-object.js';
import { formatTerm } from './terms.js';

export const TEMPLATE_PARAM_TYPES: readonly TemplateParamType[] = ['entity', 'string', 'number', 'boolean', 'date'];

/** Resolves the kind of an entity id, or `undefined` when the graph does not know it. */
export type EntityKindResolver = (entityId: string) => string | undefined;

/**
 * Checks whether a runtime value matches the declared {@link TemplateParamType}.
 */
function matchesType(value: unknown, type: TemplateParamType): boolean {
  switch (type) {
    case 'entity':
      return typeof value === 'string' && isEncodableIdentifier(value);
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'date':
      return value instanceof Date && !Number.isNaN(value.getTime());
    default:
      return typeof value === type;
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'date';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// ---------------------------------------------------------------------------
// Bindings
// ---------------------------------------------------------------------------

/**
 * Validates bindings against the template parameters and merges defaults.
 *
 * Checks, in order:
 * 1. **Required**: every parameter without a default must be bound.
 * 2. **Known**: no binding may name an undeclared parameter.
 * 3. **Type**: the value must match the declared type.
 * 4. **Kind**: an `entity` parameter with a `kind` rejects entities of
 *    another kind. Ids the graph does not know pass; they simply match nothing.
 *
 * @returns A new bindings object with defaults applied.
 * @throws {MissingBindingError} If a required parameter is absent.
 * @throws {InvalidBindingError} If any other issue is found.
 */
export function validateBindings(
  template: QueryTemplate,
  bindings: Readonly<Record<string, unknown>>,
  kindOf?: EntityKindResolver,
): TemplateBindings {
  const merged: TemplateBindings = {};
  const missing: string[] = [];
  const issues: string[] = [];
  const declared = new Set(template.params.map(p => p.name));

  for (const key of Object.keys(bindings)) {
    if (!declared.has(key)) {
      issues.push(`Unknown binding "${key}"`);
    }
  }

  for (const param of template.params) {
    const value = bindings[param.name];

    if (value === undefined) {
      if (param.default !== undefined) {
        merged[param.name] = param.default;
      } else {
        missing.push(param.name);
      }
      continue;
    }

    if (!isScalarValue(value) || !matchesType(value, param.type)) {
      issues.push(`Binding "${param.name}": expected ${param.type}, got ${describeType(value)}`);
      continue;
    }

    if (param.type === 'entity' && param.kind !== undefined && kindOf && typeof value === 'string') {
      const actual = kindOf(value);
      if (actual !== undefined && actual !== param.kind) {
        issues.push(`Binding "${param.name}": entity "${value}" is a ${actual}, expected ${param.kind}`);
        continue;
      }
    }

    merged[param.name] = value;
  }

  if (missing.length > 0) {
    throw new MissingBindingError(template.name, missing);
  }
  if (issues.length > 0) {
    throw new InvalidBindingError(template.name, issues);
  }

  return merged;
}

/**
 * Converts a textual binding (CLI `--bind`, YAML) into the parameter's type.
 *
 * @throws {InvalidBindingError} If the text does not represent a value of that type.
 */
export function coerceBinding(templateName: string, param: TemplateParam, raw: string): ScalarValue {
  switch (param.type) {
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new InvalidBindingError(templateName, [`Binding "${param.name}": "${raw}" is not a number`]);
      }
      return value;
    }
    case 'boolean':
      if (raw !== 'true' && raw !== 'false') {
        throw new InvalidBindingError(templateName, [`Binding "${param.name}": "${raw}" is not a boolean`]);
      }
      return raw === 'true';
    case 'date': {
      const value = new Date(raw);
      if (Number.isNaN(value.getTime())) {
        throw new InvalidBindingError(templateName, [`Binding "${param.name}": "${raw}" is not a date`]);
      }
      return value;
    }
    default:
      return raw;
  }
}

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

function collectPatternVariables(template: QueryTemplate): Set<string> {
  const names = new Set<string>();
  for (const pattern of template.patterns) {
    for (const term of [pattern.subject, pattern.object]) {
      if (term.type === 'variable') {
        names.add(term.name);
      }
    }
  }
  return names;
}

/**
 * Structural check of a template definition.
 *
 * @throws {TemplateDefinitionError} Listing every problem found.
 */
export function validateTemplateDefinition(template: QueryTemplate): void {
  const issues: string[] = [];
  const params = new Map<string, TemplateParam>();

  if (typeof template.name !== 'string' || template.name.length === 0) {
    throw new TemplateDefinitionError(String(template.name), 'name must be a non-empty string');
  }

  for (const param of template.params) {
    if (params.has(param.name)) {
      issues.push(`duplicate parameter "${param.name}"`);
      continue;
    }
    params.set(param.name, param);

    if (!TEMPLATE_PARAM_TYPES.includes(param.type)) {
      issues.push(`parameter "${param.name}" has unknown type "${String(param.type)}"`);
      continue;
    }
    if (param.default !== undefined && !matchesType(param.default, param.type)) {
      issues.push(`default of parameter "${param.name}" is not a ${param.type}`);
    }
    if (param.kind !== undefined && param.type !== 'entity') {
      issues.push(`parameter "${param.name}" declares a kind but is not an entity parameter`);
    }
    if (param.matchPredicate !== undefined && !isEncodableIdentifier(param.matchPredicate)) {
      issues.push(`parameter "${param.name}" has invalid matchPredicate "${param.matchPredicate}"`);
    }
  }

  if (template.patterns.length === 0 && template.expand.length === 0) {
    issues.push('needs at least one pattern or expand term');
  }

  const bound = collectPatternVariables(template);

  const checkTerm = (term: TermSpec, where: string, subjectOnly: boolean): void => {
    switch (term.type) {
      case 'variable':
        if (subjectOnly && !bound.has(term.name)) {
          issues.push(`${where}: variable ${formatTerm(term)} is not bound by any pattern`);
        }
        return;
      case 'binding': {
        const param = params.get(term.name);
        if (!param) {
          issues.push(`${where}: binding ${formatTerm(term)} is not a declared parameter`);
        } else if (subjectOnly && param.type !== 'entity') {
          issues.push(`${where}: binding ${formatTerm(term)} must be an entity parameter`);
        }
        return;
      }
      case 'entity':
        if (!isEncodableIdentifier(term.id)) {
          issues.push(`${where}: invalid entity id "${term.id}"`);
        }
        return;
      case 'literal':
        if (subjectOnly) {
          issues.push(`${where}: literal ${formatTerm(term)} cannot be a subject`);
        }
        return;
    }
  };

  template.patterns.forEach((pattern, i) => {
    const where = `pattern ${i + 1}`;
    if (!isEncodableIdentifier(pattern.predicate)) {
      issues.push(`${where}: invalid predicate "${pattern.predicate}"`);
    }
    // Pattern variables get bound here, so only constants are checked
    checkTerm(pattern.subject, where, pattern.subject.type !== 'variable');
    checkTerm(pattern.object, where, false);
  });

  template.expand.forEach((term, i) => checkTerm(term, `expand ${i + 1}`, true));

  template.requires.forEach((requirement, i) => {
    const where = `requirement ${i + 1}`;
    if (!isEncodableIdentifier(requirement.predicate)) {
      issues.push(`${where}: invalid predicate "${requirement.predicate}"`);
    }
    checkTerm(requirement.subject, where, true);
  });

  for (const predicate of template.multiValued) {
    if (!isEncodableIdentifier(predicate)) {
      issues.push(`invalid multi-valued predicate "${predicate}"`);
    }
  }

  for (const keyword of template.keywords) {
    if (typeof keyword !== 'string' || keyword.trim().length === 0) {
      issues.push('keywords must be non-empty strings');
      break;
    }
  }

  if (issues.length > 0) {
    throw new TemplateDefinitionError(template.name, issues.join('; '));
  }
}
