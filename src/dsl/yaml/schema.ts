/**
 * Structural validation of YAML input: query templates and graph seeds.
 *
 * Every error carries the path of the offending value
 * (`templates[2].patterns[0]`), so a broken file points at its line of
 * trouble without a YAML position map.
 *
 * Literal values are YAML scalars. Dates are written as `{ date: "2024-05-10" }`
 * so that they are never confused with strings.
 *
 * @module
 */

import type { ScalarValue } from '../../types/graph.js';
import type {
  PatternSpec,
  QueryTemplate,
  RequirementSpec,
  TemplateParam,
  TemplateParamType,
  TermSpec,
} from '../../types/template.js';
import type { EntityStatement, TripleDocument, TripleStatement } from '../../persistence/triple-format.js';
import { DslError } from '../helpers/errors.js';
import { parseTerm, type TermPosition } from '../template/terms.js';
import { TEMPLATE_PARAM_TYPES, validateTemplateDefinition } from '../template/validation.js';
import { TemplateDefinitionError } from '../../core/errors.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlValidationError extends DslError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${path}: ${message}`);
    this.name = 'YamlValidationError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Primitive validators
// ---------------------------------------------------------------------------

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new YamlValidationError(`must be an object, got ${describe(value)}`, path);
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new YamlValidationError(`must be an array, got ${describe(value)}`, path);
  }
  return value;
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new YamlValidationError(
      `must be a non-empty string, got ${value === '' ? 'empty string' : describe(value)}`,
      path,
    );
  }
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined || value === null ? undefined : requireString(value, path);
}

function optionalArray(value: unknown, path: string): unknown[] {
  return value === undefined || value === null ? [] : requireArray(value, path);
}

function requireStringArray(value: unknown, path: string): string[] {
  return optionalArray(value, path).map((item, i) => requireString(item, `${path}[${i}]`));
}

/**
 * Converts a YAML scalar (or `{ date: "..." }`) into a {@link ScalarValue}.
 */
export function parseScalar(value: unknown, path: string): ScalarValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new YamlValidationError('must be a finite number', path);
    }
    return value;
  }
  if (isPlainObject(value) && Object.keys(value).length === 1 && 'date' in value) {
    const raw = value['date'];
    const date = typeof raw === 'string' ? new Date(raw) : undefined;
    if (date === undefined || Number.isNaN(date.getTime())) {
      throw new YamlValidationError(`invalid date ${JSON.stringify(raw)}`, `${path}.date`);
    }
    return date;
  }
  throw new YamlValidationError(
    `must be a string, number, boolean or { date: "..." }, got ${describe(value)}`,
    path,
  );
}

function parseTermValue(value: unknown, position: TermPosition, path: string): TermSpec {
  try {
    return parseTerm(parseScalar(value, path), position);
  } catch (err) {
    if (err instanceof DslError && !(err instanceof YamlValidationError)) {
      throw new YamlValidationError(err.message, path);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

function validateParam(value: unknown, path: string): TemplateParam {
  const obj = requireObject(value, path);
  const name = requireString(obj['name'], `${path}.name`);

  const rawType = obj['type'] ?? 'entity';
  const type = TEMPLATE_PARAM_TYPES.find(t => t === rawType);
  if (type === undefined) {
    throw new YamlValidationError(
      `must be one of ${TEMPLATE_PARAM_TYPES.join(', ')}, got ${JSON.stringify(rawType)}`,
      `${path}.type`,
    );
  }

  const kind = optionalString(obj['kind'], `${path}.kind`);
  const matchPredicate = optionalString(obj['matchPredicate'], `${path}.matchPredicate`);
  const description = optionalString(obj['description'], `${path}.description`);
  const rawDefault = obj['default'];

  return {
    name,
    type: type satisfies TemplateParamType,
    ...(kind !== undefined && { kind }),
    ...(rawDefault !== undefined && rawDefault !== null && { default: parseScalar(rawDefault, `${path}.default`) }),
    ...(matchPredicate !== undefined && { matchPredicate }),
    ...(description !== undefined && { description }),
  };
}

/**
 * A pattern is `[subject, predicate, object]` or `{ subject, predicate, object }`.
 */
function validatePattern(value: unknown, path: string): PatternSpec {
  let subject: unknown;
  let predicate: unknown;
  let object: unknown;

  if (Array.isArray(value)) {
    if (value.length !== 3) {
      throw new YamlValidationError(`must have exactly 3 items, got ${value.length}`, path);
    }
    [subject, predicate, object] = value;
  } else {
    const obj = requireObject(value, path);
    subject = obj['subject'];
    predicate = obj['predicate'];
    object = obj['object'];
  }

  return {
    subject: parseTermValue(requireString(subject, `${path}.subject`), 'subject', `${path}.subject`),
    predicate: requireString(predicate, `${path}.predicate`),
    object: parseTermValue(object, 'object', `${path}.object`),
  };
}

/**
 * A requirement is `[subject, predicate]` or `{ subject, predicate }`.
 */
function validateRequirement(value: unknown, path: string): RequirementSpec {
  let subject: unknown;
  let predicate: unknown;

  if (Array.isArray(value)) {
    if (value.length !== 2) {
      throw new YamlValidationError(`must have exactly 2 items, got ${value.length}`, path);
    }
    [subject, predicate] = value;
  } else {
    const obj = requireObject(value, path);
    subject = obj['subject'];
    predicate = obj['predicate'];
  }

  return {
    subject: parseTermValue(requireString(subject, `${path}.subject`), 'subject', `${path}.subject`),
    predicate: requireString(predicate, `${path}.predicate`),
  };
}

/**
 * Validates one template object and checks the resulting definition.
 *
 * @throws {YamlValidationError} With the path of the first problem
 */
export function validateTemplate(value: unknown, path: string = 'template'): QueryTemplate {
  const obj = requireObject(value, path);
  const name = requireString(obj['name'], `${path}.name`);
  const description = optionalString(obj['description'], `${path}.description`);

  const template: QueryTemplate = {
    name,
    ...(description !== undefined && { description }),
    params: optionalArray(obj['params'], `${path}.params`).map((p, i) => validateParam(p, `${path}.params[${i}]`)),
    patterns: optionalArray(obj['patterns'], `${path}.patterns`).map((p, i) => validatePattern(p, `${path}.patterns[${i}]`)),
    expand: optionalArray(obj['expand'], `${path}.expand`).map((t, i) =>
      parseTermValue(requireString(t, `${path}.expand[${i}]`), 'subject', `${path}.expand[${i}]`),
    ),
    requires: optionalArray(obj['requires'], `${path}.requires`).map((r, i) => validateRequirement(r, `${path}.requires[${i}]`)),
    multiValued: requireStringArray(obj['multiValued'], `${path}.multiValued`),
    keywords: requireStringArray(obj['keywords'], `${path}.keywords`),
  };

  try {
    validateTemplateDefinition(template);
  } catch (err) {
    if (err instanceof TemplateDefinitionError) {
      throw new YamlValidationError(err.message, path);
    }
    throw err;
  }

  return template;
}

// ---------------------------------------------------------------------------
// Graph seed
// ---------------------------------------------------------------------------

/**
 * Converts a graph seed object into a triple document.
 *
 * ```yaml
 * entities:
 *   - id: C1
 *     kind: Client
 *     attributes: { kyc_status: verified }
 * relations:
 *   - [T1, client, C1]                      # entity link
 *   - { subject: T1, predicate: booked_on, value: { date: "2024-05-10" } }
 * ```
 *
 * In the array form the object is always an entity id; literals use `value`.
 */
export function validateGraphSeed(value: unknown, path: string = 'graph'): TripleDocument {
  const obj = requireObject(value, path);
  const entities: EntityStatement[] = [];
  const triples: TripleStatement[] = [];

  optionalArray(obj['entities'], `${path}.entities`).forEach((item, i) => {
    const p = `${path}.entities[${i}]`;
    const entity = requireObject(item, p);
    const id = requireString(entity['id'], `${p}.id`);
    entities.push({ id, kind: requireString(entity['kind'], `${p}.kind`) });

    const attributes = entity['attributes'];
    if (attributes === undefined || attributes === null) return;
    for (const [name, raw] of Object.entries(requireObject(attributes, `${p}.attributes`))) {
      triples.push({
        subject: id,
        predicate: name,
        object: { type: 'literal', value: parseScalar(raw, `${p}.attributes.${name}`) },
      });
    }
  });

  optionalArray(obj['relations'], `${path}.relations`).forEach((item, i) => {
    const p = `${path}.relations[${i}]`;

    if (Array.isArray(item)) {
      if (item.length !== 3) {
        throw new YamlValidationError(`must have exactly 3 items, got ${item.length}`, p);
      }
      triples.push({
        subject: requireString(item[0], `${p}[0]`),
        predicate: requireString(item[1], `${p}[1]`),
        object: { type: 'entity', id: requireString(item[2], `${p}[2]`) },
      });
      return;
    }

    const relation = requireObject(item, p);
    const subject = requireString(relation['subject'], `${p}.subject`);
    const predicate = requireString(relation['predicate'], `${p}.predicate`);
    const hasObject = relation['object'] !== undefined;
    const hasValue = relation['value'] !== undefined;
    if (hasObject === hasValue) {
      throw new YamlValidationError('needs exactly one of "object" (entity id) or "value" (literal)', p);
    }

    triples.push({
      subject,
      predicate,
      object: hasObject
        ? { type: 'entity', id: requireString(relation['object'], `${p}.object`) }
        : { type: 'literal', value: parseScalar(relation['value'], `${p}.value`) },
    });
  });

  return { entities, triples };
}
