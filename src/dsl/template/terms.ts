/**
 * Compact string syntax for template pattern terms.
 *
 * | Syntax     | Term                          |
 * |------------|-------------------------------|
 * | `?tx`      | join variable                 |
 * | `$client`  | caller-supplied binding       |
 * | `<C1>`     | entity constant               |
 * | `C1`       | entity constant (subject only) |
 * | `"KYC"`, `5000`, `true` | literal (object only) |
 *
 * @module
 */

import type { ScalarValue } from '../../types/graph.js';
import type { TermSpec } from '../../types/template.js';
import { DslValidationError } from '../helpers/errors.js';

const NAME_RE = /^\w+$/;
const ENTITY_RE = /^<([^<>\s]+)>$/;

export type TermPosition = 'subject' | 'object';

/** Anything {@link parseTerm} accepts */
export type TermInput = ScalarValue | TermSpec;

/** Creates a join variable term. */
export function variable(name: string): TermSpec {
  if (!NAME_RE.test(name)) {
    throw new DslValidationError(`Invalid variable name "${name}"`);
  }
  return { type: 'variable', name };
}

/** Creates a binding term, filled from template parameters. */
export function binding(name: string): TermSpec {
  if (!NAME_RE.test(name)) {
    throw new DslValidationError(`Invalid binding name "${name}"`);
  }
  return { type: 'binding', name };
}

/**
 * Parses a term written in the compact syntax.
 *
 * Plain strings are entity ids in subject position and string literals
 * in object position; non-string scalars are always literals.
 */
export function parseTerm(raw: TermInput, position: TermPosition): TermSpec {
  if (typeof raw === 'number' || typeof raw === 'boolean' || raw instanceof Date) {
    if (position === 'subject') {
      throw new DslValidationError(`Subject term must be an entity, got ${raw instanceof Date ? 'date' : typeof raw}`);
    }
    return { type: 'literal', value: raw };
  }

  if (typeof raw === 'object') {
    return raw;
  }

  if (raw.startsWith('?')) {
    return variable(raw.slice(1));
  }
  if (raw.startsWith('$')) {
    return binding(raw.slice(1));
  }

  const entityId = ENTITY_RE.exec(raw)?.[1];
  if (entityId !== undefined) {
    return { type: 'entity', id: entityId };
  }

  if (position === 'subject') {
    if (raw === '' || /\s/.test(raw)) {
      throw new DslValidationError(`Invalid subject term "${raw}"`);
    }
    return { type: 'entity', id: raw };
  }

  return { type: 'literal', value: raw };
}

/**
 * Renders a term back into the compact syntax (used in messages and provenance).
 */
export function formatTerm(term: TermSpec): string {
  switch (term.type) {
    case 'variable':
      return `?${term.name}`;
    case 'binding':
      return `$${term.name}`;
    case 'entity':
      return term.id;
    case 'literal':
      return term.value instanceof Date ? term.value.toISOString() : JSON.stringify(term.value);
  }
}
