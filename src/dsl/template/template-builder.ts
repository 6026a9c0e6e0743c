/**
 * Fluent builder for query templates.
 *
 * The resulting {@link QueryTemplate} is plain data: it can be registered
 * in a TemplateRegistry, serialized, or compared, and running it needs no
 * code beyond the QueryEngine.
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
import { DslValidationError } from '../helpers/errors.js';
import { requireIdentifier, requireNonEmptyString } from '../helpers/validators.js';
import { parseTerm, type TermInput } from './terms.js';
import { validateTemplateDefinition } from './validation.js';

/**
 * Options for declaring a parameter via {@link QueryTemplateBuilder.param}.
 */
export interface QueryParamOptions {
  /** Value type. Defaults to `'entity'`. */
  type?: TemplateParamType;

  /** Accepted entity kind (entity parameters only). */
  kind?: string;

  /** Default value; makes the parameter optional. */
  default?: ScalarValue;

  /** Lets the Retriever fill the parameter from values of this predicate mentioned in a question. */
  matchPredicate?: string;

  /** Human-readable description (documentation only). */
  description?: string;
}

/**
 * Fluent builder for {@link QueryTemplate}.
 *
 * Terms use the compact syntax of {@link parseTerm}: `?var`, `$binding`,
 * `<Entity>` or a bare id in subject position, and a literal in object
 * position.
 *
 * @example
 * ```typescript
 * const template = QueryTemplateBuilder.create('client-transaction-review')
 *   .description('KYC status of a client and the amounts of their transactions')
 *   .param('client', { kind: 'Client' })
 *   .match('?tx', 'client', '$client')
 *   .expand('$client', '?tx')
 *   .requires('$client', 'kyc_status')
 *   .requires('?tx', 'amount')
 *   .keywords('review', 'kyc')
 *   .build();
 * ```
 */
export class QueryTemplateBuilder {
  private readonly _name: string;
  private _description?: string;
  private readonly _params: TemplateParam[] = [];
  private readonly _declaredNames = new Set<string>();
  private readonly _patterns: PatternSpec[] = [];
  private readonly _expand: TermSpec[] = [];
  private readonly _requires: RequirementSpec[] = [];
  private readonly _multiValued: string[] = [];
  private readonly _keywords: string[] = [];

  /** @internal Use {@link QueryTemplateBuilder.create} instead. */
  constructor(name: string) {
    requireNonEmptyString(name, 'Template name');
    this._name = name;
  }

  static create(name: string): QueryTemplateBuilder {
    return new QueryTemplateBuilder(name);
  }

  description(value: string): this {
    this._description = value;
    return this;
  }

  /**
   * Declares a template parameter.
   *
   * @throws {DslValidationError} If `name` is empty or already declared.
   */
  param(name: string, options: QueryParamOptions = {}): this {
    requireNonEmptyString(name, 'Parameter name');
    if (this._declaredNames.has(name)) {
      throw new DslValidationError(`Duplicate parameter declaration: "${name}"`);
    }
    this._declaredNames.add(name);

    this._params.push({
      name,
      type: options.type ?? 'entity',
      ...(options.kind !== undefined && { kind: options.kind }),
      ...(options.default !== undefined && { default: options.default }),
      ...(options.matchPredicate !== undefined && { matchPredicate: options.matchPredicate }),
      ...(options.description !== undefined && { description: options.description }),
    });
    return this;
  }

  /** Appends a triple pattern to the join. */
  match(subject: TermInput, predicate: string, object: TermInput): this {
    requireIdentifier(predicate, 'Predicate');
    this._patterns.push({
      subject: parseTerm(subject, 'subject'),
      predicate,
      object: parseTerm(object, 'object'),
    });
    return this;
  }

  /** Adds subjects whose complete fact sets are included in the result. */
  expand(...terms: TermInput[]): this {
    for (const term of terms) {
      this._expand.push(parseTerm(term, 'subject'));
    }
    return this;
  }

  /** Marks predicates that every subject of `subject` must have a fact for. */
  requires(subject: TermInput, ...predicates: string[]): this {
    if (predicates.length === 0) {
      throw new DslValidationError('requires() needs at least one predicate');
    }
    const term = parseTerm(subject, 'subject');
    for (const predicate of predicates) {
      requireIdentifier(predicate, 'Required predicate');
      this._requires.push({ subject: term, predicate });
    }
    return this;
  }

  /** Declares predicates whose multiple values form a set rather than a conflict. */
  multiValued(...predicates: string[]): this {
    for (const predicate of predicates) {
      requireIdentifier(predicate, 'Multi-valued predicate');
      if (!this._multiValued.includes(predicate)) {
        this._multiValued.push(predicate);
      }
    }
    return this;
  }

  /** Adds words or phrases that route questions to this template. */
  keywords(...values: string[]): this {
    for (const value of values) {
      requireNonEmptyString(value, 'Keyword');
      this._keywords.push(value);
    }
    return this;
  }

  /**
   * Produces a detached {@link QueryTemplate}.
   *
   * @throws {TemplateDefinitionError} If the accumulated definition is inconsistent
   *   (undeclared binding, unbound variable, no patterns, ...).
   */
  build(): QueryTemplate {
    const template: QueryTemplate = {
      name: this._name,
      ...(this._description !== undefined && { description: this._description }),
      params: this._params.map(p => ({ ...p })),
      patterns: this._patterns.map(p => ({ ...p })),
      expand: [...this._expand],
      requires: this._requires.map(r => ({ ...r })),
      multiValued: [...this._multiValued],
      keywords: [...this._keywords],
    };

    validateTemplateDefinition(template);
    return template;
  }
}
