import type { RelationObject, ScalarValue } from './graph.js';
import type { EvidenceFact, Fact } from './fact.js';

/**
 * Term of a triple pattern inside a query template.
 *
 * - `variable` (`?tx`) binds to whatever the graph yields and joins across patterns
 * - `binding` (`$client`) is replaced by the caller-supplied parameter value
 * - `entity` / `literal` are constants
 */
export type TermSpec =
  | { type: 'variable'; name: string }
  | { type: 'binding'; name: string }
  | { type: 'entity'; id: string }
  | { type: 'literal'; value: ScalarValue };

/** One triple pattern of a template; the predicate is always a constant */
export interface PatternSpec {
  subject: TermSpec;
  predicate: string;
  object: TermSpec;
}

/** Supported template parameter types */
export type TemplateParamType = 'entity' | 'string' | 'number' | 'boolean' | 'date';

/** Declared template parameter (a binding the caller supplies) */
export interface TemplateParam {
  name: string;
  type: TemplateParamType;
  /** Accepted entity kind for `entity` parameters */
  kind?: string;
  /** Default value; a parameter with a default is optional */
  default?: ScalarValue;
  /** Retriever hint: fill the parameter from literal values of this predicate found in the question */
  matchPredicate?: string;
  description?: string;
}

/** Predicate that must have at least one fact for every subject the term resolves to */
export interface RequirementSpec {
  subject: TermSpec;
  predicate: string;
}

/** Named, parameterized graph query */
export interface QueryTemplate {
  name: string;
  description?: string;
  params: TemplateParam[];
  patterns: PatternSpec[];
  /** Subjects whose complete fact sets are flattened into the result */
  expand: TermSpec[];
  requires: RequirementSpec[];
  /** Predicates treated as sets (not conflicts) during classification */
  multiValued: string[];
  /** Words and phrases that route a question to this template */
  keywords: string[];
}

/** Values supplied for template parameters */
export type TemplateBindings = Record<string, ScalarValue>;

/** Variable assignment produced by a join */
export interface Solution {
  readonly variables: ReadonlyMap<string, RelationObject>;
  readonly relationIds: readonly string[];
}

/** Requirement resolved to concrete subjects */
export interface ResolvedRequirement {
  readonly predicate: string;
  /** Human-readable term (`?tx`, `$client`, `C1`) */
  readonly term: string;
  readonly subjects: readonly string[];
}

/** Facts of one subject */
export interface SubjectFacts {
  readonly subject: string;
  readonly facts: readonly Fact[];
}

/** Result of QueryEngine.run() */
export interface QueryResult {
  readonly template: string;
  readonly bindings: Readonly<TemplateBindings>;
  readonly solutions: readonly Solution[];
  readonly facts: readonly Fact[];
  readonly groups: readonly SubjectFacts[];
  readonly requirements: readonly ResolvedRequirement[];
}

/** Fact group produced by the Retriever for a single template invocation */
export interface FactGroup {
  readonly template: string;
  readonly bindings: Readonly<TemplateBindings>;
  /** Number of template keywords found in the question */
  readonly score: number;
  readonly facts: readonly EvidenceFact[];
  readonly requirements: readonly ResolvedRequirement[];
  readonly multiValued: readonly string[];
}
