import type { Fact } from '../types/fact.js';
import type { RelationObject, ScalarValue } from '../types/graph.js';
import type {
  QueryResult,
  QueryTemplate,
  ResolvedRequirement,
  Solution,
  SubjectFacts,
  TemplateBindings,
  TemplateParam,
  TermSpec,
} from '../types/template.js';
import type { KnowledgeGraph } from './knowledge-graph.js';
import type { TemplateRegistry } from './template-registry.js';
import { toFacts } from './knowledge-graph.js';
import { MissingBindingError } from './errors.js';
import { validateBindings } from '../dsl/template/validation.js';
import { formatTerm } from '../dsl/template/terms.js';
import { sameObject } from '../utils/relation-object.js';

interface PartialSolution {
  variables: Map<string, RelationObject>;
  relationIds: string[];
}

interface RunContext {
  template: QueryTemplate;
  params: ReadonlyMap<string, TemplateParam>;
  bindings: TemplateBindings;
}

/**
 * Binds a variable term to a value, or checks an earlier binding agrees.
 * Non-variable terms always pass: the graph match already enforced them.
 */
function bindVariable(variables: Map<string, RelationObject>, term: TermSpec, value: RelationObject): boolean {
  if (term.type !== 'variable') {
    return true;
  }
  const existing = variables.get(term.name);
  if (existing) {
    return sameObject(existing, value);
  }
  variables.set(term.name, value);
  return true;
}

/**
 * Runs named templates against a KnowledgeGraph.
 *
 * Patterns are evaluated in declaration order as a nested-loop inner join:
 * each solution of the patterns so far constrains the next `match` call
 * through its bound variables, and a solution that fails a pattern is
 * dropped. The engine is stateless; a frozen graph can serve any number of
 * concurrent runs.
 */
export class QueryEngine {
  private readonly graph: KnowledgeGraph;
  private readonly registry: TemplateRegistry;

  constructor(graph: KnowledgeGraph, registry: TemplateRegistry) {
    this.graph = graph;
    this.registry = registry;
  }

  /**
   * Executes a registered template.
   *
   * An empty result is a valid outcome. The result also carries the facts
   * of every required predicate for the subjects it resolved to, so that
   * completeness can be judged from the result alone.
   *
   * @throws {UnknownTemplateError} When the template is not registered
   * @throws {MissingBindingError} When a required parameter is not bound
   * @throws {InvalidBindingError} When a bound value does not fit its parameter
   */
  run(templateName: string, bindings: Readonly<Record<string, ScalarValue>> = {}): QueryResult {
    const template = this.registry.get(templateName);
    const resolved = validateBindings(template, bindings, id => this.graph.getKind(id));

    const context: RunContext = {
      template,
      params: new Map(template.params.map(p => [p.name, p])),
      bindings: resolved,
    };

    const solutions = this.join(context);
    const collected = new Map<string, Fact>();
    const collect = (facts: Iterable<Fact>): void => {
      for (const fact of facts) {
        const key = `${fact.source.relationId}\u0000${fact.source.origin}`;
        if (!collected.has(key)) {
          collected.set(key, fact);
        }
      }
    };

    for (const solution of solutions) {
      for (const relationId of solution.relationIds) {
        const relation = this.graph.getRelation(relationId);
        if (relation) {
          collect(toFacts(relation));
        }
      }
    }

    for (const term of template.expand) {
      for (const subject of this.resolveSubjects(term, solutions, context)) {
        collect(this.graph.facts({ subject }));
      }
    }

    const requirements: ResolvedRequirement[] = [];
    for (const requirement of template.requires) {
      const subjects = this.resolveSubjects(requirement.subject, solutions, context);
      for (const subject of subjects) {
        collect(this.graph.facts({ subject, predicate: requirement.predicate }));
      }
      requirements.push(Object.freeze({
        predicate: requirement.predicate,
        term: formatTerm(requirement.subject),
        subjects: Object.freeze(subjects),
      }));
    }

    const facts = [...collected.values()].sort(
      (a, b) => this.graph.relationOrder(a.source.relationId) - this.graph.relationOrder(b.source.relationId),
    );

    return {
      template: template.name,
      bindings: Object.freeze(resolved),
      solutions,
      facts,
      groups: groupBySubject(facts),
      requirements,
    };
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private join(context: RunContext): Solution[] {
    let partial: PartialSolution[] = [{ variables: new Map(), relationIds: [] }];

    for (const pattern of context.template.patterns) {
      const next: PartialSolution[] = [];

      for (const solution of partial) {
        const subject = this.resolveTerm(pattern.subject, solution.variables, context);
        const object = this.resolveTerm(pattern.object, solution.variables, context);
        // Literál nemůže být subjektem
        const subjectId = subject === undefined ? undefined : subject.type === 'entity' ? subject.id : null;
        if (subjectId === null) {
          continue;
        }

        const candidates = this.graph.match({
          subject: subjectId,
          predicate: pattern.predicate,
          object,
        });

        for (const relation of candidates) {
          const variables = new Map(solution.variables);
          if (!bindVariable(variables, pattern.subject, { type: 'entity', id: relation.subject })) continue;
          if (!bindVariable(variables, pattern.object, relation.object)) continue;
          next.push({ variables, relationIds: [...solution.relationIds, relation.id] });
        }
      }

      partial = next;
      if (partial.length === 0) {
        break;
      }
    }

    return partial.map(p => Object.freeze({ variables: p.variables, relationIds: Object.freeze(p.relationIds) }));
  }

  /**
   * Concrete value of a term under a partial solution; `undefined` for an
   * unbound variable (wildcard).
   */
  private resolveTerm(
    term: TermSpec,
    variables: ReadonlyMap<string, RelationObject>,
    context: RunContext,
  ): RelationObject | undefined {
    switch (term.type) {
      case 'variable':
        return variables.get(term.name);
      case 'entity':
        return { type: 'entity', id: term.id };
      case 'literal':
        return { type: 'literal', value: term.value };
      case 'binding': {
        const value = context.bindings[term.name];
        if (value === undefined) {
          throw new MissingBindingError(context.template.name, [term.name]);
        }
        const param = context.params.get(term.name);
        if (param?.type === 'entity' && typeof value === 'string') {
          return { type: 'entity', id: value };
        }
        return { type: 'literal', value };
      }
    }
  }

  /**
   * Entity ids a subject term stands for. Variables yield one id per
   * distinct value across solutions; constants and bindings resolve even
   * when the join produced nothing.
   */
  private resolveSubjects(term: TermSpec, solutions: readonly Solution[], context: RunContext): string[] {
    if (term.type !== 'variable') {
      const value = this.resolveTerm(term, new Map(), context);
      return value?.type === 'entity' ? [value.id] : [];
    }

    const subjects = new Set<string>();
    for (const solution of solutions) {
      const value = solution.variables.get(term.name);
      if (value?.type === 'entity') {
        subjects.add(value.id);
      }
    }
    return [...subjects];
  }
}

/**
 * Groups facts by subject, keeping the order in which subjects first appear.
 */
export function groupBySubject(facts: readonly Fact[]): SubjectFacts[] {
  const groups = new Map<string, Fact[]>();
  for (const fact of facts) {
    let group = groups.get(fact.subject);
    if (!group) {
      group = [];
      groups.set(fact.subject, group);
    }
    group.push(fact);
  }
  return [...groups.entries()].map(([subject, subjectFacts]) => ({ subject, facts: subjectFacts }));
}
