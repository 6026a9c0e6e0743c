import type { ScalarValue } from '../types/graph.js';
import type { FactGroup, QueryTemplate, TemplateBindings, TemplateParam } from '../types/template.js';
import type { KnowledgeGraph } from './knowledge-graph.js';
import type { QueryEngine } from './query-engine.js';
import type { TemplateRegistry } from './template-registry.js';
import { dedupeFacts } from '../evaluation/fact-deduplicator.js';
import { scalarKey } from '../utils/relation-object.js';

export const DEFAULT_MAX_GROUPS = 3;

export interface RetrieverConfig {
  /** Maximum number of fact groups per question (default 3) */
  maxGroups?: number;
}

export interface RetrieveOptions {
  maxGroups?: number;
}

/** Template selected for a question, before it is run */
export interface TemplateCandidate {
  template: QueryTemplate;
  score: number;
  /** Registration position, the tie-breaker for equal scores */
  order: number;
  /** Matched keywords, in declaration order */
  matched: string[];
  /** `undefined` when a required parameter could not be filled */
  bindings: TemplateBindings | undefined;
}

/** Mention of an entity id in a question */
export interface EntityMention {
  id: string;
  kind: string;
  index: number;
}

// Oddělovače tokenů; `<` a `>` kvůli zápisu `<C1>`
const TOKEN_RE = /[^\s,;!?()<>"'`]+/g;
const TRAILING_PUNCTUATION_RE = /[.:]+$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive search; returns the index of the first hit or -1.
 */
function findWord(text: string, word: string): number {
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(word)}(?![\\p{L}\\p{N}_])`, 'iu');
  const match = pattern.exec(text);
  return match ? match.index : -1;
}

function literalMatchesParam(value: ScalarValue, param: TemplateParam): boolean {
  switch (param.type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'date':
      return value instanceof Date;
    default:
      return false;
  }
}

/** Text forms under which a literal may appear in a question */
function literalSpellings(value: ScalarValue): string[] {
  if (value instanceof Date) {
    const iso = value.toISOString();
    return [iso.slice(0, 10), iso];
  }
  return [String(value)];
}

/**
 * Maps a natural-language question to template runs.
 *
 * Selection is lexical: a template scores one point per keyword found in
 * the question (whole words, case-insensitive). Entity parameters are
 * filled from entity ids mentioned in the question, matched exactly and
 * case-sensitively, so that the article "a" never stands for client "A".
 * Each selected template yields one {@link FactGroup} with its facts
 * deduplicated and its template and bindings kept for provenance.
 */
export class Retriever {
  private readonly graph: KnowledgeGraph;
  private readonly registry: TemplateRegistry;
  private readonly engine: QueryEngine;
  private readonly maxGroups: number;

  constructor(graph: KnowledgeGraph, registry: TemplateRegistry, engine: QueryEngine, config: RetrieverConfig = {}) {
    this.graph = graph;
    this.registry = registry;
    this.engine = engine;
    this.maxGroups = config.maxGroups ?? DEFAULT_MAX_GROUPS;
  }

  /**
   * Retrieves fact groups for a question, best match first.
   *
   * An empty array means no template applies; that is a normal outcome.
   */
  retrieve(question: string, options: RetrieveOptions = {}): FactGroup[] {
    const limit = options.maxGroups ?? this.maxGroups;
    const groups: FactGroup[] = [];

    for (const candidate of this.selectTemplates(question)) {
      if (groups.length >= limit) break;
      if (candidate.bindings === undefined) continue;

      groups.push(this.retrieveTemplate(candidate.template.name, candidate.bindings, candidate.score));
    }

    return groups;
  }

  /**
   * Runs one template with explicit bindings and packs the result as a
   * fact group, bypassing keyword selection.
   *
   * @throws {QueryError} On an unknown template or invalid bindings
   */
  retrieveTemplate(templateName: string, bindings: Readonly<TemplateBindings>, score: number = 0): FactGroup {
    const template = this.registry.get(templateName);
    const result = this.engine.run(templateName, bindings);
    return Object.freeze({
      template: result.template,
      bindings: result.bindings,
      score,
      facts: Object.freeze(dedupeFacts(result.facts)),
      requirements: result.requirements,
      multiValued: Object.freeze([...template.multiValued]),
    });
  }

  /**
   * Templates with at least one keyword hit, ordered by score (descending)
   * and then registration order. Candidates whose parameters cannot be
   * filled are included with `bindings: undefined`.
   */
  selectTemplates(question: string): TemplateCandidate[] {
    const mentions = this.extractEntities(question);
    const candidates: TemplateCandidate[] = [];

    this.registry.list().forEach((template, order) => {
      const matched = template.keywords.filter(keyword => findWord(question, keyword) >= 0);
      if (matched.length === 0) return;

      candidates.push({
        template,
        score: matched.length,
        order,
        matched,
        bindings: this.fillBindings(template, question, mentions),
      });
    });

    return candidates.sort((a, b) => b.score - a.score || a.order - b.order);
  }

  /**
   * Entity ids mentioned in the question, in order of first appearance.
   */
  extractEntities(question: string): EntityMention[] {
    const mentions: EntityMention[] = [];
    const seen = new Set<string>();

    for (const match of question.matchAll(TOKEN_RE)) {
      const token = match[0].replace(TRAILING_PUNCTUATION_RE, '');
      if (token === '' || seen.has(token)) continue;

      const kind = this.graph.getKind(token);
      if (kind !== undefined) {
        seen.add(token);
        mentions.push({ id: token, kind, index: match.index ?? 0 });
      }
    }

    return mentions;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private fillBindings(
    template: QueryTemplate,
    question: string,
    mentions: readonly EntityMention[],
  ): TemplateBindings | undefined {
    const bindings: TemplateBindings = {};
    const used = new Set<string>();

    for (const param of template.params) {
      let value: ScalarValue | undefined;

      if (param.type === 'entity') {
        const mention = mentions.find(m => !used.has(m.id) && (param.kind === undefined || m.kind === param.kind));
        if (mention) {
          used.add(mention.id);
          value = mention.id;
        }
      } else if (param.matchPredicate !== undefined) {
        value = this.findLiteral(question, param);
      }

      value ??= param.default;
      if (value === undefined) {
        return undefined;
      }
      bindings[param.name] = value;
    }

    return bindings;
  }

  /**
   * Literal of `param.matchPredicate` that the question mentions earliest.
   */
  private findLiteral(question: string, param: TemplateParam): ScalarValue | undefined {
    const seen = new Set<string>();
    let best: { value: ScalarValue; index: number } | undefined;

    for (const relation of this.graph.match({ predicate: param.matchPredicate })) {
      if (relation.object.type !== 'literal') continue;
      const { value } = relation.object;
      const key = scalarKey(value);
      if (seen.has(key) || !literalMatchesParam(value, param)) continue;
      seen.add(key);

      for (const spelling of literalSpellings(value)) {
        const index = findWord(question, spelling);
        if (index >= 0 && (best === undefined || index < best.index)) {
          best = { value, index };
        }
      }
    }

    return best?.value;
  }
}
