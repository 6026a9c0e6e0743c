import type { QueryTemplate, TermSpec } from '../types/template.js';
import { TemplateDefinitionError, UnknownTemplateError } from './errors.js';
import { validateTemplateDefinition } from '../dsl/template/validation.js';
import { cloneScalar } from '../utils/relation-object.js';

export interface RegisterOptions {
  /** Nahradí existující šablonu stejného jména místo vyhození chyby */
  replace?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function cloneTerm(term: TermSpec): TermSpec {
  return term.type === 'literal' ? { type: 'literal', value: cloneScalar(term.value) } : { ...term };
}

function cloneTemplate(template: QueryTemplate): QueryTemplate {
  return {
    name: template.name,
    ...(template.description !== undefined && { description: template.description }),
    params: template.params.map(p => ({
      ...p,
      ...(p.default !== undefined && { default: cloneScalar(p.default) }),
    })),
    patterns: template.patterns.map(p => ({
      subject: cloneTerm(p.subject),
      predicate: p.predicate,
      object: cloneTerm(p.object),
    })),
    expand: template.expand.map(cloneTerm),
    requires: template.requires.map(r => ({ subject: cloneTerm(r.subject), predicate: r.predicate })),
    multiValued: [...template.multiValued],
    keywords: [...template.keywords],
  };
}

/**
 * Registr pojmenovaných dotazových šablon.
 *
 * Šablony jsou data (tagged varianty termů), QueryEngine je jen
 * interpretuje. Přidání šablony nevyžaduje žádnou změnu kódu.
 * Pořadí registrace se zachovává, Retriever podle něj řadí shodné skóre.
 */
export class TemplateRegistry {
  private readonly templates = new Map<string, QueryTemplate>();

  constructor(templates: Iterable<QueryTemplate> = []) {
    for (const template of templates) {
      this.register(template);
    }
  }

  /**
   * Zaregistruje šablonu. Uloží se zmrazená kopie.
   *
   * @throws {TemplateDefinitionError} Neplatná definice nebo duplicitní jméno
   */
  register(template: QueryTemplate, options: RegisterOptions = {}): QueryTemplate {
    validateTemplateDefinition(template);

    if (this.templates.has(template.name) && !options.replace) {
      throw new TemplateDefinitionError(template.name, 'is already registered');
    }

    const stored = deepFreeze(cloneTemplate(template));
    this.templates.set(template.name, stored);
    return stored;
  }

  registerAll(templates: Iterable<QueryTemplate>, options: RegisterOptions = {}): number {
    let count = 0;
    for (const template of templates) {
      this.register(template, options);
      count++;
    }
    return count;
  }

  /**
   * Vrátí šablonu podle jména.
   *
   * @throws {UnknownTemplateError} Šablona neexistuje
   */
  get(name: string): QueryTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new UnknownTemplateError(name);
    }
    return template;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  names(): string[] {
    return [...this.templates.keys()];
  }

  /**
   * Všechny šablony v pořadí registrace.
   */
  list(): QueryTemplate[] {
    return [...this.templates.values()];
  }

  get size(): number {
    return this.templates.size;
  }
}
