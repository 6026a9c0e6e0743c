import type {
  AssertOptions,
  Entity,
  EntityKind,
  GraphChangeEvent,
  GraphChangeListener,
  GraphStats,
  LoadSummary,
  Relation,
  RelationAssertion,
  RelationObject,
  ScalarValue,
  TriplePattern,
} from '../types/graph.js';
import type { Fact } from '../types/fact.js';
import {
  AttributeOverwriteError,
  DuplicateEntityError,
  GraphFrozenError,
  GraphIntegrityError,
  UnknownEntityError,
} from './errors.js';
import { cloneObject, cloneScalar, isScalarValue, objectKey } from '../utils/relation-object.js';
import {
  isEncodableIdentifier,
  parseTriples,
  serializeTriples,
  type TripleDocument,
} from '../persistence/triple-format.js';

const KIND_RE = /^[A-Za-z_][\w-]*$/;

export interface KnowledgeGraphConfig {
  name?: string;
  onChange?: GraphChangeListener;
}

interface EntityRecord {
  id: string;
  kind: EntityKind;
  createdAt: number;
}

interface RelationRecord {
  id: string;
  subject: string;
  predicate: string;
  object: RelationObject;
  assertions: RelationAssertion[];
  latest: RelationAssertion;
  /** Graph-wide sequence number of the latest assertion */
  sequence: number;
}

type AssertionOutcome = 'added' | 'reasserted' | 'unchanged';

/**
 * Creates a frozen, detached copy of a relation.
 */
function snapshotRelation(record: RelationRecord): Relation {
  return Object.freeze({
    id: record.id,
    subject: record.subject,
    predicate: record.predicate,
    object: Object.freeze(cloneObject(record.object)),
    source: record.latest.source,
    timestamp: record.latest.timestamp,
    assertions: Object.freeze(record.assertions.map(a => Object.freeze({ ...a }))),
  });
}

/**
 * Converts a relation into immutable fact snapshots, one per assertion.
 */
export function toFacts(relation: Relation): Fact[] {
  const value = Object.freeze(cloneObject(relation.object));
  return relation.assertions.map(assertion => Object.freeze({
    subject: relation.subject,
    predicate: relation.predicate,
    value,
    source: Object.freeze({
      relationId: relation.id,
      origin: assertion.source,
      timestamp: assertion.timestamp,
    }),
  }));
}

/**
 * In-memory store of typed entities and relations.
 *
 * Entities own no state besides id and kind; attributes are literal
 * relations whose subject is the entity. Relations form a set: asserting
 * the same (subject, predicate, object) again returns the existing
 * relation, and a source it has not seen yet is added to its assertions.
 * Nothing is ever removed; corrections are new relations.
 *
 * Lifecycle: build (or load), then {@link freeze} before concurrent reads.
 */
export class KnowledgeGraph {
  private readonly entityRecords = new Map<string, EntityRecord>();
  private readonly relations: RelationRecord[] = [];
  private readonly relationsById = new Map<string, RelationRecord>();
  private readonly positionById = new Map<string, number>();
  private readonly tripleIndex = new Map<string, RelationRecord>();
  private assertionSequence = 0;

  /** Relation positions per subject / predicate, in insertion order */
  private readonly bySubject = new Map<string, number[]>();
  private readonly byPredicate = new Map<string, number[]>();

  private readonly name: string;
  private readonly changeListener: GraphChangeListener | undefined;
  private frozen = false;

  constructor(config: KnowledgeGraphConfig = {}) {
    this.name = config.name ?? 'graph';
    this.changeListener = config.onChange;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Declares an entity and asserts its attributes.
   *
   * Re-declaring an entity with the same kind merges attributes; an
   * attribute whose value would change is rejected.
   *
   * @throws {DuplicateEntityError} When the id exists with a different kind
   * @throws {AttributeOverwriteError} When an attribute already holds another value
   */
  addEntity(
    kind: EntityKind,
    id: string,
    attributes: Record<string, ScalarValue> = {},
    options: AssertOptions = {},
  ): Entity {
    this.assertMutable();
    this.assertIdentifier(id, 'entity id');
    if (!KIND_RE.test(kind)) {
      throw new GraphIntegrityError(`Invalid entity kind "${kind}"`);
    }

    const existing = this.entityRecords.get(id);
    if (existing && existing.kind !== kind) {
      throw new DuplicateEntityError(id, existing.kind, kind);
    }

    for (const [name, value] of Object.entries(attributes)) {
      this.assertIdentifier(name, 'attribute name');
      if (!isScalarValue(value)) {
        throw new GraphIntegrityError(`Attribute "${name}" of entity "${id}" is not a scalar value`);
      }
      if (existing) {
        const current = this.latestLiteral(id, name);
        if (current !== undefined && objectKey(current) !== objectKey({ type: 'literal', value })) {
          throw new AttributeOverwriteError(id, name);
        }
      }
    }

    if (!existing) {
      this.entityRecords.set(id, { id, kind, createdAt: options.timestamp ?? Date.now() });
      this.notifyChange({ type: 'entity_created', entityId: id });
    }

    for (const [name, value] of Object.entries(attributes)) {
      const [record, outcome] = this.insertRelation(id, name, { type: 'literal', value }, options);
      if (outcome !== 'unchanged') {
        const type = outcome === 'added' ? 'attribute_added' : 'relation_reasserted';
        this.notifyChange({ type, entityId: id, relation: snapshotRelation(record) });
      }
    }

    return this.snapshotEntity(id);
  }

  /**
   * Asserts a relation. Idempotent per (subject, predicate, object) and
   * source; a new source is recorded on the existing relation.
   *
   * @throws {UnknownEntityError} When the subject or an entity object is absent
   */
  addRelation(
    subjectId: string,
    predicate: string,
    object: RelationObject,
    options: AssertOptions = {},
  ): Relation {
    this.assertMutable();
    this.assertIdentifier(predicate, 'predicate');

    if (!this.entityRecords.has(subjectId)) {
      throw new UnknownEntityError(subjectId, 'subject');
    }
    if (object.type === 'entity' && !this.entityRecords.has(object.id)) {
      throw new UnknownEntityError(object.id, 'object');
    }
    if (object.type === 'literal' && !isScalarValue(object.value)) {
      throw new GraphIntegrityError(`Relation ${subjectId} ${predicate} has a non-scalar literal`);
    }

    const [record, outcome] = this.insertRelation(subjectId, predicate, object, options);
    if (outcome !== 'unchanged') {
      const type = outcome === 'added' ? 'relation_added' : 'relation_reasserted';
      this.notifyChange({ type, entityId: subjectId, relation: snapshotRelation(record) });
    }
    return snapshotRelation(record);
  }

  /**
   * Records a corrected attribute value with explicit provenance.
   *
   * The previous relation stays in the graph; both values are visible to
   * queries until the caller decides how to treat them. Confirming the
   * current value adds the provenance to the existing relation.
   */
  updateAttribute(
    entityId: string,
    name: string,
    value: ScalarValue,
    provenance: string,
    timestamp: number = Date.now(),
  ): Relation {
    if (!provenance) {
      throw new GraphIntegrityError('updateAttribute() requires a provenance');
    }
    return this.addRelation(entityId, name, { type: 'literal', value }, { source: provenance, timestamp });
  }

  /**
   * Merges a persisted triple document into the graph.
   *
   * Entity declarations are applied before relations, so statement order
   * within the document does not matter. Loading the same document twice
   * adds nothing the second time.
   */
  load(source: string | TripleDocument, options: AssertOptions = {}): LoadSummary {
    this.assertMutable();
    const document = typeof source === 'string' ? parseTriples(source) : source;
    this.validateDocument(document);

    const assertOptions: AssertOptions = {
      source: options.source ?? 'load',
      ...(options.timestamp !== undefined && { timestamp: options.timestamp }),
    };

    const entitiesBefore = this.entityRecords.size;
    const relationsBefore = this.relations.length;

    for (const entity of document.entities) {
      this.addEntity(entity.kind, entity.id, {}, assertOptions);
    }
    for (const triple of document.triples) {
      this.addRelation(triple.subject, triple.predicate, triple.object, assertOptions);
    }

    return {
      entitiesAdded: this.entityRecords.size - entitiesBefore,
      relationsAdded: this.relations.length - relationsBefore,
      statements: document.entities.length + document.triples.length,
    };
  }

  /**
   * Stops accepting mutations. Irreversible.
   */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  /**
   * Pattern matching over relations; undefined pattern fields are wildcards.
   *
   * Returns a lazy iterable: every iteration scans the graph again, in
   * relation insertion order.
   */
  match(pattern: TriplePattern = {}): Iterable<Relation> {
    return {
      [Symbol.iterator]: () => this.scan(pattern),
    };
  }

  /**
   * Same as {@link match}, materialized as immutable facts: one fact per
   * assertion, so a relation confirmed by two sources yields two facts.
   */
  facts(pattern: TriplePattern = {}): Fact[] {
    const result: Fact[] = [];
    for (const relation of this.scan(pattern)) {
      result.push(...toFacts(relation));
    }
    return result;
  }

  getEntity(id: string): Entity | undefined {
    return this.entityRecords.has(id) ? this.snapshotEntity(id) : undefined;
  }

  hasEntity(id: string): boolean {
    return this.entityRecords.has(id);
  }

  getKind(id: string): EntityKind | undefined {
    return this.entityRecords.get(id)?.kind;
  }

  /**
   * Entities in declaration order, optionally filtered by kind.
   */
  entities(kind?: EntityKind): Entity[] {
    const result: Entity[] = [];
    for (const record of this.entityRecords.values()) {
      if (kind === undefined || record.kind === kind) {
        result.push(this.snapshotEntity(record.id));
      }
    }
    return result;
  }

  /**
   * Latest asserted value of every literal attribute of an entity.
   */
  attributes(id: string): Record<string, ScalarValue> {
    const latest = new Map<string, RelationRecord>();
    for (const position of this.bySubject.get(id) ?? []) {
      const record = this.relations[position]!;
      if (record.object.type !== 'literal') continue;
      const current = latest.get(record.predicate);
      if (!current || record.sequence > current.sequence) {
        latest.set(record.predicate, record);
      }
    }

    const result: Record<string, ScalarValue> = {};
    for (const [predicate, record] of latest) {
      if (record.object.type === 'literal') {
        result[predicate] = cloneScalar(record.object.value);
      }
    }
    return result;
  }

  getRelation(id: string): Relation | undefined {
    const relation = this.relationsById.get(id);
    return relation ? snapshotRelation(relation) : undefined;
  }

  /**
   * Insertion position of a relation; unknown ids sort after every known one.
   */
  relationOrder(id: string): number {
    return this.positionById.get(id) ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Serializes the graph into the textual triple format.
   */
  dump(): string {
    return serializeTriples(this.toDocument());
  }

  toDocument(): TripleDocument {
    return {
      entities: [...this.entityRecords.values()].map(e => ({ id: e.id, kind: e.kind })),
      triples: this.relations.map(r => ({
        subject: r.subject,
        predicate: r.predicate,
        object: cloneObject(r.object),
      })),
    };
  }

  get size(): number {
    return this.relations.length;
  }

  stats(): GraphStats {
    const entitiesByKind: Record<string, number> = {};
    for (const record of this.entityRecords.values()) {
      entitiesByKind[record.kind] = (entitiesByKind[record.kind] ?? 0) + 1;
    }
    return {
      entities: this.entityRecords.size,
      relations: this.relations.length,
      entitiesByKind,
      frozen: this.frozen,
    };
  }

  getName(): string {
    return this.name;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private *scan(pattern: TriplePattern): Generator<Relation> {
    const { subject, predicate, object } = pattern;
    const wantedObject = object !== undefined ? objectKey(object) : undefined;

    for (const position of this.candidatePositions(subject, predicate)) {
      const relation = this.relations[position]!;
      if (subject !== undefined && relation.subject !== subject) continue;
      if (predicate !== undefined && relation.predicate !== predicate) continue;
      if (wantedObject !== undefined && objectKey(relation.object) !== wantedObject) continue;
      yield snapshotRelation(relation);
    }
  }

  /**
   * Narrows the scan using the smaller of the subject and predicate indexes.
   */
  private *candidatePositions(subject: string | undefined, predicate: string | undefined): Generator<number> {
    const bySubject = subject !== undefined ? this.bySubject.get(subject) ?? [] : undefined;
    const byPredicate = predicate !== undefined ? this.byPredicate.get(predicate) ?? [] : undefined;

    let positions: number[] | undefined;
    if (bySubject && byPredicate) {
      positions = bySubject.length <= byPredicate.length ? bySubject : byPredicate;
    } else {
      positions = bySubject ?? byPredicate;
    }

    if (positions) {
      yield* positions;
      return;
    }

    for (let i = 0; i < this.relations.length; i++) {
      yield i;
    }
  }

  private insertRelation(
    subject: string,
    predicate: string,
    object: RelationObject,
    options: AssertOptions,
  ): [RelationRecord, AssertionOutcome] {
    const key = `${subject}\u0000${predicate}\u0000${objectKey(object)}`;
    const assertion: RelationAssertion = {
      source: options.source ?? 'system',
      timestamp: options.timestamp ?? Date.now(),
    };

    const existing = this.tripleIndex.get(key);
    if (existing) {
      // One assertion per source; reloading a source adds nothing
      if (existing.assertions.some(a => a.source === assertion.source)) {
        return [existing, 'unchanged'];
      }
      existing.assertions.push(assertion);
      existing.latest = assertion;
      existing.sequence = ++this.assertionSequence;
      return [existing, 'reasserted'];
    }

    const position = this.relations.length;
    const record: RelationRecord = {
      id: `r${position + 1}`,
      subject,
      predicate,
      object: Object.freeze(cloneObject(object)),
      assertions: [assertion],
      latest: assertion,
      sequence: ++this.assertionSequence,
    };

    this.relations.push(record);
    this.relationsById.set(record.id, record);
    this.positionById.set(record.id, position);
    this.tripleIndex.set(key, record);
    this.addToIndex(this.bySubject, subject, position);
    this.addToIndex(this.byPredicate, predicate, position);

    return [record, 'added'];
  }

  /**
   * Checks kinds and references up front so that a bad document leaves
   * the graph untouched.
   */
  private validateDocument(document: TripleDocument): void {
    const declared = new Map<string, string>();
    for (const entity of document.entities) {
      const existingKind = this.entityRecords.get(entity.id)?.kind ?? declared.get(entity.id);
      if (existingKind !== undefined && existingKind !== entity.kind) {
        throw new DuplicateEntityError(entity.id, existingKind, entity.kind);
      }
      declared.set(entity.id, entity.kind);
    }

    const known = (id: string): boolean => this.entityRecords.has(id) || declared.has(id);
    for (const triple of document.triples) {
      if (!known(triple.subject)) {
        throw new UnknownEntityError(triple.subject, 'subject');
      }
      if (triple.object.type === 'entity' && !known(triple.object.id)) {
        throw new UnknownEntityError(triple.object.id, 'object');
      }
    }
  }

  private latestLiteral(subject: string, predicate: string): RelationObject | undefined {
    let latest: RelationRecord | undefined;
    for (const position of this.bySubject.get(subject) ?? []) {
      const record = this.relations[position]!;
      if (record.predicate === predicate && record.object.type === 'literal') {
        if (!latest || record.sequence > latest.sequence) {
          latest = record;
        }
      }
    }
    return latest?.object;
  }

  private snapshotEntity(id: string): Entity {
    const record = this.entityRecords.get(id);
    if (!record) {
      throw new UnknownEntityError(id);
    }
    return {
      id: record.id,
      kind: record.kind,
      attributes: this.attributes(id),
      createdAt: record.createdAt,
    };
  }

  private addToIndex(index: Map<string, number[]>, key: string, position: number): void {
    let positions = index.get(key);
    if (!positions) {
      positions = [];
      index.set(key, positions);
    }
    positions.push(position);
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new GraphFrozenError(this.name);
    }
  }

  private assertIdentifier(value: string, label: string): void {
    if (typeof value !== 'string' || !isEncodableIdentifier(value)) {
      throw new GraphIntegrityError(`Invalid ${label} "${String(value)}": must be non-empty without whitespace or angle brackets`);
    }
  }

  private notifyChange(event: GraphChangeEvent): void {
    if (this.changeListener) {
      try {
        this.changeListener(event);
      } catch (error) {
        console.error(`[${this.name}] Error in graph change listener:`, error);
      }
    }
  }
}
