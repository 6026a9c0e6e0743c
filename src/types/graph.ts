/** Scalar value of an attribute or literal relation object */
export type ScalarValue = string | number | boolean | Date;

/** Entity kinds used by the financial domain; any other identifier is allowed too */
export type KnownEntityKind =
  | 'Client'
  | 'Account'
  | 'Transaction'
  | 'ComplianceRule'
  | 'Regulation';

export type EntityKind = KnownEntityKind | (string & {});

/** Uniquely identified node of the graph */
export interface Entity {
  id: string;
  kind: EntityKind;
  /** Latest asserted value per attribute (literal relation) */
  attributes: Record<string, ScalarValue>;
  createdAt: number;
}

/** Object of a relation: another entity or a literal value */
export type RelationObject =
  | { type: 'entity'; id: string }
  | { type: 'literal'; value: ScalarValue };

/** One assertion of a relation: who asserted it and when */
export interface RelationAssertion {
  source: string;           // Provenance: 'system', 'load', 'kyc-review', ...
  timestamp: number;
}

/**
 * Directed labeled edge. The triple is immutable once added; asserting it
 * again from another source only extends `assertions`.
 */
export interface Relation {
  id: string;
  subject: string;
  predicate: string;
  object: RelationObject;
  /** Source of the latest assertion */
  source: string;
  timestamp: number;
  /** Every distinct source of the triple, in assertion order */
  assertions: readonly RelationAssertion[];
}

/** Pattern for KnowledgeGraph.match(); undefined fields are wildcards */
export interface TriplePattern {
  subject?: string | undefined;
  predicate?: string | undefined;
  object?: RelationObject | undefined;
}

/** Options for adding entities and relations */
export interface AssertOptions {
  source?: string;
  timestamp?: number;
}

/** Types of graph changes reported to listeners */
export type GraphChangeType = 'entity_created' | 'attribute_added' | 'relation_added' | 'relation_reasserted';

export interface GraphChangeEvent {
  type: GraphChangeType;
  entityId: string;
  relation?: Relation;
}

export type GraphChangeListener = (event: GraphChangeEvent) => void;

/** Summary returned by KnowledgeGraph.load() */
export interface LoadSummary {
  entitiesAdded: number;
  relationsAdded: number;
  statements: number;
}

export interface GraphStats {
  entities: number;
  relations: number;
  entitiesByKind: Record<string, number>;
  frozen: boolean;
}
