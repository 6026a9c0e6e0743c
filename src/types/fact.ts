import type { RelationObject } from './graph.js';

/** Provenance of a fact: the relation it was read from */
export interface FactSource {
  readonly relationId: string;
  readonly origin: string;
  readonly timestamp: number;
}

/** Immutable snapshot of a relation returned to callers */
export interface Fact {
  readonly subject: string;
  readonly predicate: string;
  readonly value: RelationObject;
  readonly source: FactSource;
}

/** Deduplicated fact: one (subject, predicate, value) tuple with every distinct source */
export interface EvidenceFact {
  readonly subject: string;
  readonly predicate: string;
  readonly value: RelationObject;
  readonly sources: readonly FactSource[];
}
