import type { EvidenceFact, Fact, FactSource } from '../types/fact.js';
import { objectKey } from '../utils/relation-object.js';

interface Bucket {
  fact: Omit<EvidenceFact, 'sources'>;
  sources: Map<string, FactSource>;
}

/** Klíč trojice (subject, predicate, value) */
export function evidenceKey(fact: Pick<Fact, 'subject' | 'predicate' | 'value'>): string {
  return `${fact.subject}\u0000${fact.predicate}\u0000${objectKey(fact.value)}`;
}

/** Klíč zdroje: relace a původ jejího potvrzení */
function sourceKey(source: FactSource): string {
  return `${source.relationId}\u0000${source.origin}`;
}

/**
 * Slučuje fakta a evidence podle trojice.
 * Zdroje se drží unikátně podle (relationId, origin), pořadí je pořadí prvního výskytu.
 */
export class EvidenceCollector {
  private readonly buckets = new Map<string, Bucket>();

  addFact(fact: Fact): this {
    const bucket = this.bucketFor(fact);
    const key = sourceKey(fact.source);
    if (!bucket.sources.has(key)) {
      bucket.sources.set(key, fact.source);
    }
    return this;
  }

  addEvidence(fact: EvidenceFact): this {
    const bucket = this.bucketFor(fact);
    for (const source of fact.sources) {
      const key = sourceKey(source);
      if (!bucket.sources.has(key)) {
        bucket.sources.set(key, source);
      }
    }
    return this;
  }

  toArray(): EvidenceFact[] {
    return [...this.buckets.values()].map(({ fact, sources }) => Object.freeze({
      ...fact,
      sources: Object.freeze([...sources.values()]),
    }));
  }

  get size(): number {
    return this.buckets.size;
  }

  private bucketFor(fact: Pick<Fact, 'subject' | 'predicate' | 'value'>): Bucket {
    const key = evidenceKey(fact);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = {
        fact: { subject: fact.subject, predicate: fact.predicate, value: fact.value },
        sources: new Map(),
      };
      this.buckets.set(key, bucket);
    }
    return bucket;
  }
}

/**
 * Deduplikuje fakta jednoho dotazu.
 */
export function dedupeFacts(facts: Iterable<Fact>): EvidenceFact[] {
  const collector = new EvidenceCollector();
  for (const fact of facts) {
    collector.addFact(fact);
  }
  return collector.toArray();
}

/**
 * Sloučí evidence z více skupin do jedné množiny.
 */
export function mergeEvidence(groups: Iterable<{ readonly facts: readonly EvidenceFact[] }>): EvidenceFact[] {
  const collector = new EvidenceCollector();
  for (const group of groups) {
    for (const fact of group.facts) {
      collector.addEvidence(fact);
    }
  }
  return collector.toArray();
}
