/**
 * Evidentiary policy: decides whether a retrieved fact set may be handed
 * to the completion model.
 *
 * The decision is a pure function of the groups and does not depend on
 * their order:
 *
 * 1. no groups                                  → `unknown` (`no_matching_template`)
 * 2. a required predicate lacks a fact          → `unknown` (`missing_facts`)
 * 3. a single-valued (subject, predicate) pair
 *    holds two or more distinct values          → `inconclusive`
 * 4. otherwise                                  → `answerable`
 *
 * Completeness is checked first and short-circuits: conflicts elsewhere
 * in an incomplete fact set are not reported.
 *
 * @module
 */

import type { EvidenceFact } from '../types/fact.js';
import type { FactGroup } from '../types/template.js';
import type { EvidenceAssessment, EvidenceConflict, MissingEvidence } from '../types/evidence.js';
import { mergeEvidence } from './fact-deduplicator.js';
import { objectKey } from '../utils/relation-object.js';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function pairKey(subject: string, predicate: string): string {
  return `${subject}\u0000${predicate}`;
}

/**
 * Required (subject, predicate) pairs without a supporting fact in the
 * merged evidence, sorted and without duplicates.
 */
export function findMissingEvidence(groups: readonly FactGroup[], evidence: readonly EvidenceFact[]): MissingEvidence[] {
  const present = new Set(evidence.map(f => pairKey(f.subject, f.predicate)));
  const missing = new Map<string, MissingEvidence>();

  for (const group of groups) {
    for (const requirement of group.requirements) {
      if (requirement.subjects.length === 0) {
        const entry: MissingEvidence = {
          template: group.template,
          term: requirement.term,
          subject: null,
          predicate: requirement.predicate,
        };
        missing.set(`${group.template}\u0000${requirement.term}\u0000\u0000${requirement.predicate}`, entry);
        continue;
      }

      for (const subject of requirement.subjects) {
        if (!present.has(pairKey(subject, requirement.predicate))) {
          missing.set(`${group.template}\u0000${requirement.term}\u0000${subject}\u0000${requirement.predicate}`, {
            template: group.template,
            term: requirement.term,
            subject,
            predicate: requirement.predicate,
          });
        }
      }
    }
  }

  return [...missing.values()].sort((a, b) =>
    compareStrings(a.template, b.template) ||
    compareStrings(a.subject ?? '', b.subject ?? '') ||
    compareStrings(a.predicate, b.predicate) ||
    compareStrings(a.term, b.term),
  );
}

/**
 * Single-valued (subject, predicate) pairs with more than one distinct value.
 * Conflicts are sorted by subject and predicate, their values by value.
 */
export function findConflicts(groups: readonly FactGroup[], evidence: readonly EvidenceFact[]): EvidenceConflict[] {
  const multiValued = new Set(groups.flatMap(g => g.multiValued));
  const byPair = new Map<string, EvidenceFact[]>();

  for (const fact of evidence) {
    if (multiValued.has(fact.predicate)) continue;
    const key = pairKey(fact.subject, fact.predicate);
    const values = byPair.get(key);
    if (values) {
      values.push(fact);
    } else {
      byPair.set(key, [fact]);
    }
  }

  const conflicts: EvidenceConflict[] = [];
  for (const values of byPair.values()) {
    const [first] = values;
    if (values.length < 2 || first === undefined) continue;
    conflicts.push({
      subject: first.subject,
      predicate: first.predicate,
      values: [...values].sort((a, b) => compareStrings(objectKey(a.value), objectKey(b.value))),
    });
  }

  return conflicts.sort((a, b) =>
    compareStrings(a.subject, b.subject) || compareStrings(a.predicate, b.predicate),
  );
}

/**
 * Classifies retrieved fact groups into exactly one evidentiary state.
 */
export function classifyEvidence(groups: readonly FactGroup[]): EvidenceAssessment {
  if (groups.length === 0) {
    return { status: 'unknown', reason: 'no_matching_template', missing: [], evidence: [] };
  }

  const evidence = mergeEvidence(groups);

  const missing = findMissingEvidence(groups, evidence);
  if (missing.length > 0) {
    return { status: 'unknown', reason: 'missing_facts', missing, evidence };
  }

  const conflicts = findConflicts(groups, evidence);
  if (conflicts.length > 0) {
    return { status: 'inconclusive', conflicts, evidence };
  }

  return { status: 'answerable', evidence };
}
