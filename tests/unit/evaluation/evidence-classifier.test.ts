import { describe, it, expect } from 'vitest';
import {
  classifyEvidence,
  findConflicts,
  findMissingEvidence,
} from '../../../src/evaluation/evidence-classifier.js';
import { dedupeFacts, mergeEvidence } from '../../../src/evaluation/fact-deduplicator.js';
import type { Fact } from '../../../src/types/fact.js';
import type { FactGroup, ResolvedRequirement } from '../../../src/types/template.js';
import type { ScalarValue } from '../../../src/types/graph.js';

function fact(subject: string, predicate: string, value: ScalarValue, relationId: string): Fact {
  return {
    subject,
    predicate,
    value: { type: 'literal', value },
    source: { relationId, origin: 'test', timestamp: 1_000 },
  };
}

function group(
  template: string,
  facts: Fact[],
  requirements: ResolvedRequirement[] = [],
  multiValued: string[] = [],
): FactGroup {
  return { template, bindings: {}, score: 0, facts: dedupeFacts(facts), requirements, multiValued };
}

describe('findMissingEvidence', () => {
  it('reports required pairs without a fact, sorted', () => {
    const groups = [
      group('review', [fact('T1', 'amount', 5000, 'r1')], [
        { predicate: 'amount', term: '?tx', subjects: ['T2', 'T1'] },
        { predicate: 'kyc_status', term: '$client', subjects: ['C1'] },
      ]),
    ];

    expect(findMissingEvidence(groups, mergeEvidence(groups))).toEqual([
      { template: 'review', term: '$client', subject: 'C1', predicate: 'kyc_status' },
      { template: 'review', term: '?tx', subject: 'T2', predicate: 'amount' },
    ]);
  });

  it('reports a requirement whose term resolved to no subject', () => {
    const groups = [group('review', [], [{ predicate: 'amount', term: '?tx', subjects: [] }])];

    expect(findMissingEvidence(groups, [])).toEqual([
      { template: 'review', term: '?tx', subject: null, predicate: 'amount' },
    ]);
  });

  it('accepts a fact supplied by another group', () => {
    const groups = [
      group('a', [], [{ predicate: 'kyc_status', term: '$client', subjects: ['C1'] }]),
      group('b', [fact('C1', 'kyc_status', 'verified', 'r1')]),
    ];

    expect(findMissingEvidence(groups, mergeEvidence(groups))).toEqual([]);
  });
});

describe('findConflicts', () => {
  it('groups distinct values of one pair', () => {
    const groups = [
      group('review', [fact('C1', 'kyc_status', 'verified', 'r1'), fact('C1', 'kyc_status', 'pending', 'r4')]),
    ];

    const conflicts = findConflicts(groups, mergeEvidence(groups));

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]?.values.map(v => v.value)).toEqual([
      { type: 'literal', value: 'pending' },
      { type: 'literal', value: 'verified' },
    ]);
  });

  it('skips multi-valued predicates', () => {
    const groups = [
      group('review', [fact('C1', 'alias', 'Acme', 'r1'), fact('C1', 'alias', 'ACME Ltd', 'r2')], [], ['alias']),
    ];

    expect(findConflicts(groups, mergeEvidence(groups))).toEqual([]);
  });

  it('does not count the same value from two sources as a conflict', () => {
    const groups = [group('review', [fact('T1', 'amount', 5000, 'r1'), fact('T1', 'amount', 5000, 'r2')])];

    expect(findConflicts(groups, mergeEvidence(groups))).toEqual([]);
  });
});

describe('classifyEvidence', () => {
  it('is unknown without groups', () => {
    expect(classifyEvidence([])).toEqual({
      status: 'unknown',
      reason: 'no_matching_template',
      missing: [],
      evidence: [],
    });
  });

  it('checks completeness before conflicts', () => {
    const groups = [
      group('review', [fact('C1', 'kyc_status', 'verified', 'r1'), fact('C1', 'kyc_status', 'pending', 'r2')], [
        { predicate: 'amount', term: '?tx', subjects: ['T1'] },
      ]),
    ];

    const assessment = classifyEvidence(groups);

    expect(assessment.status).toBe('unknown');
    expect(assessment.status === 'unknown' && assessment.reason).toBe('missing_facts');
  });

  it('is inconclusive on conflicting values', () => {
    const groups = [group('review', [fact('T1', 'amount', 5000, 'r1'), fact('T1', 'amount', 4000, 'r2')])];

    expect(classifyEvidence(groups).status).toBe('inconclusive');
  });

  it('is answerable on complete, consistent facts', () => {
    const groups = [
      group('review', [fact('C1', 'kyc_status', 'verified', 'r1')], [
        { predicate: 'kyc_status', term: '$client', subjects: ['C1'] },
      ]),
    ];

    const assessment = classifyEvidence(groups);

    expect(assessment.status).toBe('answerable');
    expect(assessment.evidence).toHaveLength(1);
  });

  it('does not depend on group order', () => {
    const a = group('a', [fact('T1', 'amount', 5000, 'r1')]);
    const b = group('b', [fact('T1', 'amount', 4000, 'r2')], [{ predicate: 'amount', term: 'T1', subjects: ['T1'] }]);

    expect(classifyEvidence([a, b]).status).toBe(classifyEvidence([b, a]).status);
  });
});
