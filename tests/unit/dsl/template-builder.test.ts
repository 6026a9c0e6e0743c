import { describe, it, expect } from 'vitest';
import { QueryTemplateBuilder } from '../../../src/dsl/template/template-builder.js';
import { DslValidationError } from '../../../src/dsl/helpers/errors.js';
import { TemplateDefinitionError } from '../../../src/core/errors.js';

describe('QueryTemplateBuilder', () => {
  it('builds a complete template', () => {
    const template = QueryTemplateBuilder.create('client-transaction-review')
      .description('KYC status and transaction amounts')
      .param('client', { kind: 'Client' })
      .match('?tx', 'client', '$client')
      .expand('$client', '?tx')
      .requires('$client', 'kyc_status')
      .requires('?tx', 'amount', 'currency')
      .multiValued('client', 'client')
      .keywords('review', 'kyc')
      .build();

    expect(template).toEqual({
      name: 'client-transaction-review',
      description: 'KYC status and transaction amounts',
      params: [{ name: 'client', type: 'entity', kind: 'Client' }],
      patterns: [
        {
          subject: { type: 'variable', name: 'tx' },
          predicate: 'client',
          object: { type: 'binding', name: 'client' },
        },
      ],
      expand: [
        { type: 'binding', name: 'client' },
        { type: 'variable', name: 'tx' },
      ],
      requires: [
        { subject: { type: 'binding', name: 'client' }, predicate: 'kyc_status' },
        { subject: { type: 'variable', name: 'tx' }, predicate: 'amount' },
        { subject: { type: 'variable', name: 'tx' }, predicate: 'currency' },
      ],
      multiValued: ['client'],
      keywords: ['review', 'kyc'],
    });
  });

  it('omits optional parameter fields that were not given', () => {
    const template = QueryTemplateBuilder.create('rules')
      .param('txType', { type: 'string', matchPredicate: 'appliesToType' })
      .match('?rule', 'appliesToType', '$txType')
      .build();

    expect(template.params).toEqual([{ name: 'txType', type: 'string', matchPredicate: 'appliesToType' }]);
    expect(template).not.toHaveProperty('description');
  });

  it('accepts a template with expand terms only', () => {
    const template = QueryTemplateBuilder.create('rule-status')
      .param('rule', { kind: 'ComplianceRule' })
      .expand('$rule')
      .build();

    expect(template.patterns).toEqual([]);
    expect(template.expand).toEqual([{ type: 'binding', name: 'rule' }]);
  });

  it('returns independent copies from repeated build() calls', () => {
    const builder = QueryTemplateBuilder.create('t').param('client').expand('$client');

    const first = builder.build();
    const second = builder.build();

    expect(first).toEqual(second);
    expect(first.params).not.toBe(second.params);
  });

  describe('call-site validation', () => {
    it('rejects an empty template name', () => {
      expect(() => QueryTemplateBuilder.create('')).toThrow('Template name must be a non-empty string');
    });

    it('rejects duplicate parameters', () => {
      const builder = QueryTemplateBuilder.create('t').param('client');

      expect(() => builder.param('client')).toThrow('Duplicate parameter declaration: "client"');
    });

    it('rejects requires() without predicates', () => {
      expect(() => QueryTemplateBuilder.create('t').requires('$client')).toThrow(
        'requires() needs at least one predicate',
      );
    });

    it('rejects predicates with whitespace', () => {
      expect(() => QueryTemplateBuilder.create('t').match('?tx', 'booked on', '?d')).toThrow(DslValidationError);
    });

    it('rejects empty keywords', () => {
      expect(() => QueryTemplateBuilder.create('t').keywords('')).toThrow('Keyword must be a non-empty string');
    });
  });

  describe('build()', () => {
    it('requires a pattern or expand term', () => {
      expect(() => QueryTemplateBuilder.create('empty').build()).toThrow(
        'Template "empty": needs at least one pattern or expand term',
      );
    });

    it('reports undeclared bindings and unbound variables together', () => {
      const builder = QueryTemplateBuilder.create('broken')
        .match('?tx', 'client', '$client')
        .expand('?account');

      expect(() => builder.build()).toThrow(TemplateDefinitionError);
      expect(() => builder.build()).toThrow(
        'Template "broken": pattern 1: binding $client is not a declared parameter; ' +
        'expand 1: variable ?account is not bound by any pattern',
      );
    });
  });
});
