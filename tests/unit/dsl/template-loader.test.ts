import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadTemplatesFromFile, loadTemplatesFromYAML } from '../../../src/dsl/yaml/template-loader.js';
import { YamlLoadError } from '../../../src/dsl/yaml/loader.js';
import { YamlValidationError } from '../../../src/dsl/yaml/schema.js';
import { DslError } from '../../../src/dsl/helpers/errors.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

describe('loadTemplatesFromYAML', () => {
  it('loads a templates sequence', () => {
    const templates = loadTemplatesFromYAML(`
templates:
  - name: client-transaction-review
    params:
      - { name: client, kind: Client }
    patterns:
      - ['?tx', client, $client]
    requires:
      - [$client, kyc_status]
      - { subject: '?tx', predicate: amount }
    multiValued: [client]
    keywords: [review, kyc]
`);

    expect(templates).toEqual([
      {
        name: 'client-transaction-review',
        params: [{ name: 'client', type: 'entity', kind: 'Client' }],
        patterns: [
          {
            subject: { type: 'variable', name: 'tx' },
            predicate: 'client',
            object: { type: 'binding', name: 'client' },
          },
        ],
        expand: [],
        requires: [
          { subject: { type: 'binding', name: 'client' }, predicate: 'kyc_status' },
          { subject: { type: 'variable', name: 'tx' }, predicate: 'amount' },
        ],
        multiValued: ['client'],
        keywords: ['review', 'kyc'],
      },
    ]);
  });

  it('loads a top-level array and a single template object', () => {
    const fromArray = loadTemplatesFromYAML(`
- name: rule-status
  params: [{ name: rule, kind: ComplianceRule }]
  expand: [$rule]
`);
    const single = loadTemplatesFromYAML(`
name: rule-status
description: Status of a rule
params: [{ name: rule, kind: ComplianceRule }]
expand: [$rule]
`);

    expect(fromArray.map(t => t.name)).toEqual(['rule-status']);
    expect(single).toHaveLength(1);
    expect(single[0]?.description).toBe('Status of a rule');
  });

  it('parses literal objects in patterns and parameters', () => {
    const [template] = loadTemplatesFromYAML(`
name: recent-wires
params:
  - { name: since, type: date, default: { date: "2024-01-01" } }
  - { name: txType, type: string, matchPredicate: tx_type }
patterns:
  - ['?tx', tx_type, $txType]
  - ['?tx', booked_on, { date: "2024-05-10" }]
  - ['?tx', flagged, false]
`);

    expect(template?.params[0]).toEqual({
      name: 'since',
      type: 'date',
      default: new Date('2024-01-01T00:00:00.000Z'),
    });
    expect(template?.params[1]).toEqual({ name: 'txType', type: 'string', matchPredicate: 'tx_type' });
    expect(template?.patterns.map(p => p.object)).toEqual([
      { type: 'binding', name: 'txType' },
      { type: 'literal', value: new Date('2024-05-10T00:00:00.000Z') },
      { type: 'literal', value: false },
    ]);
  });

  describe('document errors', () => {
    it('rejects empty input', () => {
      expect(() => loadTemplatesFromYAML('')).toThrow(YamlLoadError);
      expect(() => loadTemplatesFromYAML('')).toThrow('YAML content is empty');
    });

    it('rejects syntax errors', () => {
      expect(() => loadTemplatesFromYAML('templates: [unclosed')).toThrow(/^YAML syntax error: /);
    });

    it('rejects empty and malformed template lists', () => {
      expect(() => loadTemplatesFromYAML('[]')).toThrow('YAML array is empty, expected at least one template');
      expect(() => loadTemplatesFromYAML('templates: {}')).toThrow('"templates" must be an array');
      expect(() => loadTemplatesFromYAML('templates: []')).toThrow(
        '"templates" array is empty, expected at least one template',
      );
    });

    it('rejects scalar documents', () => {
      expect(() => loadTemplatesFromYAML('just text')).toThrow('Expected YAML object or array, got string');
    });
  });

  describe('validation errors', () => {
    it('reports the path of an unknown parameter type', () => {
      const yaml = `
templates:
  - name: t
    params: [{ name: amount, type: money }]
    expand: [C1]
`;

      expect(() => loadTemplatesFromYAML(yaml)).toThrow(YamlValidationError);
      expect(() => loadTemplatesFromYAML(yaml)).toThrow(
        'templates[0].params[0].type: must be one of entity, string, number, boolean, date, got "money"',
      );
    });

    it('reports patterns of the wrong length', () => {
      expect(() => loadTemplatesFromYAML(`
name: t
patterns:
  - ['?tx', amount]
`)).toThrow('template.patterns[0]: must have exactly 3 items, got 2');
    });

    it('reports non-string subjects', () => {
      expect(() => loadTemplatesFromYAML(`
name: t
patterns:
  - [5, amount, 1]
`)).toThrow('template.patterns[0].subject: must be a non-empty string, got number');
    });

    it('reports term syntax errors at the term path', () => {
      expect(() => loadTemplatesFromYAML(`
name: t
patterns:
  - ['?tx-id', amount, 1]
`)).toThrow('template.patterns[0].subject: Invalid variable name "tx-id"');
    });

    it('reports definition problems at the template path', () => {
      expect(() => loadTemplatesFromYAML(`
name: t
patterns:
  - ['?tx', client, $client]
`)).toThrow('template: Template "t": pattern 1: binding $client is not a declared parameter');
    });
  });
});

describe('loadTemplatesFromFile', () => {
  it('loads the fixture templates', async () => {
    const templates = await loadTemplatesFromFile(fixture('templates.yaml'));

    expect(templates.map(t => t.name)).toEqual(['client-transaction-review', 'transaction-compliance']);
    expect(templates[0]?.description).toBe('KYC status of a client and the amounts of their transactions');
  });

  it('prefixes validation errors with the file path', async () => {
    const path = fixture('invalid-templates.yaml');

    await expect(loadTemplatesFromFile(path)).rejects.toThrow(
      `${path}: templates[0]: Template "broken": pattern 1: binding $client is not a declared parameter`,
    );
  });

  it('reports unreadable files', async () => {
    const path = fixture('missing.yaml');

    const error = await loadTemplatesFromFile(path).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(YamlLoadError);
    expect(error).toBeInstanceOf(DslError);
    expect(error instanceof YamlLoadError && error.filePath).toBe(path);
    expect(error instanceof Error && error.message.startsWith(`${path}: Failed to read file: `)).toBe(true);
  });
});
