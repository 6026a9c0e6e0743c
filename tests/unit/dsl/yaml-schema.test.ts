import { describe, it, expect } from 'vitest';
import {
  parseScalar,
  validateGraphSeed,
  validateTemplate,
  YamlValidationError,
} from '../../../src/dsl/yaml/schema.js';

describe('parseScalar', () => {
  it('passes strings, numbers and booleans through', () => {
    expect(parseScalar('verified', 'v')).toBe('verified');
    expect(parseScalar(9500, 'v')).toBe(9500);
    expect(parseScalar(true, 'v')).toBe(true);
  });

  it('reads { date } objects as dates', () => {
    expect(parseScalar({ date: '2024-05-10' }, 'v')).toEqual(new Date('2024-05-10T00:00:00.000Z'));
  });

  it('rejects other shapes', () => {
    expect(() => parseScalar(null, 'x.value')).toThrow(
      'x.value: must be a string, number, boolean or { date: "..." }, got null',
    );
    expect(() => parseScalar([1], 'x.value')).toThrow('got array');
    expect(() => parseScalar({ date: '2024-05-10', tz: 'UTC' }, 'x.value')).toThrow('got object');
    expect(() => parseScalar(Number.POSITIVE_INFINITY, 'x.value')).toThrow('x.value: must be a finite number');
    expect(() => parseScalar({ date: 20240510 }, 'x.value')).toThrow('x.value.date: invalid date 20240510');
  });
});

describe('validateTemplate', () => {
  it('defaults the parameter type to entity and optional lists to empty', () => {
    expect(validateTemplate({ name: 'rule-status', params: [{ name: 'rule' }], expand: ['$rule'] })).toEqual({
      name: 'rule-status',
      params: [{ name: 'rule', type: 'entity' }],
      patterns: [],
      expand: [{ type: 'binding', name: 'rule' }],
      requires: [],
      multiValued: [],
      keywords: [],
    });
  });

  it('treats null optional fields as absent', () => {
    const template = validateTemplate({ name: 't', description: null, expand: ['C1'], keywords: null });

    expect(template).not.toHaveProperty('description');
    expect(template.keywords).toEqual([]);
  });

  it('rejects non-object input with the given path', () => {
    let caught: unknown;
    try {
      validateTemplate('rule-status', 'templates[3]');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(YamlValidationError);
    expect(caught instanceof YamlValidationError && caught.path).toBe('templates[3]');
    expect(caught instanceof Error && caught.message).toBe('templates[3]: must be an object, got string');
  });

  it('rejects an empty keyword', () => {
    expect(() => validateTemplate({ name: 't', expand: ['C1'], keywords: ['kyc', ''] })).toThrow(
      'template.keywords[1]: must be a non-empty string, got empty string',
    );
  });
});

describe('validateGraphSeed', () => {
  it('accepts an empty seed', () => {
    expect(validateGraphSeed({})).toEqual({ entities: [], triples: [] });
  });

  it('requires attributes to be an object', () => {
    expect(() => validateGraphSeed({ entities: [{ id: 'C1', kind: 'Client', attributes: ['x'] }] })).toThrow(
      'graph.entities[0].attributes: must be an object, got array',
    );
  });
});
