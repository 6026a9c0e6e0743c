import { describe, it, expect, beforeEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { KnowledgeGraph } from '../../../src/core/knowledge-graph.js';
import { ReasoningController } from '../../../src/core/reasoning-controller.js';
import { InvalidBindingError } from '../../../src/core/errors.js';
import { QueryTemplateBuilder } from '../../../src/dsl/template/template-builder.js';
import {
  buildComplianceQuestion,
  ComplianceEvaluator,
  parseComplianceDecision,
} from '../../../src/evaluation/compliance-evaluator.js';
import { createCompletion, createRetriever } from '../../helpers/financial-graph.js';

const TRIPLES = readFileSync(fileURLToPath(new URL('../../fixtures/graph.triples', import.meta.url)), 'utf-8');

function complianceTemplate() {
  return QueryTemplateBuilder.create('transaction-compliance')
    .param('transaction', { kind: 'Transaction' })
    .expand('$transaction')
    .requires('$transaction', 'is_compliant')
    .keywords('compliant', 'compliance')
    .build();
}

describe('parseComplianceDecision', () => {
  it('accepts a well-formed decision', () => {
    expect(parseComplianceDecision('{"is_compliant": true, "explanation": "Below threshold"}')).toEqual({
      ok: true,
      decision: { is_compliant: true, explanation: 'Below threshold' },
    });
  });

  it('rejects text that is not JSON', () => {
    const result = parseComplianceDecision('Yes, it is compliant.');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith('Response is not valid JSON: ')).toBe(true);
  });

  it('rejects other shapes', () => {
    expect(parseComplianceDecision('[true]')).toEqual({ ok: false, error: 'Response must be a JSON object' });
    expect(parseComplianceDecision('null')).toEqual({ ok: false, error: 'Response must be a JSON object' });
    expect(parseComplianceDecision('{"is_compliant": "yes", "explanation": ""}')).toEqual({
      ok: false,
      error: '"is_compliant" must be a boolean',
    });
    expect(parseComplianceDecision('{"is_compliant": false}')).toEqual({
      ok: false,
      error: '"explanation" must be a string',
    });
  });
});

describe('ComplianceEvaluator', () => {
  let graph: KnowledgeGraph;

  beforeEach(() => {
    graph = new KnowledgeGraph();
    graph.load(TRIPLES, { source: 'fixture', timestamp: 1_000 });
  });

  function createEvaluator(responseText: string) {
    const retriever = createRetriever(graph, [complianceTemplate()]);
    const completion = createCompletion(responseText);
    const controller = new ReasoningController({ retriever, completion });
    return { evaluator: new ComplianceEvaluator(graph, retriever, controller), completion };
  }

  describe('groundTruth', () => {
    it('reads the boolean verdict', () => {
      const { evaluator } = createEvaluator('{}');

      expect(evaluator.groundTruth('T1')).toBe(true);
      expect(evaluator.groundTruth('T2')).toBe(false);
    });

    it('is null when absent or contradictory', () => {
      graph.addEntity('Transaction', 'T3', {}, { source: 'test' });
      graph.addRelation('T2', 'is_compliant', { type: 'literal', value: true }, { source: 'review' });
      const { evaluator } = createEvaluator('{}');

      expect(evaluator.groundTruth('T3')).toBeNull();
      expect(evaluator.groundTruth('T2')).toBeNull();
    });
  });

  describe('evaluate', () => {
    it('compares the model verdict with the graph', async () => {
      const { evaluator } = createEvaluator('{"is_compliant": false, "explanation": "Amount above limit"}');

      const result = await evaluator.evaluate('T2');

      expect(result).toMatchObject({
        transaction: 'T2',
        status: 'answerable',
        groundTruth: false,
        modelLabel: false,
        explanation: 'Amount above limit',
        correct: true,
        parseError: null,
      });
      expect(result.evidence.map(f => f.sources[0]?.relationId)).toEqual(['r5', 'r6', 'r7']);
    });

    it('hides the verdict from the prompt and asks for JSON', async () => {
      const { evaluator, completion } = createEvaluator('{"is_compliant": true, "explanation": "ok"}');

      await evaluator.evaluate('T2');

      const [prompt, request] = completion.generate.mock.calls[0] ?? [];
      expect(prompt).toContain('Verified facts you must use:\n1. T2 amount 12000 [r5]\n2. T2 client <C1> [r6]\n\n');
      expect(prompt).not.toContain('is_compliant false');
      expect(prompt?.endsWith(`Question: ${buildComplianceQuestion('T2')}`)).toBe(true);
      expect(request?.responseFormat).toBe('json');
    });

    it('marks a wrong verdict as incorrect', async () => {
      const { evaluator } = createEvaluator('{"is_compliant": true, "explanation": "Looks fine"}');

      const result = await evaluator.evaluate('T2');

      expect(result.modelLabel).toBe(true);
      expect(result.correct).toBe(false);
    });

    it('keeps an unparseable response', async () => {
      const { evaluator } = createEvaluator('compliant');

      const result = await evaluator.evaluate('T1');

      expect(result.modelLabel).toBeNull();
      expect(result.correct).toBeNull();
      expect(result.rawResponse).toBe('compliant');
      expect(result.parseError?.startsWith('Response is not valid JSON')).toBe(true);
    });

    it('does not call the model when the verdict fact is missing', async () => {
      graph.addEntity('Transaction', 'T3', { amount: 700 }, { source: 'test' });
      const { evaluator, completion } = createEvaluator('{}');

      const result = await evaluator.evaluate('T3');

      expect(result.status).toBe('unknown');
      expect(result.groundTruth).toBeNull();
      expect(result.rawResponse).toBeNull();
      expect(completion.generate).not.toHaveBeenCalled();
    });

    it('rejects an entity of the wrong kind', async () => {
      const { evaluator } = createEvaluator('{}');

      await expect(evaluator.evaluate('C1')).rejects.toThrow(InvalidBindingError);
    });
  });
});
