import { describe, it, expect, beforeEach } from 'vitest';
import { ReasoningController } from '../../../src/core/reasoning-controller.js';
import { AuditLogService } from '../../../src/audit/audit-log-service.js';
import { GenerationError, ServiceError } from '../../../src/completion/errors.js';
import { DEFAULT_SYSTEM_PROMPT } from '../../../src/evaluation/prompt-builder.js';
import { INCONCLUSIVE_RESPONSE, UNKNOWN_RESPONSE } from '../../../src/types/evidence.js';
import type { CompletionService } from '../../../src/types/completion.js';
import {
  clientReviewTemplate,
  createClientGraph,
  createCompletion,
  createRetriever,
} from '../../helpers/financial-graph.js';

const QUESTION = 'KYC review for client C1';

const EVIDENCE_BLOCK = [
  '1. C1 kyc_status "verified" [r1]',
  '2. T1 amount 5000 [r2]',
  '3. T1 client <C1> [r3]',
].join('\n');

function createController(
  options: { withKyc?: boolean; completion?: CompletionService; audit?: AuditLogService } = {},
): { controller: ReasoningController; completion: CompletionService } {
  const graph = createClientGraph(options.withKyc === false ? { withKyc: false } : {});
  const completion = options.completion ?? createCompletion();
  const controller = new ReasoningController({
    retriever: createRetriever(graph, [clientReviewTemplate()]),
    completion,
    audit: options.audit,
  });
  return { controller, completion };
}

async function catchGenerationError(promise: Promise<unknown>): Promise<GenerationError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GenerationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a GenerationError');
}

describe('ReasoningController', () => {
  let audit: AuditLogService;

  beforeEach(async () => {
    audit = await AuditLogService.start();
  });

  describe('answerable questions', () => {
    it('calls the completion service exactly once with the evidence block', async () => {
      const completion = createCompletion();
      const { controller } = createController({ completion });

      const answer = await controller.ask(QUESTION);

      expect(answer.status).toBe('answerable');
      expect(answer.text).toBe('C1 is verified and T1 is 5000 [r1, r2]');
      expect(completion.generate).toHaveBeenCalledTimes(1);
      expect(completion.generate).toHaveBeenCalledWith(
        `${DEFAULT_SYSTEM_PROMPT}\n\nVerified facts you must use:\n${EVIDENCE_BLOCK}\n\nQuestion: ${QUESTION}`,
        expect.objectContaining({ maxTokens: 512, temperature: 0, signal: expect.any(AbortSignal) }),
      );
      if (answer.status === 'answerable') {
        expect(answer.evidenceBlock).toBe(EVIDENCE_BLOCK);
      }
    });

    it('returns evidence and groups with provenance', async () => {
      const { controller } = createController();

      const answer = await controller.ask(QUESTION);

      expect(answer.groups.map(g => [g.template, g.bindings])).toEqual([
        ['client-transaction-review', { client: 'C1' }],
      ]);
      expect(answer.evidence.map(f => `${f.subject} ${f.predicate}`)).toEqual([
        'C1 kyc_status',
        'T1 amount',
        'T1 client',
      ]);
    });

    it('keeps every source of a fact confirmed twice', async () => {
      const graph = createClientGraph();
      graph.updateAttribute('C1', 'kyc_status', 'verified', 'kyc-review', 2_000);
      const completion = createCompletion();
      const controller = new ReasoningController({
        retriever: createRetriever(graph, [clientReviewTemplate()]),
        completion,
      });

      const answer = await controller.ask(QUESTION);

      expect(answer.status).toBe('answerable');
      expect(answer.status === 'answerable' && answer.evidenceBlock).toBe(EVIDENCE_BLOCK);
      expect(answer.evidence[0]?.sources.map(s => [s.relationId, s.origin, s.timestamp])).toEqual([
        ['r1', 'seed', 1_000],
        ['r1', 'kyc-review', 2_000],
      ]);
      expect(completion.generate).toHaveBeenCalledTimes(1);
    });

    it('leaves hidden predicates out of the prompt', async () => {
      const completion = createCompletion();
      const { controller } = createController({ completion });

      const answer = await controller.ask(QUESTION, { hiddenPredicates: ['amount'] });

      expect(answer.status === 'answerable' && answer.evidenceBlock).toBe(
        '1. C1 kyc_status "verified" [r1]\n2. T1 client <C1> [r3]',
      );
      expect(answer.evidence).toHaveLength(3);
    });

    it('passes generation settings and the response format', async () => {
      const completion = createCompletion('{"answer":"yes"}');
      const controller = new ReasoningController({
        retriever: createRetriever(createClientGraph(), [clientReviewTemplate()]),
        completion,
        generation: { maxTokens: 64, temperature: 0.2, systemPrompt: 'Use only the facts.' },
      });

      await controller.ask(QUESTION, { responseFormat: 'json' });

      expect(completion.generate).toHaveBeenCalledWith(
        expect.stringMatching(/^Use only the facts\.\n\n/),
        expect.objectContaining({ maxTokens: 64, temperature: 0.2, responseFormat: 'json' }),
      );
    });
  });

  describe('unknown questions', () => {
    it('answers without calling the service when a required fact is missing', async () => {
      const completion = createCompletion();
      const { controller } = createController({ withKyc: false, completion });

      const answer = await controller.ask(QUESTION);

      expect(answer.status).toBe('unknown');
      expect(answer.text).toBe(UNKNOWN_RESPONSE);
      expect(completion.generate).not.toHaveBeenCalled();
      if (answer.status === 'unknown') {
        expect(answer.reason).toBe('missing_facts');
        expect(answer.missing).toEqual([
          { template: 'client-transaction-review', term: '$client', subject: 'C1', predicate: 'kyc_status' },
        ]);
      }
    });

    it('answers unknown when no template matches', async () => {
      const completion = createCompletion();
      const { controller } = createController({ completion });

      const answer = await controller.ask('What is the weather on Mars?');

      expect(answer).toMatchObject({ status: 'unknown', reason: 'no_matching_template', groups: [], evidence: [] });
      expect(completion.generate).not.toHaveBeenCalled();
    });
  });

  describe('inconclusive questions', () => {
    it('reports conflicting values without calling the service', async () => {
      const graph = createClientGraph();
      graph.updateAttribute('C1', 'kyc_status', 'pending', 'kyc-review', 2_000);
      const completion = createCompletion();
      const controller = new ReasoningController({
        retriever: createRetriever(graph, [clientReviewTemplate()]),
        completion,
      });

      const answer = await controller.ask(QUESTION);

      expect(answer.status).toBe('inconclusive');
      expect(answer.text).toBe(INCONCLUSIVE_RESPONSE);
      expect(completion.generate).not.toHaveBeenCalled();
      if (answer.status === 'inconclusive') {
        expect(answer.conflicts).toHaveLength(1);
        expect(answer.conflicts[0]?.subject).toBe('C1');
        expect(answer.conflicts[0]?.predicate).toBe('kyc_status');
        expect(answer.conflicts[0]?.values.map(v => [v.value, v.sources.map(s => s.relationId)])).toEqual([
          [{ type: 'literal', value: 'pending' }, ['r4']],
          [{ type: 'literal', value: 'verified' }, ['r1']],
        ]);
      }
    });
  });

  describe('generation failures', () => {
    it('turns a timeout into a GenerationError', async () => {
      const { controller } = createController({
        completion: { generate: () => new Promise<string>(() => {}) },
      });

      const error = await catchGenerationError(controller.ask(QUESTION, { timeoutMs: 20 }));

      expect(error.message).toBe('Answer generation failed (timeout): Completion request timed out after 20ms');
      expect(error.cause.reason).toBe('timeout');
      expect(error.retryable).toBe(true);
      expect(error.attempt).toBe(1);
      expect(error.evidenceBlock).toBe(EVIDENCE_BLOCK);
    });

    it('normalizes service rejections', async () => {
      const completion = createCompletion();
      completion.generate.mockRejectedValueOnce(new ServiceError('http_status', 'HTTP 400: bad request', { status: 400 }));
      const { controller } = createController({ completion });

      const error = await catchGenerationError(controller.ask(QUESTION));

      expect(error.cause.status).toBe(400);
      expect(error.retryable).toBe(false);
      expect(error.message).toBe('Answer generation failed (http_status): HTTP 400: bad request');
    });

    it('regenerates from the preserved prompt', async () => {
      const completion = createCompletion('second try');
      completion.generate.mockRejectedValueOnce(new ServiceError('http_status', 'HTTP 503: unavailable', { status: 503 }));
      const { controller } = createController({ completion, audit });

      const error = await catchGenerationError(controller.ask(QUESTION, { correlationId: 'q-1' }));
      const answer = await controller.regenerate(error);

      expect(answer.text).toBe('second try');
      expect(answer.correlationId).toBe('q-1');
      expect(answer.evidenceBlock).toBe(EVIDENCE_BLOCK);
      expect(completion.generate).toHaveBeenCalledTimes(2);
      expect(completion.generate.mock.calls[1]?.[0]).toBe(completion.generate.mock.calls[0]?.[0]);
      expect(audit.trail('q-1').map(e => [e.type, e.details['attempt']])).toEqual([
        ['question_received', undefined],
        ['generation_requested', 1],
        ['generation_failed', 1],
        ['generation_requested', 2],
        ['answer_generated', 2],
      ]);
    });

    it('fails immediately when the signal is already aborted', async () => {
      const completion = createCompletion();
      const { controller } = createController({ completion });
      const abort = new AbortController();
      abort.abort();

      const error = await catchGenerationError(controller.ask(QUESTION, { signal: abort.signal }));

      expect(error.cause.reason).toBe('aborted');
      expect(completion.generate).not.toHaveBeenCalled();
    });
  });

  describe('audit trail', () => {
    it('records each step under one correlation id', async () => {
      const { controller } = createController({ audit });

      await controller.ask(QUESTION, { correlationId: 'q-2' });

      const trail = audit.trail('q-2');
      expect(trail.map(e => e.type)).toEqual(['question_received', 'generation_requested', 'answer_generated']);
      expect(trail.every(e => e.source === 'reasoning-controller')).toBe(true);
      expect(trail[2]?.details).toMatchObject({
        templates: ['client-transaction-review'],
        sources: ['r1', 'r2', 'r3'],
      });
    });

    it('records the reason of an unknown answer', async () => {
      const { controller } = createController({ withKyc: false, audit });

      const answer = await controller.ask(QUESTION);

      const [, outcome] = audit.trail(answer.correlationId);
      expect(outcome?.type).toBe('answer_unknown');
      expect(outcome?.summary).toBe('Answer unknown');
      expect(outcome?.details['reason']).toBe('missing_facts');
    });
  });

  describe('answer()', () => {
    it('classifies groups retrieved elsewhere', async () => {
      const graph = createClientGraph();
      const retriever = createRetriever(graph, [clientReviewTemplate()]);
      const completion = createCompletion();
      const controller = new ReasoningController({ retriever, completion });
      const group = retriever.retrieveTemplate('client-transaction-review', { client: 'C1' });

      const answer = await controller.answer('Summarize C1', [group]);

      expect(answer.status).toBe('answerable');
      expect(completion.generate).toHaveBeenCalledTimes(1);
    });
  });
});
