/**
 * Measures whether the model reaches the graph's own compliance verdict.
 *
 * The transaction's `is_compliant` literal is the ground truth. It is hidden
 * from the evidence block, the model is asked for a JSON decision and the
 * two are compared.
 */

import type { KnowledgeGraph } from '../core/knowledge-graph.js';
import type { Retriever } from '../core/retriever.js';
import type { ReasoningController } from '../core/reasoning-controller.js';
import type { EvidenceFact } from '../types/fact.js';
import type { EvidenceStatus } from '../types/evidence.js';

export const DEFAULT_COMPLIANCE_TEMPLATE = 'transaction-compliance';
export const DEFAULT_COMPLIANCE_PREDICATE = 'is_compliant';
export const DEFAULT_TRANSACTION_PARAM = 'transaction';

export interface ComplianceDecision {
  is_compliant: boolean;
  explanation: string;
}

export type DecisionParseResult =
  | { ok: true; decision: ComplianceDecision }
  | { ok: false; error: string };

export interface ComplianceEvaluation {
  transaction: string;
  correlationId: string;
  /** Outcome of the evidence gate; only 'answerable' reaches the model */
  status: EvidenceStatus;
  /** The graph's verdict, null when absent or contradictory */
  groundTruth: boolean | null;
  modelLabel: boolean | null;
  explanation: string | null;
  /** null when either side has no verdict */
  correct: boolean | null;
  rawResponse: string | null;
  /** Why the response was rejected, when it was */
  parseError: string | null;
  evidence: readonly EvidenceFact[];
}

export interface ComplianceEvaluatorConfig {
  template?: string;
  /** Template parameter receiving the transaction id */
  param?: string;
  predicate?: string;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Validates a model response against the `{ is_compliant, explanation }` shape.
 */
export function parseComplianceDecision(text: string): DecisionParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: 'Response must be a JSON object' };
  }

  const isCompliant: unknown = Reflect.get(parsed, 'is_compliant');
  const explanation: unknown = Reflect.get(parsed, 'explanation');

  if (typeof isCompliant !== 'boolean') {
    return { ok: false, error: '"is_compliant" must be a boolean' };
  }
  if (typeof explanation !== 'string') {
    return { ok: false, error: '"explanation" must be a string' };
  }
  return { ok: true, decision: { is_compliant: isCompliant, explanation } };
}

export function buildComplianceQuestion(transactionId: string): string {
  return `Decide whether transaction ${transactionId} is compliant based on the facts. `
    + 'Respond only with a JSON object with the fields "is_compliant" (boolean) and "explanation" (string).';
}

export class ComplianceEvaluator {
  private readonly graph: KnowledgeGraph;
  private readonly retriever: Retriever;
  private readonly controller: ReasoningController;
  private readonly template: string;
  private readonly param: string;
  private readonly predicate: string;

  constructor(
    graph: KnowledgeGraph,
    retriever: Retriever,
    controller: ReasoningController,
    config: ComplianceEvaluatorConfig = {},
  ) {
    this.graph = graph;
    this.retriever = retriever;
    this.controller = controller;
    this.template = config.template ?? DEFAULT_COMPLIANCE_TEMPLATE;
    this.param = config.param ?? DEFAULT_TRANSACTION_PARAM;
    this.predicate = config.predicate ?? DEFAULT_COMPLIANCE_PREDICATE;
  }

  /**
   * The graph's single boolean verdict for a transaction.
   */
  groundTruth(transactionId: string): boolean | null {
    const values = new Set<boolean>();
    for (const relation of this.graph.match({ subject: transactionId, predicate: this.predicate })) {
      if (relation.object.type === 'literal' && typeof relation.object.value === 'boolean') {
        values.add(relation.object.value);
      }
    }
    const [only] = values;
    return values.size === 1 && only !== undefined ? only : null;
  }

  /**
   * @throws {GenerationError} When the completion call fails
   * @throws {QueryError} When the transaction does not fit the template
   */
  async evaluate(transactionId: string, options: EvaluateOptions = {}): Promise<ComplianceEvaluation> {
    const group = this.retriever.retrieveTemplate(this.template, { [this.param]: transactionId });
    const answer = await this.controller.answer(buildComplianceQuestion(transactionId), [group], {
      hiddenPredicates: [this.predicate],
      responseFormat: 'json',
      ...(options.signal !== undefined && { signal: options.signal }),
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    });

    const groundTruth = this.groundTruth(transactionId);
    const base = {
      transaction: transactionId,
      correlationId: answer.correlationId,
      status: answer.status,
      groundTruth,
      evidence: answer.evidence,
    };

    if (answer.status !== 'answerable') {
      return { ...base, modelLabel: null, explanation: null, correct: null, rawResponse: null, parseError: null };
    }

    const parsed = parseComplianceDecision(answer.text);
    if (!parsed.ok) {
      return { ...base, modelLabel: null, explanation: null, correct: null, rawResponse: answer.text, parseError: parsed.error };
    }

    const modelLabel = parsed.decision.is_compliant;
    return {
      ...base,
      modelLabel,
      explanation: parsed.decision.explanation,
      correct: groundTruth === null ? null : groundTruth === modelLabel,
      rawResponse: answer.text,
      parseError: null,
    };
  }
}
