import type { CompletionService, GenerationConfig, ResponseFormat } from '../types/completion.js';
import type { EvidenceFact } from '../types/fact.js';
import type { FactGroup } from '../types/template.js';
import type {
  AnsweredAnswer,
  Answer,
  InconclusiveAnswer,
  UnknownAnswer,
} from '../types/evidence.js';
import { INCONCLUSIVE_RESPONSE, UNKNOWN_RESPONSE } from '../types/evidence.js';
import type { AuditLogService } from '../audit/audit-log-service.js';
import type { AuditEventType } from '../audit/types.js';
import type { Retriever } from './retriever.js';
import { classifyEvidence } from '../evaluation/evidence-classifier.js';
import { buildEvidenceBlock, buildPrompt, DEFAULT_SYSTEM_PROMPT } from '../evaluation/prompt-builder.js';
import { invokeCompletion } from '../completion/invoke.js';
import { GenerationError, toServiceError, type GenerationErrorContext } from '../completion/errors.js';
import { generateId } from '../utils/id-generator.js';

export const DEFAULT_MAX_TOKENS = 512;
export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_TIMEOUT_MS = 30_000;

const AUDIT_SOURCE = 'reasoning-controller';

/** Per-question options */
export interface AskOptions {
  /** Cancels the completion call */
  signal?: AbortSignal;
  /** Overrides GenerationConfig.timeoutMs */
  timeoutMs?: number;
  responseFormat?: ResponseFormat;
  /** Predicates left out of the evidence block; they still count for classification */
  hiddenPredicates?: readonly string[];
  /** Overrides the retriever's group limit */
  maxGroups?: number;
  /** Links audit entries to an outer operation; generated when absent */
  correlationId?: string;
}

/** Options accepted by {@link ReasoningController.regenerate} */
export type RegenerateOptions = Pick<AskOptions, 'signal' | 'timeoutMs' | 'responseFormat'>;

export interface ReasoningControllerConfig {
  retriever: Retriever;
  completion: CompletionService;
  generation?: GenerationConfig;
  audit?: AuditLogService | undefined;
}

/**
 * Evidentiary state machine in front of the completion model.
 *
 * Every question is classified before the model is involved: an UNKNOWN
 * or INCONCLUSIVE fact set is answered with a fixed text and never reaches
 * the CompletionService. Only an ANSWERABLE fact set is turned into a
 * prompt, and the service is then called exactly once, bounded by a
 * timeout and the caller's signal.
 *
 * Graph and query errors propagate unchanged; a failed completion call is
 * thrown as a {@link GenerationError} that {@link regenerate} can retry.
 */
export class ReasoningController {
  private readonly retriever: Retriever;
  private readonly completion: CompletionService;
  private readonly audit: AuditLogService | undefined;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly systemPrompt: string;

  constructor(config: ReasoningControllerConfig) {
    this.retriever = config.retriever;
    this.completion = config.completion;
    this.audit = config.audit;
    this.maxTokens = config.generation?.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.generation?.temperature ?? DEFAULT_TEMPERATURE;
    this.timeoutMs = config.generation?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.systemPrompt = config.generation?.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  /**
   * Answers a question from the knowledge graph.
   *
   * @throws {GenerationError} When the fact set is answerable but the completion call fails
   * @throws {QueryError} On template misuse
   */
  async ask(question: string, options: AskOptions = {}): Promise<Answer> {
    const correlationId = options.correlationId ?? generateId();
    const startedAt = Date.now();

    this.record('question_received', { question }, correlationId);

    const groups = this.retriever.retrieve(
      question,
      options.maxGroups !== undefined ? { maxGroups: options.maxGroups } : {},
    );

    return this.answer(question, groups, { ...options, correlationId }, startedAt);
  }

  /**
   * Classifies already retrieved groups and answers from them.
   * {@link ask} is retrieval followed by this.
   */
  async answer(
    question: string,
    groups: readonly FactGroup[],
    options: AskOptions = {},
    startedAt: number = Date.now(),
  ): Promise<Answer> {
    const correlationId = options.correlationId ?? generateId();
    const assessment = classifyEvidence(groups);
    const templates = groups.map(g => g.template);

    switch (assessment.status) {
      case 'unknown': {
        const result: UnknownAnswer = {
          status: 'unknown',
          question,
          correlationId,
          text: UNKNOWN_RESPONSE,
          evidence: assessment.evidence,
          groups,
          reason: assessment.reason,
          missing: assessment.missing,
          durationMs: Date.now() - startedAt,
        };
        this.record('answer_unknown', {
          reason: assessment.reason,
          templates,
          missing: assessment.missing,
        }, correlationId, result.durationMs);
        return result;
      }

      case 'inconclusive': {
        const result: InconclusiveAnswer = {
          status: 'inconclusive',
          question,
          correlationId,
          text: INCONCLUSIVE_RESPONSE,
          evidence: assessment.evidence,
          groups,
          conflicts: assessment.conflicts,
          durationMs: Date.now() - startedAt,
        };
        this.record('answer_inconclusive', {
          templates,
          conflicts: assessment.conflicts.map(c => ({
            subject: c.subject,
            predicate: c.predicate,
            sources: [...new Set(c.values.flatMap(v => v.sources.map(s => s.relationId)))],
          })),
        }, correlationId, result.durationMs);
        return result;
      }

      case 'answerable': {
        const evidenceBlock = buildEvidenceBlock(
          assessment.evidence,
          options.hiddenPredicates !== undefined ? { hiddenPredicates: options.hiddenPredicates } : {},
        );
        const prompt = buildPrompt({ systemPrompt: this.systemPrompt, evidenceBlock, question });

        return this.generate({
          question,
          correlationId,
          evidenceBlock,
          prompt,
          groups,
          evidence: assessment.evidence,
          attempt: 1,
        }, options, startedAt);
      }
    }
  }

  /**
   * Retries a failed generation with the preserved prompt and evidence.
   * The graph is not queried again.
   *
   * @throws {GenerationError} When the retry fails as well
   */
  async regenerate(error: GenerationError, options: RegenerateOptions = {}): Promise<AnsweredAnswer> {
    return this.generate({
      question: error.question,
      correlationId: error.correlationId,
      evidenceBlock: error.evidenceBlock,
      prompt: error.prompt,
      groups: error.groups,
      evidence: error.evidence,
      attempt: error.attempt + 1,
    }, options, Date.now());
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async generate(
    context: GenerationErrorContext,
    options: RegenerateOptions,
    startedAt: number,
  ): Promise<AnsweredAnswer> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    this.record('generation_requested', {
      attempt: context.attempt,
      facts: context.evidence.length,
      promptLength: context.prompt.length,
      ...(options.responseFormat !== undefined && { responseFormat: options.responseFormat }),
    }, context.correlationId);

    const callStartedAt = Date.now();
    let text: string;
    try {
      text = await invokeCompletion(
        this.completion,
        context.prompt,
        {
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          ...(options.responseFormat !== undefined && { responseFormat: options.responseFormat }),
        },
        { timeoutMs, signal: options.signal },
      );
    } catch (err) {
      const cause = toServiceError(err);
      this.record('generation_failed', {
        attempt: context.attempt,
        reason: cause.reason,
        retryable: cause.retryable,
        error: cause.message,
        ...(cause.status !== undefined && { status: cause.status }),
      }, context.correlationId, Date.now() - callStartedAt);
      throw new GenerationError(context, cause);
    }

    const result: AnsweredAnswer = {
      status: 'answerable',
      question: context.question,
      correlationId: context.correlationId,
      text,
      evidence: [...context.evidence],
      groups: context.groups,
      evidenceBlock: context.evidenceBlock,
      durationMs: Date.now() - startedAt,
    };

    this.record('answer_generated', {
      attempt: context.attempt,
      templates: context.groups.map(g => g.template),
      sources: collectSourceIds(context.evidence),
      responseLength: text.length,
    }, context.correlationId, Date.now() - callStartedAt);

    return result;
  }

  private record(
    type: AuditEventType,
    details: Record<string, unknown>,
    correlationId: string,
    durationMs?: number,
  ): void {
    this.audit?.record(type, details, {
      source: AUDIT_SOURCE,
      correlationId,
      ...(durationMs !== undefined && { durationMs }),
    });
  }
}

function collectSourceIds(evidence: readonly EvidenceFact[]): string[] {
  return [...new Set(evidence.flatMap(f => f.sources.map(s => s.relationId)))];
}
