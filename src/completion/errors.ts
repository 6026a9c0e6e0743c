import type { EvidenceFact } from '../types/fact.js';
import type { FactGroup } from '../types/template.js';
import { ReasonerError } from '../core/errors.js';

/** Why a CompletionService call failed */
export type ServiceErrorReason =
  | 'transport'
  | 'timeout'
  | 'aborted'
  | 'http_status'
  | 'malformed_response';

export interface ServiceErrorOptions {
  /** HTTP status for `http_status` failures */
  status?: number;
  /** Overrides the retryability derived from the reason */
  retryable?: boolean;
  cause?: unknown;
}

/** 429 and 5xx are worth retrying, other statuses are not */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function defaultRetryable(reason: ServiceErrorReason, status: number | undefined): boolean {
  switch (reason) {
    case 'transport':
    case 'timeout':
      return true;
    case 'http_status':
      return status !== undefined && isRetryableStatus(status);
    default:
      return false;
  }
}

/**
 * Failure of the external completion dependency.
 */
export class ServiceError extends ReasonerError {
  readonly reason: ServiceErrorReason;
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(reason: ServiceErrorReason, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ServiceError';
    this.reason = reason;
    this.status = options.status;
    this.retryable = options.retryable ?? defaultRetryable(reason, options.status);
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Normalizes whatever a CompletionService rejected with into a ServiceError.
 * Non-ServiceError rejections count as transport failures.
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  if (isAbortError(error)) {
    return new ServiceError('aborted', 'Completion request was aborted', { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ServiceError('transport', `Completion request failed: ${message}`, { cause: error });
}

export interface GenerationErrorContext {
  question: string;
  correlationId: string;
  evidenceBlock: string;
  prompt: string;
  groups: readonly FactGroup[];
  evidence: readonly EvidenceFact[];
  /** 1 for the first attempt, incremented by every regenerate() */
  attempt: number;
}

/**
 * The completion call of an ANSWERABLE question failed.
 *
 * Carries everything needed to retry without querying the graph again
 * (see ReasoningController.regenerate()).
 */
export class GenerationError extends ReasonerError {
  readonly question: string;
  readonly correlationId: string;
  readonly evidenceBlock: string;
  readonly prompt: string;
  readonly groups: readonly FactGroup[];
  readonly evidence: readonly EvidenceFact[];
  readonly attempt: number;
  override readonly cause: ServiceError;

  constructor(context: GenerationErrorContext, cause: ServiceError) {
    super(`Answer generation failed (${cause.reason}): ${cause.message}`);
    this.name = 'GenerationError';
    this.question = context.question;
    this.correlationId = context.correlationId;
    this.evidenceBlock = context.evidenceBlock;
    this.prompt = context.prompt;
    this.groups = context.groups;
    this.evidence = context.evidence;
    this.attempt = context.attempt;
    this.cause = cause;
  }

  get retryable(): boolean {
    return this.cause.retryable;
  }
}
