// Types
export * from './types/index.js';

// Core components
export { KnowledgeGraph, toFacts } from './core/knowledge-graph.js';
export type { KnowledgeGraphConfig } from './core/knowledge-graph.js';
export { TemplateRegistry } from './core/template-registry.js';
export type { RegisterOptions } from './core/template-registry.js';
export { QueryEngine, groupBySubject } from './core/query-engine.js';
export { Retriever, DEFAULT_MAX_GROUPS } from './core/retriever.js';
export type { RetrieverConfig, RetrieveOptions, TemplateCandidate, EntityMention } from './core/retriever.js';
export {
  ReasoningController,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from './core/reasoning-controller.js';
export type { AskOptions, RegenerateOptions, ReasoningControllerConfig } from './core/reasoning-controller.js';
export {
  ReasonerError,
  GraphIntegrityError,
  DuplicateEntityError,
  UnknownEntityError,
  AttributeOverwriteError,
  GraphFrozenError,
  QueryError,
  UnknownTemplateError,
  MissingBindingError,
  InvalidBindingError,
  TemplateDefinitionError,
} from './core/errors.js';

// Evaluation
export {
  classifyEvidence,
  findMissingEvidence,
  findConflicts,
} from './evaluation/evidence-classifier.js';
export { EvidenceCollector, dedupeFacts, mergeEvidence, evidenceKey } from './evaluation/fact-deduplicator.js';
export {
  buildPrompt,
  buildEvidenceBlock,
  formatEvidenceFact,
  DEFAULT_SYSTEM_PROMPT,
  EVIDENCE_HEADER,
  EMPTY_EVIDENCE,
} from './evaluation/prompt-builder.js';
export type { EvidenceBlockOptions, PromptParts } from './evaluation/prompt-builder.js';
export {
  ComplianceEvaluator,
  parseComplianceDecision,
  buildComplianceQuestion,
} from './evaluation/compliance-evaluator.js';
export type {
  ComplianceDecision,
  ComplianceEvaluation,
  ComplianceEvaluatorConfig,
  EvaluateOptions,
} from './evaluation/compliance-evaluator.js';

// Completion
export { invokeCompletion } from './completion/invoke.js';
export type { InvokeOptions } from './completion/invoke.js';
export { HttpCompletionService, DEFAULT_HTTP_COMPLETION_CONFIG } from './completion/http-completion-service.js';
export type { HttpCompletionConfig } from './completion/http-completion-service.js';
export { ServiceError, GenerationError, isRetryableStatus, toServiceError } from './completion/errors.js';
export type { ServiceErrorReason, ServiceErrorOptions, GenerationErrorContext } from './completion/errors.js';

// Utils
export { parseDuration, formatDuration } from './utils/duration-parser.js';
export { generateId } from './utils/id-generator.js';
export { formatScalar, formatObject, sameObject, scalarKey, objectKey } from './utils/relation-object.js';

// Persistence
export {
  parseTriples,
  serializeTriples,
  isEncodableIdentifier,
  TripleParseError,
  TRIPLE_DOCUMENT_HEADER,
} from './persistence/triple-format.js';
export type { TripleDocument, EntityStatement, TripleStatement } from './persistence/triple-format.js';
export { GraphPersistence } from './persistence/graph-persistence.js';
export type { GraphPersistenceOptions } from './persistence/graph-persistence.js';
export { loadGraphFile, saveGraphFile, detectGraphFormat, GraphFileError } from './persistence/graph-files.js';
export type { GraphFileFormat } from './persistence/graph-files.js';

// Audit
export { AuditLogService, AUDIT_BUCKET_PREFIX, bucketKey } from './audit/audit-log-service.js';
export * from './audit/types.js';

// DSL
export * from './dsl/index.js';

// Hlavní session class
export { ReasoningSession } from './core/session.js';
