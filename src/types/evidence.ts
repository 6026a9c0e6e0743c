import type { EvidenceFact } from './fact.js';
import type { FactGroup } from './template.js';

/** Evidentiary classification of a retrieved fact set */
export type EvidenceStatus = 'answerable' | 'unknown' | 'inconclusive';

/** Required predicate with no supporting fact */
export interface MissingEvidence {
  template: string;
  /** Term the requirement is attached to (`?tx`, `$client`) */
  term: string;
  /** Concrete subject, or null when the term resolved to no subject at all */
  subject: string | null;
  predicate: string;
}

/** Disagreeing values for one (subject, predicate) */
export interface EvidenceConflict {
  subject: string;
  predicate: string;
  values: EvidenceFact[];
}

export type UnknownReason = 'no_matching_template' | 'missing_facts';

export type EvidenceAssessment =
  | { status: 'unknown'; reason: UnknownReason; missing: MissingEvidence[]; evidence: EvidenceFact[] }
  | { status: 'inconclusive'; conflicts: EvidenceConflict[]; evidence: EvidenceFact[] }
  | { status: 'answerable'; evidence: EvidenceFact[] };

/** Fields shared by every answer */
interface AnswerBase {
  question: string;
  correlationId: string;
  text: string;
  /** Deduplicated facts across all retrieved groups */
  evidence: EvidenceFact[];
  /** Retrieved fact groups with template and binding provenance */
  groups: readonly FactGroup[];
  durationMs: number;
}

export interface AnsweredAnswer extends AnswerBase {
  status: 'answerable';
  /** Evidence block injected into the prompt */
  evidenceBlock: string;
}

export interface UnknownAnswer extends AnswerBase {
  status: 'unknown';
  reason: UnknownReason;
  missing: MissingEvidence[];
}

export interface InconclusiveAnswer extends AnswerBase {
  status: 'inconclusive';
  conflicts: EvidenceConflict[];
}

/** Terminal result of ReasoningController.ask() */
export type Answer = AnsweredAnswer | UnknownAnswer | InconclusiveAnswer;

export const UNKNOWN_RESPONSE = 'not available / unknown';
export const INCONCLUSIVE_RESPONSE = 'inconclusive: conflicting facts';
