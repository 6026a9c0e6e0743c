import type { EvidenceFact } from '../types/fact.js';
import { formatObject } from '../utils/relation-object.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a financial reasoning assistant. ' +
  'Answer strictly from the verified facts listed below and never from prior knowledge. ' +
  'If the facts do not contain the answer, state that the information is not available. ' +
  'Cite the source ids of the facts you rely on.';

export const EVIDENCE_HEADER = 'Verified facts you must use:';
export const EMPTY_EVIDENCE = '(no facts)';

export interface EvidenceBlockOptions {
  /** Predicates left out of the block */
  hiddenPredicates?: readonly string[];
}

export interface PromptParts {
  systemPrompt: string;
  evidenceBlock: string;
  question: string;
}

/**
 * `C1 kyc_status "verified" [r2]`
 */
export function formatEvidenceFact(fact: EvidenceFact): string {
  // Relace potvrzená více zdroji se uvádí jednou
  const sources = [...new Set(fact.sources.map(s => s.relationId))].join(', ');
  return `${fact.subject} ${fact.predicate} ${formatObject(fact.value)} [${sources}]`;
}

/**
 * Numbered list of facts with their source relation ids.
 */
export function buildEvidenceBlock(evidence: readonly EvidenceFact[], options: EvidenceBlockOptions = {}): string {
  const hidden = new Set(options.hiddenPredicates ?? []);
  const lines = evidence
    .filter(fact => !hidden.has(fact.predicate))
    .map((fact, i) => `${i + 1}. ${formatEvidenceFact(fact)}`);

  return lines.length > 0 ? lines.join('\n') : EMPTY_EVIDENCE;
}

/**
 * Instructions, evidence and question, separated by blank lines.
 */
export function buildPrompt(parts: PromptParts): string {
  return [
    parts.systemPrompt,
    `${EVIDENCE_HEADER}\n${parts.evidenceBlock}`,
    `Question: ${parts.question}`,
  ].join('\n\n');
}
