/**
 * Line-oriented, human-diffable triple encoding of a knowledge graph.
 *
 * Every statement sits on its own line and ends with ` .`:
 *
 * ```text
 * # kg-reasoner triples
 * <C1> a Client .
 * <C1> <kyc_status> "verified" .
 * <T1> a Transaction .
 * <T1> <client> <C1> .
 * <T1> <amount> 5000 .
 * <T1> <flagged> false .
 * <T1> <booked_on> "2024-05-10T00:00:00.000Z"^^date .
 * ```
 *
 * Strings are JSON-encoded, so any character survives a round-trip.
 * Blank lines and lines starting with `#` are ignored.
 *
 * @module
 */

import type { RelationObject } from '../types/graph.js';
import { ReasonerError } from '../core/errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Entity declaration (`<id> a Kind .`) */
export interface EntityStatement {
  id: string;
  kind: string;
}

/** Relation statement (`<s> <p> object .`) */
export interface TripleStatement {
  subject: string;
  predicate: string;
  object: RelationObject;
}

/** Parsed triple document */
export interface TripleDocument {
  entities: EntityStatement[];
  triples: TripleStatement[];
}

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class TripleParseError extends ReasonerError {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`line ${line}: ${message}`);
    this.name = 'TripleParseError';
    this.line = line;
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const TRIPLE_DOCUMENT_HEADER = '# kg-reasoner triples';

const STATEMENT_RE = /^<([^<>\s]+)>\s+(a|<[^<>\s]+>)\s+(.+?)\s+\.$/;
const IRI_RE = /^<([^<>\s]+)>$/;
const KIND_RE = /^[A-Za-z_][\w-]*$/;
const STRING_RE = /^("(?:[^"\\]|\\.)*")(\^\^date)?$/;
const NUMBER_RE = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const IDENTIFIER_RE = /^[^<>\s]+$/;

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function encodeObject(object: RelationObject): string {
  if (object.type === 'entity') {
    return `<${object.id}>`;
  }

  const { value } = object;
  if (value instanceof Date) {
    return `${JSON.stringify(value.toISOString())}^^date`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Checks that an id or predicate can be written between angle brackets.
 */
export function isEncodableIdentifier(value: string): boolean {
  return IDENTIFIER_RE.test(value);
}

/**
 * Serializes entity declarations followed by relation statements.
 * Input order is preserved, so equal graphs produce equal text.
 */
export function serializeTriples(document: TripleDocument): string {
  const lines: string[] = [TRIPLE_DOCUMENT_HEADER];

  for (const entity of document.entities) {
    lines.push(`<${entity.id}> a ${entity.kind} .`);
  }

  for (const triple of document.triples) {
    lines.push(`<${triple.subject}> <${triple.predicate}> ${encodeObject(triple.object)} .`);
  }

  return lines.join('\n') + '\n';
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function decodeObject(raw: string, lineNo: number): RelationObject {
  const iri = IRI_RE.exec(raw)?.[1];
  if (iri !== undefined) {
    return { type: 'entity', id: iri };
  }

  const str = STRING_RE.exec(raw);
  const quoted = str?.[1];
  if (str && quoted !== undefined) {
    let decoded: unknown;
    try {
      decoded = JSON.parse(quoted);
    } catch {
      throw new TripleParseError(`Invalid string literal ${raw}`, lineNo);
    }
    if (typeof decoded !== 'string') {
      throw new TripleParseError(`Invalid string literal ${raw}`, lineNo);
    }
    if (str[2] !== undefined) {
      const date = new Date(decoded);
      if (Number.isNaN(date.getTime())) {
        throw new TripleParseError(`Invalid date literal ${raw}`, lineNo);
      }
      return { type: 'literal', value: date };
    }
    return { type: 'literal', value: decoded };
  }

  if (raw === 'true' || raw === 'false') {
    return { type: 'literal', value: raw === 'true' };
  }

  if (NUMBER_RE.test(raw)) {
    return { type: 'literal', value: Number(raw) };
  }

  throw new TripleParseError(`Unrecognized object "${raw}"`, lineNo);
}

/**
 * Parses a triple document.
 *
 * @throws {TripleParseError} With the 1-based line number of the first malformed statement
 */
export function parseTriples(text: string): TripleDocument {
  const document: TripleDocument = { entities: [], triples: [] };
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim();
    const lineNo = i + 1;

    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const match = STATEMENT_RE.exec(line);
    if (!match) {
      throw new TripleParseError(`Malformed statement: ${line}`, lineNo);
    }

    const [, subject = '', predicateToken = '', objectToken = ''] = match;

    if (predicateToken === 'a') {
      if (!KIND_RE.test(objectToken)) {
        throw new TripleParseError(`Invalid entity kind "${objectToken}"`, lineNo);
      }
      document.entities.push({ id: subject, kind: objectToken });
      continue;
    }

    document.triples.push({
      subject,
      predicate: predicateToken.slice(1, -1),
      object: decodeObject(objectToken, lineNo),
    });
  }

  return document;
}
