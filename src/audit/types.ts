/**
 * Audit trail types.
 *
 * Every question leaves a trace: what was asked, how the evidence was
 * classified, whether the model was called and how that call ended.
 * Graph loading and template registration are recorded as well, so an
 * answer can be traced back to the data it was given.
 */

/** Categories of auditable operations */
export type AuditCategory =
  | 'reasoning'
  | 'generation'
  | 'graph'
  | 'system';

/** Specific types of audit events */
export type AuditEventType =
  | 'question_received'
  | 'answer_unknown'
  | 'answer_inconclusive'
  | 'answer_generated'
  | 'generation_requested'
  | 'generation_failed'
  | 'graph_loaded'
  | 'graph_frozen'
  | 'templates_loaded'
  | 'session_started'
  | 'session_stopped';

/** Mapping from event type to its category */
export const AUDIT_EVENT_CATEGORIES: Record<AuditEventType, AuditCategory> = {
  question_received: 'reasoning',
  answer_unknown: 'reasoning',
  answer_inconclusive: 'reasoning',
  answer_generated: 'generation',
  generation_requested: 'generation',
  generation_failed: 'generation',
  graph_loaded: 'graph',
  graph_frozen: 'graph',
  templates_loaded: 'graph',
  session_started: 'system',
  session_stopped: 'system',
};

/** A single audit log entry */
export interface AuditEntry {
  /** Unique identifier for this audit entry */
  id: string;

  /** Unix timestamp in milliseconds when the event occurred */
  timestamp: number;

  category: AuditCategory;

  type: AuditEventType;

  /** Human-readable summary of what happened */
  summary: string;

  /** Component that produced the event (e.g. 'reasoning-controller', 'session') */
  source: string;

  /** Query template involved, if applicable */
  template?: string;

  /** Correlation ID linking all entries of one question */
  correlationId?: string;

  /** Additional contextual data about the operation */
  details: Record<string, unknown>;

  /** Duration of the operation in milliseconds, if applicable */
  durationMs?: number;
}

/** Filter options for querying audit entries */
export interface AuditQuery {
  category?: AuditCategory;

  types?: AuditEventType[];

  template?: string;

  source?: string;

  correlationId?: string;

  /** Filter entries after this timestamp (inclusive) */
  from?: number;

  /** Filter entries before this timestamp (inclusive) */
  to?: number;

  /** Maximum number of entries to return (default: 100) */
  limit?: number;

  /** Number of entries to skip for pagination */
  offset?: number;
}

/** Result of an audit query with pagination metadata */
export interface AuditQueryResult {
  entries: AuditEntry[];

  /** Total count of entries matching the filter (before pagination) */
  totalCount: number;

  queryTimeMs: number;

  /** Whether more entries exist beyond the current page */
  hasMore: boolean;
}

/** Configuration for AuditLogService */
export interface AuditConfig {
  /** Whether audit logging is enabled (default: true) */
  enabled?: boolean;

  /** Maximum entries kept in the in-memory buffer (default: 10000) */
  maxMemoryEntries?: number;

  /** How long to retain entries in milliseconds (default: 30 days) */
  retentionMs?: number;

  /** Number of entries per persistence batch (default: 100) */
  batchSize?: number;

  /** Interval between flush cycles in milliseconds (default: 5000, 0 disables the timer) */
  flushIntervalMs?: number;
}

/** Options of a single record() call */
export interface AuditRecordOptions {
  summary?: string;
  source?: string;
  template?: string;
  correlationId?: string;
  durationMs?: number;
}

/** Callback type for real-time audit entry subscriptions */
export type AuditSubscriber = (entry: AuditEntry) => void;

/** Statistics about the audit log service */
export interface AuditStats {
  /** Total number of entries recorded since start */
  totalEntries: number;

  /** Number of entries currently held in memory */
  memoryEntries: number;

  /** Timestamp of the oldest entry in memory, or null if empty */
  oldestEntry: number | null;

  /** Timestamp of the newest entry in memory, or null if empty */
  newestEntry: number | null;

  entriesByCategory: Record<AuditCategory, number>;

  /** Number of active real-time subscribers */
  subscribersCount: number;
}
