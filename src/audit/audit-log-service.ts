import type { StorageAdapter, PersistedState } from '@hamicek/noex';
import { generateId } from '../utils/id-generator.js';
import {
  AUDIT_EVENT_CATEGORIES,
  type AuditCategory,
  type AuditConfig,
  type AuditEntry,
  type AuditEventType,
  type AuditQuery,
  type AuditQueryResult,
  type AuditRecordOptions,
  type AuditStats,
  type AuditSubscriber,
} from './types.js';

const DEFAULT_MAX_MEMORY_ENTRIES = 10_000;
const DEFAULT_RETENTION_MS = 30 * 24 * 60 * 60 * 1_000;
const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_FLUSH_INTERVAL_MS = 5_000;

export const AUDIT_BUCKET_PREFIX = 'audit:';
const BUCKET_DURATION_MS = 3_600_000;
const BUCKET_KEY_RE = /^audit:(\d{4})-(\d{2})-(\d{2})T(\d{2})$/;

/** Persisted content of one hourly bucket */
interface AuditBucketState {
  entries: AuditEntry[];
}

/**
 * Storage key of the hourly bucket a timestamp falls into: `audit:YYYY-MM-DDTHH`.
 */
export function bucketKey(timestamp: number): string {
  return `${AUDIT_BUCKET_PREFIX}${new Date(timestamp).toISOString().slice(0, 13)}`;
}

/** Start of the bucket hour, or null for a foreign key */
function bucketStart(key: string): number | null {
  const match = BUCKET_KEY_RE.exec(key);
  if (!match) return null;
  const [, year, month, day, hour] = match;
  return Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour));
}

/**
 * `'answer_unknown'` → `'Answer unknown'`
 */
function defaultSummary(type: AuditEventType): string {
  const text = type.replace(/_/g, ' ');
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function emptyCategoryCounts(): Record<AuditCategory, number> {
  return { reasoning: 0, generation: 0, graph: 0, system: 0 };
}

/**
 * Audit trail of the reasoner.
 *
 * Entries are kept in a bounded in-memory buffer with indexes by
 * correlation id, template and type, pushed to subscribers as they are
 * recorded, and, with a StorageAdapter, written in hourly buckets by a
 * periodic flush.
 */
export class AuditLogService {
  private readonly enabled: boolean;
  private readonly maxMemoryEntries: number;
  private readonly retentionMs: number;
  private readonly batchSize: number;
  private readonly adapter: StorageAdapter | null;

  private readonly entries: AuditEntry[] = [];
  private readonly byCorrelation = new Map<string, AuditEntry[]>();
  private readonly byTemplate = new Map<string, AuditEntry[]>();
  private readonly byType = new Map<AuditEventType, AuditEntry[]>();
  private readonly subscribers = new Set<AuditSubscriber>();

  private pending: AuditEntry[] = [];
  private flushing: Promise<void> = Promise.resolve();
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private totalEntries = 0;

  private constructor(adapter: StorageAdapter | null, config: AuditConfig) {
    this.enabled = config.enabled ?? true;
    this.maxMemoryEntries = config.maxMemoryEntries ?? DEFAULT_MAX_MEMORY_ENTRIES;
    this.retentionMs = config.retentionMs ?? DEFAULT_RETENTION_MS;
    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.adapter = adapter;

    const flushIntervalMs = config.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    if (this.adapter && this.enabled && flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => this.scheduleFlush(), flushIntervalMs);
      this.flushTimer.unref();
    }
  }

  /**
   * Creates the service. Without an adapter, entries live only in memory.
   */
  static async start(adapter?: StorageAdapter, config: AuditConfig = {}): Promise<AuditLogService> {
    return new AuditLogService(adapter ?? null, config);
  }

  /**
   * Records an entry synchronously and queues it for persistence.
   * Returns `null` when auditing is disabled.
   */
  record(
    type: AuditEventType,
    details: Record<string, unknown>,
    options: AuditRecordOptions = {},
  ): AuditEntry | null {
    if (!this.enabled) {
      return null;
    }

    const entry: AuditEntry = {
      id: generateId(),
      timestamp: Date.now(),
      category: AUDIT_EVENT_CATEGORIES[type],
      type,
      summary: options.summary ?? defaultSummary(type),
      source: options.source ?? 'reasoner',
      details,
      ...(options.template !== undefined && { template: options.template }),
      ...(options.correlationId !== undefined && { correlationId: options.correlationId }),
      ...(options.durationMs !== undefined && { durationMs: options.durationMs }),
    };

    if (this.entries.length >= this.maxMemoryEntries) {
      this.evict(Math.max(1, Math.ceil(this.maxMemoryEntries * 0.1)));
    }
    this.entries.push(entry);
    this.index(entry);
    this.totalEntries++;

    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (error) {
        console.error('[audit-log] Error in subscriber:', error);
      }
    }

    if (this.adapter) {
      this.pending.push(entry);
      if (this.pending.length >= this.batchSize) {
        this.scheduleFlush();
      }
    }

    return entry;
  }

  /**
   * Filters entries in chronological order, with pagination.
   */
  query(filter: AuditQuery = {}): AuditQueryResult {
    const startTime = Date.now();

    let candidates: readonly AuditEntry[];
    if (filter.correlationId !== undefined) {
      candidates = this.byCorrelation.get(filter.correlationId) ?? [];
    } else if (filter.template !== undefined) {
      candidates = this.byTemplate.get(filter.template) ?? [];
    } else if (filter.types?.length === 1 && filter.types[0] !== undefined) {
      candidates = this.byType.get(filter.types[0]) ?? [];
    } else {
      candidates = this.entries;
    }

    const types = filter.types ? new Set(filter.types) : undefined;
    const matching = candidates.filter(e =>
      (filter.category === undefined || e.category === filter.category) &&
      (types === undefined || types.has(e.type)) &&
      (filter.template === undefined || e.template === filter.template) &&
      (filter.source === undefined || e.source === filter.source) &&
      (filter.correlationId === undefined || e.correlationId === filter.correlationId) &&
      (filter.from === undefined || e.timestamp >= filter.from) &&
      (filter.to === undefined || e.timestamp <= filter.to),
    );

    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? 100;

    return {
      entries: matching.slice(offset, offset + limit),
      totalCount: matching.length,
      queryTimeMs: Date.now() - startTime,
      hasMore: offset + limit < matching.length,
    };
  }

  /** All entries of one question, in order */
  trail(correlationId: string): AuditEntry[] {
    return [...(this.byCorrelation.get(correlationId) ?? [])];
  }

  /**
   * Subscribes to new entries. Returns an unsubscribe function.
   */
  subscribe(subscriber: AuditSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  getStats(): AuditStats {
    const entriesByCategory = emptyCategoryCounts();
    for (const entry of this.entries) {
      entriesByCategory[entry.category]++;
    }

    return {
      totalEntries: this.totalEntries,
      memoryEntries: this.entries.length,
      oldestEntry: this.entries[0]?.timestamp ?? null,
      newestEntry: this.entries[this.entries.length - 1]?.timestamp ?? null,
      entriesByCategory,
      subscribersCount: this.subscribers.size,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Writes pending entries to their hourly buckets, merged with what the
   * adapter already holds. Flushes never overlap.
   */
  async flush(): Promise<void> {
    const run = this.flushing.then(() => this.writePending());
    this.flushing = run.catch(() => undefined);
    return run;
  }

  /**
   * Reads persisted entries back, oldest first.
   */
  async loadPersisted(from?: number, to?: number): Promise<AuditEntry[]> {
    if (!this.adapter) {
      return [];
    }

    const result: AuditEntry[] = [];
    const keys = (await this.adapter.listKeys(AUDIT_BUCKET_PREFIX)).sort();
    for (const key of keys) {
      const start = bucketStart(key);
      if (start === null) continue;
      if (from !== undefined && start + BUCKET_DURATION_MS <= from) continue;
      if (to !== undefined && start > to) continue;

      const bucket = await this.adapter.load<AuditBucketState>(key);
      for (const entry of bucket?.state.entries ?? []) {
        if ((from === undefined || entry.timestamp >= from) && (to === undefined || entry.timestamp <= to)) {
          result.push(entry);
        }
      }
    }
    return result;
  }

  /**
   * Drops entries older than the retention period, in memory and in storage.
   *
   * @returns Number of entries removed from memory
   */
  async cleanup(maxAgeMs?: number): Promise<number> {
    const cutoff = Date.now() - (maxAgeMs ?? this.retentionMs);
    const expired = this.entries.findIndex(e => e.timestamp >= cutoff);
    const removed = expired === -1 ? this.entries.length : expired;
    this.evict(removed);

    if (this.adapter) {
      for (const key of await this.adapter.listKeys(AUDIT_BUCKET_PREFIX)) {
        const start = bucketStart(key);
        if (start !== null && start + BUCKET_DURATION_MS < cutoff) {
          await this.adapter.delete(key);
        }
      }
    }

    return removed;
  }

  /**
   * Stops the flush timer and writes what is left.
   */
  async stop(): Promise<void> {
    if (this.flushTimer !== null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  clear(): void {
    this.entries.length = 0;
    this.byCorrelation.clear();
    this.byTemplate.clear();
    this.byType.clear();
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private scheduleFlush(): void {
    this.flush().catch(error => {
      console.error('[audit-log] Failed to persist audit entries:', error);
    });
  }

  private async writePending(): Promise<void> {
    if (!this.adapter || this.pending.length === 0) {
      return;
    }

    const batch = this.pending;
    this.pending = [];

    const buckets = new Map<string, AuditEntry[]>();
    for (const entry of batch) {
      const key = bucketKey(entry.timestamp);
      const bucket = buckets.get(key);
      if (bucket) {
        bucket.push(entry);
      } else {
        buckets.set(key, [entry]);
      }
    }

    for (const [key, entries] of buckets) {
      const existing = await this.adapter.load<AuditBucketState>(key);
      const persisted: PersistedState<AuditBucketState> = {
        state: { entries: existing ? [...existing.state.entries, ...entries] : entries },
        metadata: {
          persistedAt: Date.now(),
          serverId: 'audit-log',
          schemaVersion: 1,
        },
      };
      await this.adapter.save(key, persisted);
    }
  }

  private index(entry: AuditEntry): void {
    append(this.byType, entry.type, entry);
    if (entry.correlationId !== undefined) {
      append(this.byCorrelation, entry.correlationId, entry);
    }
    if (entry.template !== undefined) {
      append(this.byTemplate, entry.template, entry);
    }
  }

  /** Removes the `count` oldest entries */
  private evict(count: number): void {
    if (count <= 0) return;
    const removed = new Set(this.entries.splice(0, count));
    prune(this.byType, removed);
    prune(this.byCorrelation, removed);
    prune(this.byTemplate, removed);
  }
}

function prune<K>(index: Map<K, AuditEntry[]>, removed: ReadonlySet<AuditEntry>): void {
  for (const [key, list] of index) {
    const kept = list.filter(e => !removed.has(e));
    if (kept.length === 0) {
      index.delete(key);
    } else if (kept.length !== list.length) {
      index.set(key, kept);
    }
  }
}

function append<K>(index: Map<K, AuditEntry[]>, key: K, entry: AuditEntry): void {
  const list = index.get(key);
  if (list) {
    list.push(entry);
  } else {
    index.set(key, [entry]);
  }
}
