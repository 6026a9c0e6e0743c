import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryAdapter } from '@hamicek/noex';
import { AuditLogService, bucketKey } from '../../../src/audit/audit-log-service.js';
import type { AuditEntry } from '../../../src/audit/types.js';

const HOUR_MS = 3_600_000;

describe('AuditLogService', () => {
  let service: AuditLogService;

  afterEach(async () => {
    vi.restoreAllMocks();
    await service.stop();
  });

  /** Records an entry as if it happened at `timestamp` */
  function recordAt(timestamp: number, ...args: Parameters<AuditLogService['record']>): AuditEntry | null {
    const spy = vi.spyOn(Date, 'now').mockReturnValue(timestamp);
    try {
      return service.record(...args);
    } finally {
      spy.mockRestore();
    }
  }

  describe('record', () => {
    beforeEach(async () => {
      service = await AuditLogService.start();
    });

    it('fills in category, summary and source', () => {
      const entry = service.record('answer_unknown', { reason: 'missing_facts' }, { correlationId: 'q-1' });

      expect(entry).toMatchObject({
        category: 'reasoning',
        type: 'answer_unknown',
        summary: 'Answer unknown',
        source: 'reasoner',
        correlationId: 'q-1',
        details: { reason: 'missing_facts' },
      });
      expect(entry?.id).toEqual(expect.any(String));
    });

    it('leaves unset options out of the entry', () => {
      const entry = service.record('session_started', {});

      expect(entry).not.toHaveProperty('template');
      expect(entry).not.toHaveProperty('correlationId');
      expect(entry).not.toHaveProperty('durationMs');
    });

    it('keeps custom summary, source, template and duration', () => {
      const entry = service.record('answer_generated', {}, {
        summary: 'Answered',
        source: 'reasoning-controller',
        template: 'client-transaction-review',
        durationMs: 12,
      });

      expect(entry).toMatchObject({
        summary: 'Answered',
        source: 'reasoning-controller',
        template: 'client-transaction-review',
        durationMs: 12,
      });
    });

    it('returns null when disabled', async () => {
      const disabled = await AuditLogService.start(undefined, { enabled: false });

      expect(disabled.record('session_started', {})).toBeNull();
      expect(disabled.size).toBe(0);
      await disabled.stop();
    });

    it('evicts the oldest tenth when the buffer is full', async () => {
      const small = await AuditLogService.start(undefined, { maxMemoryEntries: 10 });
      for (let i = 0; i < 11; i++) {
        small.record('question_received', { i }, { correlationId: `q-${i}` });
      }

      expect(small.size).toBe(10);
      expect(small.trail('q-0')).toEqual([]);
      expect(small.getStats().totalEntries).toBe(11);
      await small.stop();
    });
  });

  describe('query', () => {
    beforeEach(async () => {
      service = await AuditLogService.start();
      recordAt(1_000, 'question_received', {}, { correlationId: 'q-1' });
      recordAt(2_000, 'generation_requested', {}, { correlationId: 'q-1', template: 'review' });
      recordAt(3_000, 'answer_generated', {}, { correlationId: 'q-1', template: 'review' });
      recordAt(4_000, 'question_received', {}, { correlationId: 'q-2' });
      recordAt(5_000, 'answer_unknown', {}, { correlationId: 'q-2', source: 'reasoning-controller' });
    });

    it('returns everything in order by default', () => {
      const result = service.query();

      expect(result.entries.map(e => e.timestamp)).toEqual([1_000, 2_000, 3_000, 4_000, 5_000]);
      expect(result.totalCount).toBe(5);
      expect(result.hasMore).toBe(false);
    });

    it('filters by category, types, template and source', () => {
      expect(service.query({ category: 'generation' }).totalCount).toBe(2);
      expect(service.query({ types: ['question_received'] }).entries.map(e => e.correlationId)).toEqual(['q-1', 'q-2']);
      expect(service.query({ types: ['answer_generated', 'answer_unknown'] }).totalCount).toBe(2);
      expect(service.query({ template: 'review' }).totalCount).toBe(2);
      expect(service.query({ source: 'reasoning-controller' }).totalCount).toBe(1);
    });

    it('filters by time range inclusively', () => {
      expect(service.query({ from: 2_000, to: 4_000 }).entries.map(e => e.timestamp)).toEqual([2_000, 3_000, 4_000]);
    });

    it('paginates', () => {
      const page = service.query({ limit: 2, offset: 2 });

      expect(page.entries.map(e => e.timestamp)).toEqual([3_000, 4_000]);
      expect(page.totalCount).toBe(5);
      expect(page.hasMore).toBe(true);
    });

    it('returns the trail of one question', () => {
      expect(service.trail('q-2').map(e => e.type)).toEqual(['question_received', 'answer_unknown']);
      expect(service.trail('q-9')).toEqual([]);
    });
  });

  describe('subscribe', () => {
    beforeEach(async () => {
      service = await AuditLogService.start();
    });

    it('pushes new entries until unsubscribed', () => {
      const received: string[] = [];
      const unsubscribe = service.subscribe(entry => received.push(entry.type));

      service.record('session_started', {});
      unsubscribe();
      service.record('session_stopped', {});

      expect(received).toEqual(['session_started']);
    });

    it('isolates failing subscribers', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const received: string[] = [];
      service.subscribe(() => {
        throw new Error('subscriber failed');
      });
      service.subscribe(entry => received.push(entry.type));

      service.record('session_started', {});

      expect(received).toEqual(['session_started']);
      expect(errorSpy).toHaveBeenCalledWith('[audit-log] Error in subscriber:', expect.any(Error));
    });
  });

  describe('getStats', () => {
    it('counts entries by category', async () => {
      service = await AuditLogService.start();
      recordAt(1_000, 'question_received', {});
      recordAt(2_000, 'answer_generated', {});
      recordAt(3_000, 'graph_loaded', {});
      service.subscribe(() => {});

      expect(service.getStats()).toEqual({
        totalEntries: 3,
        memoryEntries: 3,
        oldestEntry: 1_000,
        newestEntry: 3_000,
        entriesByCategory: { reasoning: 1, generation: 1, graph: 1, system: 0 },
        subscribersCount: 1,
      });
    });

    it('reports nulls when empty', async () => {
      service = await AuditLogService.start();

      expect(service.getStats().oldestEntry).toBeNull();
      expect(service.getStats().newestEntry).toBeNull();
    });
  });

  describe('flush', () => {
    let adapter: MemoryAdapter;

    beforeEach(async () => {
      adapter = new MemoryAdapter();
      service = await AuditLogService.start(adapter, { flushIntervalMs: 0 });
    });

    it('writes entries into hourly buckets', async () => {
      recordAt(Date.UTC(2025, 0, 15, 10, 30), 'question_received', {});
      recordAt(Date.UTC(2025, 0, 15, 11, 30), 'answer_generated', {});

      await service.flush();

      const keys = await adapter.listKeys('audit:');
      expect(keys.sort()).toEqual(['audit:2025-01-15T10', 'audit:2025-01-15T11']);
    });

    it('merges with entries already stored', async () => {
      const hour = Date.UTC(2025, 0, 15, 10, 0);
      recordAt(hour, 'question_received', {});
      await service.flush();
      recordAt(hour + 1_000, 'answer_generated', {});
      await service.flush();

      const stored = await adapter.load<{ entries: AuditEntry[] }>('audit:2025-01-15T10');
      expect(stored?.state.entries.map(e => e.type)).toEqual(['question_received', 'answer_generated']);
      expect(stored?.metadata.serverId).toBe('audit-log');
    });

    it('flushes automatically when the batch is full', async () => {
      const batchAdapter = new MemoryAdapter();
      const batched = await AuditLogService.start(batchAdapter, { batchSize: 2, flushIntervalMs: 0 });

      batched.record('question_received', {});
      expect(await batchAdapter.listKeys('audit:')).toHaveLength(0);

      batched.record('answer_generated', {});
      await new Promise(resolve => setTimeout(resolve, 10));

      expect((await batchAdapter.listKeys('audit:')).length).toBeGreaterThan(0);
      await batched.stop();
    });

    it('writes what is left on stop', async () => {
      service.record('session_stopped', {});

      await service.stop();

      expect((await adapter.listKeys('audit:')).length).toBe(1);
    });

    it('reads persisted entries back in a time range', async () => {
      const t1 = Date.UTC(2025, 0, 15, 10, 0);
      const t2 = Date.UTC(2025, 0, 15, 12, 0);
      recordAt(t1, 'question_received', {});
      recordAt(t2, 'answer_generated', {});
      await service.flush();

      expect((await service.loadPersisted()).map(e => e.type)).toEqual(['question_received', 'answer_generated']);
      expect((await service.loadPersisted(t1 + HOUR_MS)).map(e => e.type)).toEqual(['answer_generated']);
      expect((await service.loadPersisted(undefined, t1)).map(e => e.type)).toEqual(['question_received']);
    });
  });

  describe('cleanup', () => {
    it('drops old entries from memory', async () => {
      service = await AuditLogService.start();
      const now = Date.now();
      recordAt(now - 10_000, 'question_received', {});
      recordAt(now - 5_000, 'answer_generated', {});
      recordAt(now, 'session_stopped', {});

      const removed = await service.cleanup(8_000);

      expect(removed).toBe(1);
      expect(service.size).toBe(2);
    });

    it('drops storage buckets that ended before the cutoff', async () => {
      const adapter = new MemoryAdapter();
      service = await AuditLogService.start(adapter, { flushIntervalMs: 0 });
      const oldTime = Date.UTC(2025, 0, 1, 10, 0);
      const recentTime = Date.UTC(2025, 0, 1, 12, 0);
      recordAt(oldTime, 'question_received', {});
      recordAt(recentTime, 'answer_generated', {});
      await service.flush();

      vi.spyOn(Date, 'now').mockReturnValue(recentTime);
      await service.cleanup(HOUR_MS - 1);
      vi.restoreAllMocks();

      const keys = await adapter.listKeys('audit:');
      expect(keys).toEqual(['audit:2025-01-01T12']);
    });
  });

  describe('clear', () => {
    it('empties memory and indexes', async () => {
      service = await AuditLogService.start();
      service.record('question_received', {}, { correlationId: 'q-1' });

      service.clear();

      expect(service.size).toBe(0);
      expect(service.trail('q-1')).toEqual([]);
    });
  });
});

describe('bucketKey', () => {
  it('truncates to the UTC hour', () => {
    expect(bucketKey(Date.UTC(2025, 5, 1, 23, 59, 59))).toBe('audit:2025-06-01T23');
  });
});
