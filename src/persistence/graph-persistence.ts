import type { StorageAdapter, PersistedState, StateMetadata } from '@hamicek/noex';
import type { KnowledgeGraph } from '../core/knowledge-graph.js';
import type { LoadSummary } from '../types/graph.js';

/** Konfigurační options pro GraphPersistence */
export interface GraphPersistenceOptions {
  /** Klíč pro uložení (výchozí: 'graph') */
  key?: string;
  /** Verze schématu (výchozí: 1) */
  schemaVersion?: number;
}

/** Interní struktura uloženého stavu */
interface GraphState {
  /** Graf v textovém formátu trojic */
  triples: string;
}

/**
 * Snapshot znalostního grafu ve StorageAdapter (SQLite, memory).
 *
 * Graf se ukládá jako text ve formátu trojic, takže uložený stav je
 * čitelný a stejný jako výstup `KnowledgeGraph.dump()`.
 */
export class GraphPersistence {
  private readonly adapter: StorageAdapter;
  private readonly key: string;
  private readonly schemaVersion: number;

  constructor(adapter: StorageAdapter, options?: GraphPersistenceOptions) {
    this.adapter = adapter;
    this.key = options?.key ?? 'graph';
    this.schemaVersion = options?.schemaVersion ?? 1;
  }

  /**
   * Uloží aktuální obsah grafu.
   */
  async save(graph: KnowledgeGraph): Promise<void> {
    const metadata: StateMetadata = {
      persistedAt: Date.now(),
      serverId: 'kg-reasoner',
      schemaVersion: this.schemaVersion,
    };

    const persisted: PersistedState<GraphState> = {
      state: { triples: graph.dump() },
      metadata,
    };

    await this.adapter.save(this.key, persisted);
  }

  /**
   * Vrátí uložený text, nebo null když nic uloženo není
   * nebo verze schématu nesedí.
   */
  async loadText(): Promise<string | null> {
    const result = await this.adapter.load<GraphState>(this.key);
    if (!result || result.metadata.schemaVersion !== this.schemaVersion) {
      return null;
    }
    return result.state.triples;
  }

  /**
   * Načte uložený snapshot do grafu.
   *
   * @returns Souhrn načtení, nebo null když snapshot neexistuje
   * @throws {GraphIntegrityError} Když snapshot odporuje obsahu grafu
   */
  async load(graph: KnowledgeGraph): Promise<LoadSummary | null> {
    const text = await this.loadText();
    if (text === null) {
      return null;
    }
    return graph.load(text, { source: `storage:${this.key}` });
  }

  async clear(): Promise<boolean> {
    return this.adapter.delete(this.key);
  }

  async exists(): Promise<boolean> {
    return this.adapter.exists(this.key);
  }

  getKey(): string {
    return this.key;
  }

  getSchemaVersion(): number {
    return this.schemaVersion;
  }
}
