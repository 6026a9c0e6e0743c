import type { StorageAdapter } from '@hamicek/noex';
import type { AuditStats } from '../audit/types.js';
import type { CompletionService, GenerationConfig } from './completion.js';
import type { GraphStats } from './graph.js';
import type { QueryTemplate } from './template.js';

export * from './graph.js';
export * from './fact.js';
export * from './template.js';
export * from './evidence.js';
export * from './completion.js';

/** Konfigurace persistence grafu */
export interface GraphPersistenceConfig {
  /** Storage adapter (např. SQLiteAdapter z @hamicek/noex) */
  adapter: StorageAdapter;

  /** Klíč pro uložení (výchozí: 'graph') */
  key?: string;

  /** Verze schématu (výchozí: 1) */
  schemaVersion?: number;

  /** Uložit graf po načtení souborů, před zmrazením (výchozí: false) */
  saveOnStart?: boolean;
}

/** Konfigurace audit logu */
export interface AuditPersistenceConfig {
  /** Storage adapter; bez něj zůstávají záznamy jen v paměti */
  adapter?: StorageAdapter;

  /** Jak dlouho uchovávat záznamy v ms (výchozí: 30 dní) */
  retentionMs?: number;

  /** Počet záznamů na persistence batch (výchozí: 100) */
  batchSize?: number;

  /** Interval mezi flush cykly v ms (výchozí: 5000) */
  flushIntervalMs?: number;

  /** Maximální počet záznamů v paměti (výchozí: 10000) */
  maxMemoryEntries?: number;
}

/** Konfigurace ReasoningSession */
export interface ReasonerConfig {
  name?: string;

  /** Generativní služba; jediná povinná položka */
  completion: CompletionService;

  generation?: GenerationConfig;

  /** Soubory grafu (.triples, .yaml) načtené v pořadí */
  graphFiles?: string[];

  /** Šablony registrované před šablonami ze souborů */
  templates?: QueryTemplate[];

  /** YAML soubory se šablonami */
  templateFiles?: string[];

  /** Maximální počet skupin faktů na otázku (výchozí: 3) */
  maxGroups?: number;

  /** Snapshot grafu; načte se před soubory */
  persistence?: GraphPersistenceConfig;

  audit?: AuditPersistenceConfig;
}

/** Statistiky session */
export interface SessionStats {
  graph: GraphStats;
  templates: number;
  questionsAsked: number;
  audit?: AuditStats;
}
