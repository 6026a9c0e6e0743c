/**
 * CLI konfigurace - načítání a správa konfiguračního souboru.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { AuditAdapterType, CliConfig, OutputFormat } from '../types.js';
import { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS } from '../types.js';
import { ConfigError } from './errors.js';

export const CONFIG_FILENAME = '.kg-reasoner.json';

const AUDIT_ADAPTERS: readonly AuditAdapterType[] = ['none', 'memory', 'sqlite'];

/** Hledá konfigurační soubor v hierarchii adresářů */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  // Zkus home adresář
  const homeConfig = join(homedir(), CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typované čtení částečné konfigurace. Chybějící hodnota je undefined,
 * hodnota špatného typu je chyba.
 */
class ConfigReader {
  constructor(
    private readonly raw: Record<string, unknown>,
    private readonly filePath: string
  ) {}

  private value(section: keyof CliConfig, key: string): unknown {
    const sectionValue = this.raw[section];
    if (sectionValue === undefined) {
      return undefined;
    }
    if (!isRecord(sectionValue)) {
      throw new ConfigError(`"${section}" must be an object`, this.filePath);
    }
    return sectionValue[key];
  }

  private fail(section: string, key: string, expected: string): never {
    throw new ConfigError(`"${section}.${key}" must be ${expected}`, this.filePath);
  }

  string(section: keyof CliConfig, key: string): string | undefined {
    const value = this.value(section, key);
    if (value === undefined) return undefined;
    return typeof value === 'string' ? value : this.fail(section, key, 'a string');
  }

  number(section: keyof CliConfig, key: string): number | undefined {
    const value = this.value(section, key);
    if (value === undefined) return undefined;
    return typeof value === 'number' && Number.isFinite(value) ? value : this.fail(section, key, 'a number');
  }

  boolean(section: keyof CliConfig, key: string): boolean | undefined {
    const value = this.value(section, key);
    if (value === undefined) return undefined;
    return typeof value === 'boolean' ? value : this.fail(section, key, 'a boolean');
  }

  stringArray(section: keyof CliConfig, key: string): string[] | undefined {
    const value = this.value(section, key);
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    return this.fail(section, key, 'an array of strings');
  }

  oneOf<T extends string>(section: keyof CliConfig, key: string, allowed: readonly T[]): T | undefined {
    const value = this.value(section, key);
    if (value === undefined) return undefined;
    const match = allowed.find(a => a === value);
    return match ?? this.fail(section, key, `one of ${allowed.join(', ')}`);
  }
}

/** Parsuje JSON konfiguraci a slije ji s `base` */
export function parseConfig(content: string, filePath: string, base: CliConfig = DEFAULT_CLI_CONFIG): CliConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON: ${message}`, filePath);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Configuration must be an object', filePath);
  }

  const r = new ConfigReader(parsed, filePath);
  const systemPrompt = r.string('completion', 'systemPrompt') ?? base.completion.systemPrompt;
  const auditPath = r.string('audit', 'path') ?? base.audit.path;

  return {
    graph: {
      files: r.stringArray('graph', 'files') ?? [...base.graph.files]
    },
    templates: {
      files: r.stringArray('templates', 'files') ?? [...base.templates.files]
    },
    completion: {
      baseUrl: r.string('completion', 'baseUrl') ?? base.completion.baseUrl,
      model: r.string('completion', 'model') ?? base.completion.model,
      apiKeyEnv: r.string('completion', 'apiKeyEnv') ?? base.completion.apiKeyEnv,
      timeout: r.string('completion', 'timeout') ?? base.completion.timeout,
      maxRetries: r.number('completion', 'maxRetries') ?? base.completion.maxRetries,
      ...(systemPrompt !== undefined && { systemPrompt })
    },
    generation: {
      maxTokens: r.number('generation', 'maxTokens') ?? base.generation.maxTokens,
      temperature: r.number('generation', 'temperature') ?? base.generation.temperature
    },
    retrieval: {
      maxGroups: r.number('retrieval', 'maxGroups') ?? base.retrieval.maxGroups
    },
    audit: {
      adapter: r.oneOf('audit', 'adapter', AUDIT_ADAPTERS) ?? base.audit.adapter,
      ...(auditPath !== undefined && { path: auditPath })
    },
    output: {
      format: r.oneOf<OutputFormat>('output', 'format', OUTPUT_FORMATS) ?? base.output.format,
      colors: r.boolean('output', 'colors') ?? base.output.colors
    }
  };
}

/** Cache pro načtenou konfiguraci */
let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Načte CLI konfiguraci.
 *
 * Priorita:
 * 1. Explicitně zadaná cesta
 * 2. Konfigurační soubor v aktuálním adresáři nebo jeho rodičích
 * 3. Konfigurační soubor v home adresáři
 * 4. Výchozí konfigurace
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

  if (cachedConfig && cachedConfigPath === pathToLoad) {
    return cachedConfig;
  }

  if (!pathToLoad || !existsSync(pathToLoad)) {
    if (explicitPath) {
      throw new ConfigError('Configuration file not found', resolve(explicitPath));
    }
    cachedConfig = parseConfig('{}', '(defaults)');
    cachedConfigPath = null;
    return cachedConfig;
  }

  cachedConfig = parseConfig(readFileSync(pathToLoad, 'utf-8'), pathToLoad);
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resetuje cache konfigurace (pro testování) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Vrátí cestu k načtené konfiguraci */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
