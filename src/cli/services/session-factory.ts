/**
 * Sestavení ReasoningSession z CLI konfigurace.
 */

import { MemoryAdapter, SQLiteAdapter, type StorageAdapter } from '@hamicek/noex';
import type { CliConfig } from '../types.js';
import type { CompletionRequest, CompletionService } from '../../types/completion.js';
import type { ReasonerConfig } from '../../types/index.js';
import { ReasoningSession } from '../../core/session.js';
import { HttpCompletionService } from '../../completion/http-completion-service.js';
import { ServiceError } from '../../completion/errors.js';
import { parseDuration } from '../../utils/duration-parser.js';
import { InvalidArgumentsError } from '../utils/errors.js';

/**
 * Služba bez API klíče. Otázky s výsledkem unknown/inconclusive fungují,
 * generování selže s popisem chybějící proměnné.
 */
export class UnconfiguredCompletionService implements CompletionService {
  constructor(private readonly apiKeyEnv: string) {}

  async generate(_prompt: string, _request: CompletionRequest): Promise<string> {
    throw new ServiceError(
      'transport',
      `No API key: environment variable ${this.apiKeyEnv} is not set`,
      { retryable: false }
    );
  }
}

/**
 * Vytvoří storage adapter audit logu, nebo undefined pro 'none'.
 */
export function createAuditAdapter(config: CliConfig['audit']): StorageAdapter | undefined {
  switch (config.adapter) {
    case 'none':
      return undefined;

    case 'memory':
      return new MemoryAdapter();

    case 'sqlite':
      return new SQLiteAdapter({ filename: config.path ?? './data/audit.db' });

    default: {
      const exhaustiveCheck: never = config.adapter;
      throw new InvalidArgumentsError(`Unknown audit adapter: ${String(exhaustiveCheck)}`);
    }
  }
}

export function createCompletionService(
  config: CliConfig['completion'],
  env: NodeJS.ProcessEnv = process.env
): CompletionService {
  const apiKey = env[config.apiKeyEnv];
  if (!apiKey) {
    return new UnconfiguredCompletionService(config.apiKeyEnv);
  }
  return new HttpCompletionService({
    apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    maxRetries: config.maxRetries,
    ...(config.systemPrompt !== undefined && { systemPrompt: config.systemPrompt })
  });
}

/**
 * Převede CLI konfiguraci na ReasonerConfig.
 */
export function toReasonerConfig(config: CliConfig, completion: CompletionService): ReasonerConfig {
  const auditAdapter = createAuditAdapter(config.audit);

  return {
    completion,
    generation: {
      maxTokens: config.generation.maxTokens,
      temperature: config.generation.temperature,
      timeoutMs: parseDuration(config.completion.timeout)
    },
    graphFiles: config.graph.files,
    templateFiles: config.templates.files,
    maxGroups: config.retrieval.maxGroups,
    ...(config.audit.adapter !== 'none' && {
      audit: {
        ...(auditAdapter !== undefined && { adapter: auditAdapter }),
        flushIntervalMs: 0
      }
    })
  };
}

export async function createSession(
  config: CliConfig,
  completion: CompletionService = createCompletionService(config.completion)
): Promise<ReasoningSession> {
  return ReasoningSession.start(toReasonerConfig(config, completion));
}
