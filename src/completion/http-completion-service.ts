/**
 * CompletionService backed by an OpenAI-compatible chat completions endpoint.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { CompletionRequest, CompletionService } from '../types/completion.js';
import { ReasonerError } from '../core/errors.js';
import { ServiceError } from './errors.js';

/** Konfigurace klienta */
export interface HttpCompletionConfig {
  /** API klíč (Bearer token) */
  apiKey: string;
  /** Základ URL API (výchozí: https://api.openai.com/v1) */
  baseUrl: string;
  /** Model (výchozí: gpt-4o-mini) */
  model: string;
  /** Volitelná systémová zpráva před promptem */
  systemPrompt?: string;
  /** Počet opakování při retryable chybě (výchozí: 2) */
  maxRetries: number;
  /** Prodleva mezi pokusy v ms (výchozí: 1500) */
  retryDelayMs: number;
}

export const DEFAULT_HTTP_COMPLETION_CONFIG: Omit<HttpCompletionConfig, 'apiKey'> = {
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini',
  maxRetries: 2,
  retryDelayMs: 1500,
};

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Text první odpovědi, nebo undefined když tvar nesedí */
function extractContent(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const choices = body['choices'];
  if (!Array.isArray(choices)) return undefined;
  const first: unknown = choices[0];
  if (!isRecord(first)) return undefined;
  const message = first['message'];
  if (!isRecord(message)) return undefined;
  const content = message['content'];
  return typeof content === 'string' ? content : undefined;
}

/** Chybová zpráva z těla odpovědi (`{ error: { message } }`) */
function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const error = body['error'];
  if (isRecord(error) && typeof error['message'] === 'string') return error['message'];
  return typeof error === 'string' ? error : undefined;
}

/**
 * Chat completions over `fetch`.
 *
 * Retryable failures (transport, 429, 5xx) are retried up to `maxRetries`
 * times; the request signal aborts both the request and the wait between
 * attempts.
 */
export class HttpCompletionService implements CompletionService {
  private readonly config: HttpCompletionConfig;

  constructor(config: Partial<HttpCompletionConfig> & { apiKey: string }) {
    if (!config.apiKey) {
      throw new ReasonerError('HttpCompletionService requires an apiKey');
    }
    this.config = { ...DEFAULT_HTTP_COMPLETION_CONFIG, ...config };
  }

  get model(): string {
    return this.config.model;
  }

  async generate(prompt: string, request: CompletionRequest): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.requestOnce(prompt, request);
      } catch (err) {
        if (!(err instanceof ServiceError) || !err.retryable || attempt >= this.config.maxRetries) {
          throw err;
        }
        await this.backoff(request.signal);
      }
    }
  }

  /** Sestaví URL endpointu */
  private buildUrl(): string {
    return `${this.config.baseUrl.replace(/\/$/, '')}/chat/completions`;
  }

  private buildBody(prompt: string, request: CompletionRequest): Record<string, unknown> {
    const messages: ChatMessage[] = [];
    if (this.config.systemPrompt) {
      messages.push({ role: 'system', content: this.config.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    return {
      model: this.config.model,
      messages,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      ...(request.responseFormat === 'json' && { response_format: { type: 'json_object' } }),
    };
  }

  private async requestOnce(prompt: string, request: CompletionRequest): Promise<string> {
    const requestInit: RequestInit = {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(this.buildBody(prompt, request)),
    };
    if (request.signal) {
      requestInit.signal = request.signal;
    }

    let response: Response;
    try {
      response = await fetch(this.buildUrl(), requestInit);
    } catch (err) {
      if (request.signal?.aborted) {
        throw new ServiceError('aborted', 'Completion request was aborted', { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ServiceError('transport', `Completion request failed: ${message}`, { cause: err });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (!response.ok) {
        throw new ServiceError('http_status', `HTTP ${response.status}: ${response.statusText}`, {
          status: response.status,
        });
      }
      throw new ServiceError('malformed_response', 'Completion response is not valid JSON', { cause: err });
    }

    if (!response.ok) {
      const message = extractErrorMessage(body) ?? response.statusText;
      throw new ServiceError('http_status', `HTTP ${response.status}: ${message}`, { status: response.status });
    }

    const content = extractContent(body);
    if (content === undefined) {
      throw new ServiceError('malformed_response', 'Completion response has no message content');
    }
    return content;
  }

  private async backoff(signal: AbortSignal | undefined): Promise<void> {
    try {
      await sleep(this.config.retryDelayMs, undefined, signal ? { signal } : undefined);
    } catch (err) {
      throw new ServiceError('aborted', 'Completion request was aborted', { cause: err });
    }
  }
}
