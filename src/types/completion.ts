/** Requested shape of the model response */
export type ResponseFormat = 'text' | 'json';

/** Per-call generation parameters */
export interface CompletionRequest {
  maxTokens: number;
  temperature: number;
  responseFormat?: ResponseFormat;
  signal?: AbortSignal;
}

/**
 * Stateless text-generation endpoint.
 *
 * Implementations reject with ServiceError on transport, timeout or
 * malformed-response failures.
 */
export interface CompletionService {
  generate(prompt: string, request: CompletionRequest): Promise<string>;
}

/** Generation settings applied by the ReasoningController */
export interface GenerationConfig {
  maxTokens?: number;          // Default: 512
  temperature?: number;        // Default: 0
  timeoutMs?: number;          // Default: 30000
  systemPrompt?: string;
}
