import type { CompletionRequest, CompletionService } from '../types/completion.js';
import { ServiceError, toServiceError } from './errors.js';

export interface InvokeOptions {
  timeoutMs: number;
  /** Caller's cancellation signal */
  signal?: AbortSignal | undefined;
}

/**
 * Calls the completion service once, bounded by a timeout and the
 * caller's signal.
 *
 * The service receives its own signal that fires on either. A service
 * that ignores it is abandoned: the returned promise settles anyway. The
 * timer is always cleared.
 *
 * @throws {ServiceError} `timeout`, `aborted`, `malformed_response` (empty text),
 *   or whatever the service rejected with, normalized
 */
export async function invokeCompletion(
  service: CompletionService,
  prompt: string,
  request: Omit<CompletionRequest, 'signal'>,
  options: InvokeOptions,
): Promise<string> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    throw new ServiceError('aborted', 'Completion request was aborted before it started');
  }

  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => {
      reject(timedOut
        ? new ServiceError('timeout', `Completion request timed out after ${timeoutMs}ms`)
        : new ServiceError('aborted', 'Completion request was aborted'));
    }, { once: true });
  });

  try {
    const text = await Promise.race([
      service.generate(prompt, { ...request, signal: controller.signal }),
      aborted,
    ]);

    if (typeof text !== 'string' || text.trim() === '') {
      throw new ServiceError('malformed_response', 'Completion service returned an empty response');
    }
    return text;
  } catch (error) {
    if (timedOut) {
      throw error instanceof ServiceError && error.reason === 'timeout'
        ? error
        : new ServiceError('timeout', `Completion request timed out after ${timeoutMs}ms`, { cause: error });
    }
    if (error instanceof ServiceError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new ServiceError('aborted', 'Completion request was aborted', { cause: error });
    }
    throw toServiceError(error);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}
