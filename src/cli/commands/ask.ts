/**
 * Příkaz ask pro CLI.
 * Odpoví na otázku z grafu; model se volá jen pro úplnou a konzistentní evidenci.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import type { CompletionService } from '../../types/completion.js';
import type { AskOptions } from '../../core/reasoning-controller.js';
import { createSession } from '../services/session-factory.js';
import { printData } from '../utils/output.js';
import { InvalidArgumentsError } from '../utils/errors.js';
import { parseDuration } from '../../utils/duration-parser.js';

/** Options pro příkaz ask */
export interface AskCommandOptions extends GlobalOptions {
  /** Predikáty vynechané z promptu (čárkami oddělené) */
  hide: string | undefined;
  /** Požádat model o JSON odpověď */
  json: boolean;
  timeout: string | undefined;
  maxGroups: number | undefined;
}

/** Rozdělí čárkami oddělený seznam */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

export function buildAskOptions(options: AskCommandOptions): AskOptions {
  const hidden = splitList(options.hide);
  if (options.maxGroups !== undefined && (!Number.isInteger(options.maxGroups) || options.maxGroups < 1)) {
    throw new InvalidArgumentsError(`--max-groups must be a positive integer, got ${options.maxGroups}`);
  }
  return {
    ...(hidden.length > 0 && { hiddenPredicates: hidden }),
    ...(options.json && { responseFormat: 'json' as const }),
    ...(options.timeout !== undefined && { timeoutMs: parseDuration(options.timeout) }),
    ...(options.maxGroups !== undefined && { maxGroups: options.maxGroups })
  };
}

/**
 * Akce příkazu ask.
 */
export async function askCommand(
  question: string,
  options: AskCommandOptions,
  config: CliConfig,
  completion?: CompletionService
): Promise<void> {
  if (question.trim() === '') {
    throw new InvalidArgumentsError('Question must not be empty');
  }
  const askOptions = buildAskOptions(options);

  const session = await createSession(config, completion);
  try {
    const answer = await session.ask(question, askOptions);
    printData({ type: 'answer', data: answer });
  } finally {
    await session.stop();
  }
}
