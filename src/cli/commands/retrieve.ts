/**
 * Příkaz retrieve pro CLI.
 * Ukáže skupiny faktů, ze kterých by se odpovídalo; model se nevolá.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import { createSession, UnconfiguredCompletionService } from '../services/session-factory.js';
import { printData } from '../utils/output.js';
import { InvalidArgumentsError } from '../utils/errors.js';

export interface RetrieveCommandOptions extends GlobalOptions {
  maxGroups: number | undefined;
}

export async function retrieveCommand(
  question: string,
  options: RetrieveCommandOptions,
  config: CliConfig
): Promise<void> {
  if (question.trim() === '') {
    throw new InvalidArgumentsError('Question must not be empty');
  }

  const session = await createSession(config, new UnconfiguredCompletionService(config.completion.apiKeyEnv));
  try {
    const groups = session.retrieve(
      question,
      options.maxGroups !== undefined ? { maxGroups: options.maxGroups } : {}
    );
    printData({ type: 'groups', data: groups, meta: { question } });
  } finally {
    await session.stop();
  }
}
