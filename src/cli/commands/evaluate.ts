/**
 * Příkaz evaluate pro CLI.
 * Porovná rozhodnutí modelu o souladu transakce s pravdou v grafu.
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import { ExitCode } from '../types.js';
import type { CompletionService } from '../../types/completion.js';
import type { ComplianceEvaluation } from '../../evaluation/compliance-evaluator.js';
import { createSession } from '../services/session-factory.js';
import { printData } from '../utils/output.js';
import { CliError } from '../utils/errors.js';

export interface EvaluateCommandOptions extends GlobalOptions {
  /** Nenulový exit kód, když model neodpoví správně */
  strict: boolean;
}

export async function evaluateCommand(
  transactions: string[],
  options: EvaluateCommandOptions,
  config: CliConfig,
  completion?: CompletionService
): Promise<ComplianceEvaluation[]> {
  const session = await createSession(config, completion);
  const results: ComplianceEvaluation[] = [];
  try {
    for (const tx of transactions) {
      const evaluation = await session.evaluateCompliance(tx);
      results.push(evaluation);
      printData({ type: 'evaluation', data: evaluation });
    }
  } finally {
    await session.stop();
  }

  if (options.strict) {
    const failed = results.filter((r) => r.correct !== true).map((r) => r.transaction);
    if (failed.length > 0) {
      throw new CliError(`Model verdict not confirmed for: ${failed.join(', ')}`, ExitCode.EvaluationMismatch);
    }
  }
  return results;
}
