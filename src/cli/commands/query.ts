/**
 * Příkaz query pro CLI.
 * Spustí šablonu s explicitními vazbami (`--bind client=A`).
 */

import type { CliConfig, GlobalOptions } from '../types.js';
import type { QueryTemplate, TemplateBindings } from '../../types/template.js';
import { coerceBinding } from '../../dsl/template/validation.js';
import { createSession, UnconfiguredCompletionService } from '../services/session-factory.js';
import { printData } from '../utils/output.js';
import { InvalidArgumentsError } from '../utils/errors.js';

export interface QueryCommandOptions extends GlobalOptions {
  /** Vazby ve tvaru name=value; cac dává string nebo pole */
  bind: string | string[] | undefined;
}

/**
 * Převede `name=value` argumenty na vazby podle typů parametrů šablony.
 * Neznámé názvy propadnou beze změny, ohlásí je validace šablony.
 */
export function parseBindings(template: QueryTemplate, raw: string | string[] | undefined): TemplateBindings {
  const items = raw === undefined ? [] : Array.isArray(raw) ? raw : [raw];
  const bindings: TemplateBindings = {};

  for (const item of items) {
    const eq = item.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentsError(`Invalid binding "${item}", expected name=value`);
    }
    const name = item.slice(0, eq).trim();
    const value = item.slice(eq + 1);
    const param = template.params.find((p) => p.name === name);
    bindings[name] = param ? coerceBinding(template.name, param, value) : value;
  }

  return bindings;
}

export async function queryCommand(
  templateName: string,
  options: QueryCommandOptions,
  config: CliConfig
): Promise<void> {
  const session = await createSession(config, new UnconfiguredCompletionService(config.completion.apiKeyEnv));
  try {
    const template = session.getTemplates().get(templateName);
    const result = session.query(templateName, parseBindings(template, options.bind));
    printData({ type: 'query', data: result });
  } finally {
    await session.stop();
  }
}
