/**
 * Společný základ YAML loaderů: parsování dokumentu a čtení souborů.
 *
 * @example
 * ```typescript
 * import { loadTemplatesFromFile, loadGraphFromYAMLFile } from 'kg-reasoner/dsl';
 *
 * const templates = await loadTemplatesFromFile('./data/financial-templates.yaml');
 * await loadGraphFromYAMLFile(graph, './data/clients.yaml');
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { YamlValidationError } from './schema.js';
import { DslError } from '../helpers/errors.js';

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlLoadError extends DslError {
  constructor(message: string, readonly filePath?: string | undefined) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parsuje YAML řetězec. Prázdný dokument je chyba.
 *
 * @throws {YamlLoadError} Při syntaktické chybě nebo prázdném vstupu
 */
export function parseYamlDocument(yamlContent: string): unknown {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }
  return parsed;
}

/**
 * Přečte soubor a předá jeho obsah `load`. Chyby čtení, syntaxe i validace
 * vrací jako YamlLoadError s cestou k souboru.
 */
export async function loadYamlFile<T>(
  filePath: string,
  load: (content: string) => T,
): Promise<T> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return load(content);
  } catch (err) {
    if (err instanceof YamlLoadError || err instanceof YamlValidationError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}
