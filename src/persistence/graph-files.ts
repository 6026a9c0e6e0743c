/**
 * Načítání a ukládání grafu ze souborů.
 *
 * Přípona určuje formát: `.yaml`/`.yml` je seed pro YAML loader,
 * cokoli jiného je textový formát trojic.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import type { KnowledgeGraph } from '../core/knowledge-graph.js';
import type { LoadSummary } from '../types/graph.js';
import { ReasonerError } from '../core/errors.js';
import { loadGraphFromYAMLFile } from '../dsl/yaml/graph-loader.js';
import { TripleParseError } from './triple-format.js';

export class GraphFileError extends ReasonerError {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: ErrorOptions) {
    super(`${filePath}: ${message}`, options);
    this.name = 'GraphFileError';
    this.filePath = filePath;
  }
}

export type GraphFileFormat = 'yaml' | 'triples';

export function detectGraphFormat(filePath: string): GraphFileFormat {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'triples';
}

/**
 * Načte soubor do grafu. Relace dostanou cestu k souboru jako zdroj.
 *
 * @throws {GraphFileError} Při chybě čtení nebo syntaxe trojic
 * @throws {YamlLoadError} Při chybě YAML seedu
 * @throws {GraphIntegrityError} Když obsah odporuje grafu
 */
export async function loadGraphFile(graph: KnowledgeGraph, filePath: string): Promise<LoadSummary> {
  if (detectGraphFormat(filePath) === 'yaml') {
    return loadGraphFromYAMLFile(graph, filePath);
  }

  let content: string;
  try {
    content = await readFile(resolve(filePath), 'utf-8');
  } catch (err) {
    throw new GraphFileError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      { cause: err },
    );
  }

  try {
    return graph.load(content, { source: filePath });
  } catch (err) {
    if (err instanceof TripleParseError) {
      throw new GraphFileError(err.message, filePath, { cause: err });
    }
    throw err;
  }
}

/**
 * Zapíše graf ve formátu trojic. Nadřazené adresáře se vytvoří.
 *
 * @returns Absolutní cesta k zapsanému souboru
 */
export async function saveGraphFile(graph: KnowledgeGraph, filePath: string): Promise<string> {
  const absolutePath = resolve(filePath);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, graph.dump(), 'utf-8');
  return absolutePath;
}
