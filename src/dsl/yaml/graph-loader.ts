/**
 * YAML seed files for the knowledge graph.
 *
 * The seed is converted into a triple document and loaded through
 * {@link KnowledgeGraph.load}, so a file is applied entirely or not at all.
 */

import type { KnowledgeGraph } from '../../core/knowledge-graph.js';
import type { LoadSummary } from '../../types/graph.js';
import type { TripleDocument } from '../../persistence/triple-format.js';
import { validateGraphSeed } from './schema.js';
import { loadYamlFile, parseYamlDocument } from './loader.js';

export interface GraphSeedOptions {
  /** Source label stored on every relation (default: 'yaml') */
  source?: string;
}

/**
 * Parses a YAML graph seed without touching a graph.
 *
 * @throws {YamlLoadError} On a syntax error or an empty document
 * @throws {YamlValidationError} When the seed is malformed
 */
export function parseGraphYAML(yamlContent: string): TripleDocument {
  return validateGraphSeed(parseYamlDocument(yamlContent));
}

/**
 * Loads a YAML graph seed into `graph`.
 *
 * @throws {GraphIntegrityError} When the seed contradicts the graph
 */
export function loadGraphFromYAML(
  graph: KnowledgeGraph,
  yamlContent: string,
  options: GraphSeedOptions = {},
): LoadSummary {
  return graph.load(parseGraphYAML(yamlContent), { source: options.source ?? 'yaml' });
}

export async function loadGraphFromYAMLFile(
  graph: KnowledgeGraph,
  filePath: string,
  options: GraphSeedOptions = {},
): Promise<LoadSummary> {
  const document = await loadYamlFile(filePath, parseGraphYAML);
  return graph.load(document, { source: options.source ?? filePath });
}
