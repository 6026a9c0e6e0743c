/**
 * Příkaz validate pro CLI.
 * Ověří soubory šablon a grafu bez spuštění session.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { GlobalOptions, ValidatedFileType, ValidationReport } from '../types.js';
import { KnowledgeGraph } from '../../core/knowledge-graph.js';
import { TemplateRegistry } from '../../core/template-registry.js';
import { ReasonerError } from '../../core/errors.js';
import { detectGraphFormat } from '../../persistence/graph-files.js';
import { parseTriples } from '../../persistence/triple-format.js';
import { parseYamlDocument, YamlLoadError } from '../../dsl/yaml/loader.js';
import { isPlainObject } from '../../dsl/yaml/schema.js';
import { parseGraphYAML } from '../../dsl/yaml/graph-loader.js';
import { loadTemplatesFromYAML } from '../../dsl/yaml/template-loader.js';
import { FileNotFoundError, InvalidArgumentsError, ValidationError } from '../utils/errors.js';
import { printData } from '../utils/output.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions {
  /** Vynucený typ souboru; jinak se odhadne */
  type: ValidatedFileType | undefined;
}

/**
 * Odhadne typ souboru: trojice jsou vždy graf, YAML s `entities`
 * nebo `relations` je seed grafu, ostatní YAML jsou šablony.
 */
export function detectFileType(filePath: string, content: string): ValidatedFileType {
  if (detectGraphFormat(filePath) === 'triples') {
    return 'graph';
  }
  let parsed: unknown;
  try {
    parsed = parseYamlDocument(content);
  } catch (err) {
    // Syntaktickou chybu ohlásí až validace šablon
    if (err instanceof YamlLoadError) return 'templates';
    throw err;
  }
  return isPlainObject(parsed) && ('entities' in parsed || 'relations' in parsed) ? 'graph' : 'templates';
}

function validateContent(filePath: string, content: string, type: ValidatedFileType): { count: number } {
  if (type === 'templates') {
    const templates = loadTemplatesFromYAML(content);
    new TemplateRegistry().registerAll(templates);
    return { count: templates.length };
  }

  const document = detectGraphFormat(filePath) === 'yaml' ? parseGraphYAML(content) : parseTriples(content);
  new KnowledgeGraph().load(document, { source: filePath });
  return { count: document.entities.length + document.triples.length };
}

/**
 * Validuje jeden soubor. Chyby formátu a integrity vrací v reportu.
 */
export function validateFile(file: string, type?: ValidatedFileType): ValidationReport {
  const absolutePath = resolve(file);
  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(file);
  }

  const content = readFileSync(absolutePath, 'utf-8');
  const fileType = type ?? detectFileType(absolutePath, content);

  try {
    const { count } = validateContent(absolutePath, content, fileType);
    return { file: absolutePath, type: fileType, valid: true, count, errors: [] };
  } catch (err) {
    if (err instanceof ReasonerError) {
      return { file: absolutePath, type: fileType, valid: false, count: 0, errors: [err.message] };
    }
    throw err;
  }
}

/**
 * Akce příkazu validate.
 */
export async function validateCommand(files: string[], options: ValidateOptions): Promise<ValidationReport[]> {
  if (files.length === 0) {
    throw new InvalidArgumentsError('No files to validate');
  }

  const reports = files.map((file) => validateFile(file, options.type));
  for (const report of reports) {
    printData({ type: 'validation', data: report });
  }

  const errors = reports.flatMap((r) => r.errors.map((e) => `${r.file}: ${e}`));
  if (errors.length > 0) {
    throw new ValidationError(`Validation failed with ${errors.length} error(s)`, errors);
  }
  return reports;
}
