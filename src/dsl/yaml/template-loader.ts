/**
 * YAML loader for query templates.
 *
 * Accepted shapes:
 * - a single template object
 * - a top-level sequence of templates
 * - an object with a `templates` sequence
 *
 * ```yaml
 * templates:
 *   - name: transaction-compliance
 *     params:
 *       - { name: transaction, kind: Transaction }
 *     patterns:
 *       - [$transaction, is_compliant, '?compliant']
 *     requires:
 *       - [$transaction, is_compliant]
 *     keywords: [compliant, compliance]
 * ```
 */

import type { QueryTemplate } from '../../types/template.js';
import { isPlainObject, validateTemplate } from './schema.js';
import { loadYamlFile, parseYamlDocument, YamlLoadError } from './loader.js';

/**
 * Parses YAML text into validated query templates.
 *
 * @throws {YamlLoadError} On a syntax error or an empty document
 * @throws {YamlValidationError} When a template is malformed
 */
export function loadTemplatesFromYAML(yamlContent: string): QueryTemplate[] {
  const parsed = parseYamlDocument(yamlContent);

  if (Array.isArray(parsed)) {
    if (parsed.length === 0) {
      throw new YamlLoadError('YAML array is empty, expected at least one template');
    }
    return parsed.map((item: unknown, i: number) => validateTemplate(item, `templates[${i}]`));
  }

  if (!isPlainObject(parsed)) {
    throw new YamlLoadError(`Expected YAML object or array, got ${typeof parsed}`);
  }

  const templatesField = parsed['templates'];
  if (templatesField !== undefined) {
    if (!Array.isArray(templatesField)) {
      throw new YamlLoadError('"templates" must be an array');
    }
    if (templatesField.length === 0) {
      throw new YamlLoadError('"templates" array is empty, expected at least one template');
    }
    return templatesField.map((item: unknown, i: number) => validateTemplate(item, `templates[${i}]`));
  }

  return [validateTemplate(parsed, 'template')];
}

/**
 * Loads query templates from a YAML file.
 *
 * @throws {YamlLoadError} On read, syntax or validation failure
 */
export async function loadTemplatesFromFile(filePath: string): Promise<QueryTemplate[]> {
  return loadYamlFile(filePath, loadTemplatesFromYAML);
}
