export { parseYamlDocument, loadYamlFile, YamlLoadError } from './loader.js';
export { validateTemplate, validateGraphSeed, parseScalar, YamlValidationError } from './schema.js';
export { loadTemplatesFromYAML, loadTemplatesFromFile } from './template-loader.js';
export {
  parseGraphYAML,
  loadGraphFromYAML,
  loadGraphFromYAMLFile,
  type GraphSeedOptions,
} from './graph-loader.js';
