import { fileURLToPath } from 'node:url';
import { DEFAULT_CLI_CONFIG, type CliConfig, type GlobalOptions } from '../../src/cli/types.js';

export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

/** Konfigurace nad fixture soubory, bez auditu a bez API klíče */
export function createTestCliConfig(overrides: Partial<CliConfig> = {}): CliConfig {
  return {
    ...DEFAULT_CLI_CONFIG,
    graph: { files: [fixturePath('graph.triples')] },
    templates: { files: [fixturePath('templates.yaml')] },
    completion: { ...DEFAULT_CLI_CONFIG.completion, apiKeyEnv: 'KG_REASONER_TEST_API_KEY', timeout: '2s' },
    audit: { adapter: 'none' },
    ...overrides,
  };
}

export const GLOBAL_OPTIONS: GlobalOptions = {
  format: 'json',
  quiet: false,
  noColor: true,
  config: undefined,
};
