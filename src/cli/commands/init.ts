/**
 * Příkaz init pro CLI.
 * Inicializuje konfigurační soubor .kg-reasoner.json v aktuálním adresáři.
 */

import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { AuditAdapterType, GlobalOptions, CliConfig } from '../types.js';
import { DEFAULT_CLI_CONFIG, ExitCode } from '../types.js';
import { CONFIG_FILENAME } from '../utils/config.js';
import { printData, print, colorize, success } from '../utils/output.js';
import { CliError } from '../utils/errors.js';

/** Options pro příkaz init */
export interface InitCommandOptions extends GlobalOptions {
  /** Přepsat existující konfiguraci */
  force: boolean;
  model: string | undefined;
  baseUrl: string | undefined;
  /** Proměnná prostředí s API klíčem */
  apiKeyEnv: string | undefined;
  auditAdapter: AuditAdapterType | undefined;
  auditPath: string | undefined;
}

/** Výstup příkazu init */
interface InitOutput {
  path: string;
  created: boolean;
  config: CliConfig;
}

/**
 * Vytvoří konfiguraci na základě options.
 */
export function buildConfig(options: InitCommandOptions): CliConfig {
  const config: CliConfig = {
    ...DEFAULT_CLI_CONFIG,
    completion: {
      ...DEFAULT_CLI_CONFIG.completion,
      model: options.model ?? DEFAULT_CLI_CONFIG.completion.model,
      baseUrl: options.baseUrl ?? DEFAULT_CLI_CONFIG.completion.baseUrl,
      apiKeyEnv: options.apiKeyEnv ?? DEFAULT_CLI_CONFIG.completion.apiKeyEnv
    },
    audit: {
      adapter: options.auditAdapter ?? DEFAULT_CLI_CONFIG.audit.adapter,
      ...(options.auditPath !== undefined && { path: options.auditPath })
    }
  };

  // Výchozí cesta pro sqlite
  if (config.audit.adapter === 'sqlite' && !config.audit.path) {
    config.audit.path = './data/audit.db';
  }

  return config;
}

/**
 * Formátuje výstup pro pretty formát.
 */
function formatPrettyOutput(output: InitOutput): string {
  const { config } = output;
  const lines: string[] = [];

  lines.push(success('Configuration file created successfully'));
  lines.push('');
  lines.push(colorize('Path:', 'cyan') + ` ${output.path}`);
  lines.push('');
  lines.push(colorize('Configuration:', 'cyan'));
  lines.push(colorize('  Graph:', 'dim'));
  lines.push(`    Files: ${config.graph.files.join(', ')}`);
  lines.push(colorize('  Templates:', 'dim'));
  lines.push(`    Files: ${config.templates.files.join(', ')}`);
  lines.push(colorize('  Completion:', 'dim'));
  lines.push(`    Model: ${config.completion.model}`);
  lines.push(`    Base URL: ${config.completion.baseUrl}`);
  lines.push(`    API key from: $${config.completion.apiKeyEnv}`);
  lines.push(colorize('  Audit:', 'dim'));
  lines.push(`    Adapter: ${config.audit.adapter}`);
  if (config.audit.path) {
    lines.push(`    Path: ${config.audit.path}`);
  }

  return lines.join('\n');
}

/**
 * Akce příkazu init.
 */
export async function initCommand(options: InitCommandOptions): Promise<void> {
  const configPath = join(process.cwd(), CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    throw new CliError(
      `Configuration file already exists: ${configPath}\nUse --force to overwrite.`,
      ExitCode.GeneralError
    );
  }

  const config = buildConfig(options);
  writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  const output: InitOutput = {
    path: configPath,
    created: true,
    config
  };

  if (options.format === 'json') {
    printData({
      type: 'message',
      data: output
    });
  } else {
    print(formatPrettyOutput(output));
  }
}
