/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import type { AuditAdapterType, GlobalOptions, OutputFormat, ValidatedFileType } from './types.js';
import { OUTPUT_FORMATS } from './types.js';
import { loadConfig } from './utils/config.js';
import { setOutputOptions, printError } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { askCommand } from './commands/ask.js';
import { retrieveCommand } from './commands/retrieve.js';
import { queryCommand } from './commands/query.js';
import { evaluateCommand } from './commands/evaluate.js';
import { validateCommand } from './commands/validate.js';
import { initCommand } from './commands/init.js';

/** CLI instance */
const cli = cac('kg-reasoner');

type RawOptions = Record<string, unknown>;

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery, musíme to udělat sami.
 */
let _actionPromise: Promise<void> | undefined;

/** Obalí async action handler; chyby vypíše a ukončí proces s exit kódem. */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args).catch((err: unknown) => {
      printError(formatError(err));
      process.exit(getExitCode(err));
    });
  };
}

// ---------------------------------------------------------------------------
// Čtení options
// ---------------------------------------------------------------------------

function optString(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : String(value);
}

function optBoolean(options: RawOptions, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

function optNumber(options: RawOptions, key: string): number | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  const num = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(num)) {
    throw new InvalidArgumentsError(`--${key} must be a number, got ${String(value)}`);
  }
  return num;
}

function optStrings(options: RawOptions, key: string): string | string[] | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.map(String) : String(value);
}

function optChoice<T extends string>(options: RawOptions, key: string, allowed: readonly T[]): T | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new InvalidArgumentsError(`--${key} must be one of ${allowed.join(', ')}, got ${String(value)}`);
  }
  return match;
}

/** Zpracuje globální options */
function processGlobalOptions(options: RawOptions): GlobalOptions {
  const configPath = optString(options, 'config');
  const config = loadConfig(configPath);

  const format: OutputFormat = optChoice(options, 'format', OUTPUT_FORMATS) ?? config.output.format;
  const quiet = optBoolean(options, 'quiet') ?? false;
  // --no-color nastaví color: false
  const noColor = optBoolean(options, 'color') === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    format,
    quiet,
    noColor,
    config: configPath
  };
}

// ---------------------------------------------------------------------------
// Registrace příkazů
// ---------------------------------------------------------------------------

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`kg-reasoner v${version}`);
  });
}

function registerAskCommand(): void {
  cli
    .command('ask <question>', 'Answer a question from the knowledge graph')
    .option('--hide <predicates>', 'Predicates left out of the prompt (comma-separated)')
    .option('--json', 'Ask the model for a JSON response')
    .option('-t, --timeout <duration>', 'Completion timeout, e.g. 30s')
    .option('-g, --max-groups <n>', 'Maximum number of fact groups')
    .action(tracked(async (question: string, options: RawOptions) => {
      const globalOptions = processGlobalOptions(options);
      const config = loadConfig(globalOptions.config);
      await askCommand(question, {
        ...globalOptions,
        hide: optString(options, 'hide'),
        json: optBoolean(options, 'json') ?? false,
        timeout: optString(options, 'timeout'),
        maxGroups: optNumber(options, 'maxGroups')
      }, config);
    }));
}

function registerRetrieveCommand(): void {
  cli
    .command('retrieve <question>', 'Show the fact groups a question would be answered from')
    .option('-g, --max-groups <n>', 'Maximum number of fact groups')
    .action(tracked(async (question: string, options: RawOptions) => {
      const globalOptions = processGlobalOptions(options);
      const config = loadConfig(globalOptions.config);
      await retrieveCommand(question, {
        ...globalOptions,
        maxGroups: optNumber(options, 'maxGroups')
      }, config);
    }));
}

function registerQueryCommand(): void {
  cli
    .command('query <template>', 'Run a query template with explicit bindings')
    .option('-b, --bind <binding>', 'Parameter binding name=value (repeatable)')
    .action(tracked(async (template: string, options: RawOptions) => {
      const globalOptions = processGlobalOptions(options);
      const config = loadConfig(globalOptions.config);
      await queryCommand(template, {
        ...globalOptions,
        bind: optStrings(options, 'bind')
      }, config);
    }));
}

function registerEvaluateCommand(): void {
  cli
    .command('evaluate <...transactions>', 'Compare the model compliance verdict with the graph')
    .option('-s, --strict', 'Exit non-zero unless every verdict is confirmed')
    .action(tracked(async (transactions: string[], options: RawOptions) => {
      const globalOptions = processGlobalOptions(options);
      const config = loadConfig(globalOptions.config);
      await evaluateCommand(transactions, {
        ...globalOptions,
        strict: optBoolean(options, 'strict') ?? false
      }, config);
    }));
}

function registerValidateCommand(): void {
  const types: readonly ValidatedFileType[] = ['templates', 'graph'];
  cli
    .command('validate <...files>', 'Validate template and graph files')
    .option('--type <type>', 'File type: templates, graph (detected by default)')
    .action(tracked(async (files: string[], options: RawOptions) => {
      const globalOptions = processGlobalOptions(options);
      await validateCommand(files, {
        ...globalOptions,
        type: optChoice(options, 'type', types)
      });
    }));
}

function registerInitCommand(): void {
  const adapters: readonly AuditAdapterType[] = ['none', 'memory', 'sqlite'];
  cli
    .command('init', 'Create a .kg-reasoner.json configuration file')
    .option('--force', 'Overwrite an existing configuration')
    .option('--model <model>', 'Completion model')
    .option('--base-url <url>', 'Completion API base URL')
    .option('--api-key-env <name>', 'Environment variable holding the API key')
    .option('--audit-adapter <adapter>', 'Audit storage: none, memory, sqlite')
    .option('--audit-path <path>', 'Audit database path')
    .action(tracked(async (options: RawOptions) => {
      const globalOptions = processGlobalOptions(options);
      await initCommand({
        ...globalOptions,
        force: optBoolean(options, 'force') ?? false,
        model: optString(options, 'model'),
        baseUrl: optString(options, 'baseUrl'),
        apiKeyEnv: optString(options, 'apiKeyEnv'),
        auditAdapter: optChoice(options, 'auditAdapter', adapters),
        auditPath: optString(options, 'auditPath')
      });
    }));
}

let registered = false;

/** Inicializuje a spustí CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  if (!registered) {
    registerGlobalOptions();
    registerVersionCommand();
    registerAskCommand();
    registerRetrieveCommand();
    registerQueryCommand();
    registerEvaluateCommand();
    registerValidateCommand();
    registerInitCommand();

    cli.help();
    cli.version(version);
    registered = true;
  }

  _actionPromise = undefined;
  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

export { cli };
