/**
 * Výstupní utility pro CLI.
 */

import type { OutputFormat, OutputFormatter, FormattableData } from '../types.js';
import type { EvidenceStatus } from '../../types/evidence.js';
import { JsonFormatter } from '../formatters/json-formatter.js';
import { PrettyFormatter } from '../formatters/pretty-formatter.js';

/** Globální nastavení výstupu */
let outputOptions = {
  quiet: false,
  noColor: false,
  format: 'pretty' as OutputFormat
};

/** Nastaví globální options */
export function setOutputOptions(options: Partial<typeof outputOptions>): void {
  outputOptions = { ...outputOptions, ...options };
}

/** Získá aktuální options */
export function getOutputOptions(): typeof outputOptions {
  return { ...outputOptions };
}

/** Detekce podpory barev */
export function supportsColor(): boolean {
  if (outputOptions.noColor) {
    return false;
  }

  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }

  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }

  return process.stdout.isTTY === true;
}

/** ANSI kódy pro barvy */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
} as const;

export type ColorName = keyof typeof colors;

/** Aplikuje barvu na text */
export function colorize(text: string, color: ColorName, enabled: boolean = supportsColor()): string {
  if (!enabled) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

const STATUS_COLORS: Record<EvidenceStatus, ColorName> = {
  answerable: 'green',
  unknown: 'yellow',
  inconclusive: 'magenta'
};

/** Stav evidence velkými písmeny v barvě výsledku (ANSWERABLE, UNKNOWN, INCONCLUSIVE) */
export function statusLabel(status: EvidenceStatus, enabled: boolean = supportsColor()): string {
  return colorize(status.toUpperCase(), STATUS_COLORS[status], enabled);
}

/** Formátuje úspěch */
export function success(message: string): string {
  return colorize('✓', 'green') + ' ' + message;
}

/** Vypíše na stdout */
export function print(message: string): void {
  if (!outputOptions.quiet) {
    console.log(message);
  }
}

/** Vypíše na stderr */
export function printError(message: string): void {
  console.error(message);
}

// JSON je vždy odsazený a bez barev
const FORMATTERS: Record<OutputFormat, (useColors: boolean) => OutputFormatter> = {
  json: () => new JsonFormatter(true),
  pretty: (useColors) => new PrettyFormatter(useColors)
};

/** Vypíše formátovaná data */
export function printData(data: FormattableData): void {
  if (outputOptions.quiet && data.type !== 'error') {
    return;
  }

  const formatter = FORMATTERS[outputOptions.format](supportsColor());
  const output = formatter.format(data);

  if (data.type === 'error') {
    printError(output);
  } else {
    print(output);
  }
}
