/**
 * CLI chybové třídy.
 */

import { ExitCode } from '../types.js';
import { QueryError } from '../../core/errors.js';
import { GenerationError } from '../../completion/errors.js';
import { DslError } from '../../dsl/helpers/errors.js';
import { TripleParseError } from '../../persistence/triple-format.js';
import { GraphFileError } from '../../persistence/graph-files.js';

/** Základní CLI chyba */
export class CliError extends Error {
  public readonly exitCode: ExitCode;
  public override readonly cause: Error | undefined;

  constructor(message: string, exitCode: ExitCode = ExitCode.GeneralError, cause?: Error) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

/** Chyba validace argumentů */
export class InvalidArgumentsError extends CliError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.InvalidArguments, cause);
    this.name = 'InvalidArgumentsError';
  }
}

/** Chybná konfigurace */
export class ConfigError extends CliError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: Error) {
    super(`Invalid configuration in ${filePath}: ${message}`, ExitCode.InvalidArguments, cause);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/** Soubor nenalezen */
export class FileNotFoundError extends CliError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(`File not found: ${filePath}`, ExitCode.FileNotFound, cause);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
  }
}

/** Neplatný soubor šablon nebo grafu */
export class ValidationError extends CliError {
  public readonly errors: string[];

  constructor(message: string, errors: string[] = [], cause?: Error) {
    super(message, ExitCode.ValidationError, cause);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** Získá exit kód z chyby */
export function getExitCode(error: unknown): ExitCode {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof GenerationError) {
    return ExitCode.GenerationFailed;
  }
  if (error instanceof QueryError) {
    return ExitCode.InvalidArguments;
  }
  if (error instanceof DslError || error instanceof TripleParseError || error instanceof GraphFileError) {
    return ExitCode.ValidationError;
  }
  return ExitCode.GeneralError;
}

/** Formátuje chybu pro výstup */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError && error.errors.length > 0) {
    return error.message + '\n' + error.errors.map((e) => `  ✗ ${e}`).join('\n');
  }
  if (error instanceof GenerationError) {
    const hint = error.retryable ? ' (retryable)' : '';
    return `${error.message}${hint}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
