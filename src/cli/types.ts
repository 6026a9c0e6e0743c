/**
 * CLI typy pro kg-reasoner.
 */

/** Podporované výstupní formáty */
export type OutputFormat = 'json' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'pretty'];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  GenerationFailed: 5,
  EvaluationMismatch: 6
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

export type AuditAdapterType = 'none' | 'memory' | 'sqlite';

/** CLI konfigurace (z konfiguračního souboru) */
export interface CliConfig {
  graph: {
    /** Soubory grafu (.triples, .yaml), relativní k pracovnímu adresáři */
    files: string[];
  };
  templates: {
    files: string[];
  };
  completion: {
    baseUrl: string;
    model: string;
    /** Proměnná prostředí s API klíčem */
    apiKeyEnv: string;
    /** Timeout jednoho volání ("30s", "1500ms") */
    timeout: string;
    maxRetries: number;
    systemPrompt?: string;
  };
  generation: {
    maxTokens: number;
    temperature: number;
  };
  retrieval: {
    maxGroups: number;
  };
  audit: {
    adapter: AuditAdapterType;
    path?: string;
  };
  output: {
    format: OutputFormat;
    colors: boolean;
  };
}

/** Výchozí CLI konfigurace */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  graph: {
    files: ['./data/demo-graph.triples']
  },
  templates: {
    files: ['./data/financial-templates.yaml']
  },
  completion: {
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    apiKeyEnv: 'OPENAI_API_KEY',
    timeout: '30s',
    maxRetries: 2
  },
  generation: {
    maxTokens: 512,
    temperature: 0
  },
  retrieval: {
    maxGroups: 3
  },
  audit: {
    adapter: 'none'
  },
  output: {
    format: 'pretty',
    colors: true
  }
};

/** Formátovatelná data pro výstup */
export type FormattableData =
  | { type: 'answer'; data: import('../types/evidence.js').Answer; meta?: Record<string, unknown> }
  | { type: 'groups'; data: readonly import('../types/template.js').FactGroup[]; meta?: Record<string, unknown> }
  | { type: 'query'; data: import('../types/template.js').QueryResult; meta?: Record<string, unknown> }
  | { type: 'evaluation'; data: import('../evaluation/compliance-evaluator.js').ComplianceEvaluation; meta?: Record<string, unknown> }
  | { type: 'validation'; data: ValidationReport; meta?: Record<string, unknown> }
  | { type: 'message'; data: unknown; meta?: Record<string, unknown> }
  | { type: 'error'; data: unknown; meta?: Record<string, unknown> };

/** Formátter jednoho výstupního formátu */
export interface OutputFormatter {
  format(data: FormattableData): string;
}

export type ValidatedFileType = 'templates' | 'graph';

/** Výsledek validace jednoho souboru */
export interface ValidationReport {
  file: string;
  type: ValidatedFileType;
  valid: boolean;
  /** Počet šablon, nebo počet příkazů grafu */
  count: number;
  errors: string[];
}
