import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

import * as fs from 'node:fs';
import { buildConfig, initCommand, type InitCommandOptions } from '../../../../src/cli/commands/init.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';
import { CliError } from '../../../../src/cli/utils/errors.js';
import { DEFAULT_CLI_CONFIG } from '../../../../src/cli/types.js';

function options(overrides: Partial<InitCommandOptions> = {}): InitCommandOptions {
  return {
    format: 'pretty',
    quiet: false,
    noColor: true,
    config: undefined,
    force: false,
    model: undefined,
    baseUrl: undefined,
    apiKeyEnv: undefined,
    auditAdapter: undefined,
    auditPath: undefined,
    ...overrides,
  };
}

describe('buildConfig', () => {
  it('returns the defaults without options', () => {
    expect(buildConfig(options())).toEqual(DEFAULT_CLI_CONFIG);
  });

  it('applies completion overrides', () => {
    const config = buildConfig(options({ model: 'local-model', baseUrl: 'http://localhost:8080/v1', apiKeyEnv: 'LOCAL_KEY' }));

    expect(config.completion).toEqual({
      ...DEFAULT_CLI_CONFIG.completion,
      model: 'local-model',
      baseUrl: 'http://localhost:8080/v1',
      apiKeyEnv: 'LOCAL_KEY',
    });
  });

  it('gives sqlite a default path', () => {
    expect(buildConfig(options({ auditAdapter: 'sqlite' })).audit).toEqual({
      adapter: 'sqlite',
      path: './data/audit.db',
    });
    expect(buildConfig(options({ auditAdapter: 'sqlite', auditPath: './audit.sqlite' })).audit.path).toBe(
      './audit.sqlite',
    );
  });

  it('does not share nested objects with the defaults', () => {
    const config = buildConfig(options({ auditAdapter: 'sqlite' }));

    expect(DEFAULT_CLI_CONFIG.audit).toEqual({ adapter: 'none' });
    expect(config.audit).not.toBe(DEFAULT_CLI_CONFIG.audit);
  });
});

describe('initCommand', () => {
  const configPath = join(process.cwd(), '.kg-reasoner.json');
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.mocked(fs.existsSync).mockReset();
    vi.mocked(fs.writeFileSync).mockReset();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setOutputOptions({ format: 'pretty', quiet: false, noColor: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes the configuration to the working directory', async () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    await initCommand(options({ auditAdapter: 'memory' }));

    const expected = { ...DEFAULT_CLI_CONFIG, audit: { adapter: 'memory' } };
    expect(fs.writeFileSync).toHaveBeenCalledWith(
      configPath,
      JSON.stringify(expected, null, 2) + '\n',
      'utf-8',
    );
  });

  it('prints a summary in pretty format', async () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    await initCommand(options({ auditAdapter: 'sqlite' }));

    const output = String(consoleLogSpy.mock.calls[0]?.[0]);
    const lines = output.split('\n');
    expect(lines[0]).toBe('✓ Configuration file created successfully');
    expect(lines).toContain(`Path: ${configPath}`);
    expect(lines).toContain('    Files: ./data/demo-graph.triples');
    expect(lines).toContain('    API key from: $OPENAI_API_KEY');
    expect(lines).toContain('    Adapter: sqlite');
    expect(lines[lines.length - 1]).toBe('    Path: ./data/audit.db');
  });

  it('prints the result as JSON', async () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    setOutputOptions({ format: 'json' });

    await initCommand(options({ format: 'json' }));

    const printed: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ success: true, message: { path: configPath, created: true } });
  });

  it('refuses to overwrite without --force', async () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);

    const error = await initCommand(options()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CliError);
    expect(error instanceof CliError && error.exitCode).toBe(1);
    expect(error instanceof Error && error.message).toBe(
      `Configuration file already exists: ${configPath}\nUse --force to overwrite.`,
    );
    expect(fs.writeFileSync).not.toHaveBeenCalled();
  });

  it('overwrites with --force', async () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);

    await initCommand(options({ force: true }));

    expect(fs.writeFileSync).toHaveBeenCalledTimes(1);
  });
});
