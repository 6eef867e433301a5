import { describe, expect, it } from 'vitest';
import { CliUsageError, HELP_TEXT, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('should require --input', () => {
    expect(() => parseArgs([])).toThrow(CliUsageError);
    expect(() => parseArgs([])).toThrow('Missing required option --input');
  });

  it('should return help before validating anything else', () => {
    expect(parseArgs(['--bogus', '--help'])).toEqual({ kind: 'help' });
  });

  it('should treat -h as a value when it follows a value flag', () => {
    expect(parseArgs(['--input', 'g.txt', '--species', '-h'])).toEqual({
      kind: 'run',
      input: 'g.txt',
      configPath: undefined,
      overrides: { output: { species: '-h' } },
    });
  });

  it('should return help when --help follows a flag missing its value', () => {
    expect(parseArgs(['--input', '--help'])).toEqual({ kind: 'help' });
  });

  it('should parse a minimal command line', () => {
    expect(parseArgs(['--input', 'genes.txt'])).toEqual({
      kind: 'run',
      input: 'genes.txt',
      configPath: undefined,
      overrides: {},
    });
  });

  it('should map flags onto configuration sections', () => {
    const parsed = parseArgs([
      '-i',
      'chr1.txt',
      '-o',
      'out',
      '--species',
      'Hs',
      '--window-size',
      '50',
      '--step-size',
      '10',
      '--email',
      'test@example.org',
      '--wait',
      '0.5',
      '--timeout',
      '30',
      '--retries',
      '5',
      '--pval-threshold',
      '0.05',
      '--max-clusters',
      '4',
      '--wsdl-url',
      'https://david.example.org/service?wsdl',
      '--endpoint',
      'https://david.example.org/service',
      '--no-plots',
      '--log',
      'debug',
      '--config',
      'scan.toml',
    ]);

    expect(parsed).toEqual({
      kind: 'run',
      input: 'chr1.txt',
      configPath: 'scan.toml',
      overrides: {
        scan: { window_size: 50, step_size: 10, pval_threshold: 0.05, max_clusters: 4 },
        service: {
          email: 'test@example.org',
          wait_seconds: 0.5,
          timeout_seconds: 30,
          retries: 5,
          wsdl_url: 'https://david.example.org/service?wsdl',
          endpoint: 'https://david.example.org/service',
        },
        output: { outdir: 'out', species: 'Hs', charts: false },
        logging: { level: 'debug' },
      },
    });
  });

  it('should reject non-numeric values for numeric flags', () => {
    expect(() => parseArgs(['--input', 'g.txt', '--window-size', 'wide'])).toThrow(
      "Option --window-size expects a number, got 'wide'"
    );
    expect(() => parseArgs(['--input', 'g.txt', '--wait', ''])).toThrow(
      "Option --wait expects a number, got ''"
    );
  });

  it('should accept negative numbers so validation can report them', () => {
    const parsed = parseArgs(['--input', 'g.txt', '--wait', '-1']);
    expect(parsed.kind === 'run' ? parsed.overrides.service?.wait_seconds : undefined).toBe(-1);
  });

  it('should reject unknown options', () => {
    try {
      parseArgs(['--input', 'g.txt', '--window', '5']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CliUsageError);
      if (error instanceof CliUsageError) {
        expect(error.message).toBe("Unknown option '--window'");
        expect(error.flag).toBe('--window');
      }
    }
  });

  it('should reject stray arguments', () => {
    expect(() => parseArgs(['genes.txt'])).toThrow("Unexpected argument 'genes.txt'");
  });

  it('should reject a flag without a value', () => {
    expect(() => parseArgs(['--input'])).toThrow('Option --input requires a value');
    expect(() => parseArgs(['--input', '--no-plots'])).toThrow('Option --input requires a value');
    expect(() => parseArgs(['--input', '-o', 'out'])).toThrow('Option --input requires a value');
    expect(() => parseArgs(['-o', '-i', 'g.txt'])).toThrow('Option -o requires a value');
  });

  it('should reject unknown log levels', () => {
    expect(() => parseArgs(['--input', 'g.txt', '--log', 'verbose'])).toThrow(
      "Option --log expects one of debug, info, warn, error, got 'verbose'"
    );
  });

  it('should let the last occurrence of a flag win', () => {
    const parsed = parseArgs(['--input', 'a.txt', '--input', 'b.txt']);
    expect(parsed.kind === 'run' ? parsed.input : undefined).toBe('b.txt');
  });
});

describe('HELP_TEXT', () => {
  it('should document every option', () => {
    for (const flag of [
      '--input',
      '--outdir',
      '--species',
      '--window-size',
      '--step-size',
      '--email',
      '--wait',
      '--timeout',
      '--retries',
      '--pval-threshold',
      '--max-clusters',
      '--wsdl-url',
      '--endpoint',
      '--no-plots',
      '--log',
      '--config',
      '--help',
    ]) {
      expect(HELP_TEXT).toContain(flag);
    }
  });
});
