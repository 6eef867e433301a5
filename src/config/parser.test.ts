import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigParseError, DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Config Parser', () => {
  describe('valid TOML parsing', () => {
    it('should parse empty TOML to default config', () => {
      expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
    });

    it('should parse a complete configuration', () => {
      const toml = `
[scan]
window_size = 50
step_size = 10
max_clusters = 5
pval_threshold = 0.05

[service]
email = "researcher@example.org"
wsdl_url = "https://david.example.org/service?wsdl"
endpoint = "https://david.example.org/soap/"
timeout_seconds = 30
retries = 4
wait_seconds = 2.5

[output]
outdir = "scan-out"
species = "PAO1"
charts = false

[logging]
level = "debug"
`;
      expect(parseConfig(toml)).toEqual({
        scan: { window_size: 50, step_size: 10, max_clusters: 5, pval_threshold: 0.05 },
        service: {
          email: 'researcher@example.org',
          wsdl_url: 'https://david.example.org/service?wsdl',
          endpoint: 'https://david.example.org/soap/',
          timeout_seconds: 30,
          retries: 4,
          wait_seconds: 2.5,
        },
        output: { outdir: 'scan-out', species: 'PAO1', charts: false },
        logging: { level: 'debug' },
      });
    });

    it('should merge partial sections with defaults', () => {
      const config = parseConfig(`
[scan]
step_size = 5
`);
      expect(config.scan).toEqual({ ...DEFAULT_CONFIG.scan, step_size: 5 });
      expect(config.service).toEqual(DEFAULT_CONFIG.service);
    });

    it('should ignore unknown keys and sections', () => {
      const config = parseConfig(`
[scan]
colour = "blue"

[extras]
anything = 1
`);
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should not share default objects between results', () => {
      const first = parseConfig('');
      first.scan.window_size = 7;
      expect(parseConfig('').scan.window_size).toBe(100);
    });
  });

  describe('invalid input', () => {
    it('should reject malformed TOML', () => {
      expect(() => parseConfig('[scan\nwindow_size = 1')).toThrow(ConfigParseError);
      expect(() => parseConfig('[scan\nwindow_size = 1')).toThrow('Invalid TOML syntax');
    });

    it('should reject a string where a number is expected', () => {
      expect(() => parseConfig('[scan]\nwindow_size = "100"')).toThrow(
        "Invalid type for 'scan.window_size': expected number, got string"
      );
    });

    it('should reject a number where a boolean is expected', () => {
      expect(() => parseConfig('[output]\ncharts = 1')).toThrow(
        "Invalid type for 'output.charts': expected boolean, got number"
      );
    });

    it('should reject a section that is not a table', () => {
      expect(() => parseConfig('scan = 3')).toThrow(
        "Invalid type for 'scan': expected table, got number"
      );
    });

    it('should reject an unknown log level', () => {
      expect(() => parseConfig('[logging]\nlevel = "verbose"')).toThrow(
        "Invalid value for 'logging.level'"
      );
    });
  });

  describe('property-based', () => {
    it('should round-trip any positive window and step size', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 100_000 }), fc.integer({ min: 1, max: 1000 }), (w, s) => {
          const config = parseConfig(`[scan]\nwindow_size = ${String(w)}\nstep_size = ${String(s)}\n`);
          expect(config.scan.window_size).toBe(w);
          expect(config.scan.step_size).toBe(s);
        })
      );
    });
  });
});
