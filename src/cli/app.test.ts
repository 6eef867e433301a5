/**
 * Tests for the window-enrich command.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { access, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { DavidSoapPort } from '../enrichment/david-service.js';
import { runCli } from './app.js';
import { HELP_TEXT } from './args.js';

interface LoggedEvent {
  level: string;
  event: string;
  data?: Record<string, unknown>;
}

function isLoggedEvent(value: unknown): value is LoggedEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'event' in value &&
    typeof value.event === 'string' &&
    'level' in value &&
    typeof value.level === 'string'
  );
}

function fakePort(authResponse: unknown = 'true'): DavidSoapPort {
  return {
    authenticate: () => Promise.resolve(authResponse),
    addList: () => Promise.resolve('0.0'),
    getTermClusterReport: () =>
      Promise.resolve([
        {
          score: '2.75',
          simpleChartRecords: [
            {
              categoryName: 'KEGG_PATHWAY',
              termName: 'hsa03010:Ribosome',
              listHits: '9',
              ease: '0.0005',
            },
          ],
        },
      ]),
  };
}

describe('runCli', () => {
  let testDir: string;
  let events: LoggedEvent[];
  let stdout: string[];

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'window-enrich-cli-'));
    events = [];
    stdout = [];
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function logSink(line: string): void {
    const entry: unknown = JSON.parse(line);
    if (isLoggedEvent(entry)) {
      events.push(entry);
    }
  }

  async function writeGenes(count: number): Promise<string> {
    const file = join(testDir, 'genes.txt');
    const ids = Array.from({ length: count }, (_, i) => String(5000 + i));
    await writeFile(file, ids.join('\n') + '\n');
    return file;
  }

  it('should print help and exit 0', async () => {
    const code = await runCli(['--help'], { logSink, stdout: (text) => stdout.push(text), env: {} });

    expect(code).toBe(0);
    expect(stdout).toEqual([HELP_TEXT]);
    expect(events).toEqual([]);
  });

  it('should fail with a usage error when --input is missing', async () => {
    const code = await runCli([], { logSink, env: {} });

    expect(code).toBe(1);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      level: 'error',
      event: 'run_failed',
      data: { error: 'CliUsageError', message: 'Missing required option --input' },
    });
  });

  it('should fail before connecting when no email is configured', async () => {
    const input = await writeGenes(120);
    const portFactory = vi.fn(() => Promise.resolve(fakePort()));

    const code = await runCli(['--input', input, '--outdir', testDir], { logSink, env: {}, portFactory });

    expect(code).toBe(1);
    expect(portFactory).not.toHaveBeenCalled();
    expect(events[0]?.data?.['error']).toBe('ConfigValidationError');
  });

  it('should fail before connecting when genes do not fill a window', async () => {
    const input = await writeGenes(80);
    const portFactory = vi.fn(() => Promise.resolve(fakePort()));

    const code = await runCli(['--input', input, '--outdir', testDir], {
      logSink,
      env: { DAVID_EMAIL: 'test@example.org' },
      portFactory,
    });

    expect(code).toBe(1);
    expect(portFactory).not.toHaveBeenCalled();
    expect(events[events.length - 1]).toMatchObject({
      event: 'run_failed',
      data: {
        error: 'WindowValidationError',
        message: 'Input has fewer genes (80) than the window size (100)',
      },
    });
  });

  it('should fail when DAVID rejects the email', async () => {
    const input = await writeGenes(120);

    const code = await runCli(['--input', input, '--outdir', testDir, '--email', 'test@example.org'], {
      logSink,
      env: {},
      portFactory: () => Promise.resolve(fakePort('false')),
    });

    expect(code).toBe(1);
    expect(events[events.length - 1]?.data?.['error']).toBe('DavidAuthenticationError');
  });

  it('should scan, write the workbook and report completion', async () => {
    const input = await writeGenes(150);
    const outdir = join(testDir, 'results');
    const sleep = vi.fn((_ms: number) => Promise.resolve());

    const code = await runCli(
      ['--input', input, '--outdir', outdir, '--species', 'Hs', '--wait', '0'],
      {
        logSink,
        env: { DAVID_EMAIL: 'test@example.org' },
        portFactory: () => Promise.resolve(fakePort()),
        sleep,
        now: () => new Date(2024, 5, 3),
      }
    );

    expect(code).toBe(0);
    const workbook = join(outdir, 'Hs_DAVID_enrichment_2024-06-03.xlsx');
    await expect(access(workbook)).resolves.toBeUndefined();
    await expect(access(join(outdir, '26to126_fullReport.txt'))).resolves.toBeUndefined();
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([0, 0, 0]);

    const names = events.map((e) => e.event);
    expect(names[0]).toBe('service_connected');
    expect(names.filter((n) => n === 'window_completed')).toHaveLength(3);
    expect(events[events.length - 1]).toMatchObject({
      level: 'info',
      event: 'run_completed',
      data: { workbook, windows: 3, failedWindows: 0, significantWindows: 3 },
    });
  });
});
