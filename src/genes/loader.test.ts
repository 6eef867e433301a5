import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger } from '../utils/logger.js';
import { GeneListError, loadGeneList, parseGeneList } from './loader.js';

describe('parseGeneList', () => {
  it('should keep identifiers in file order', () => {
    expect(parseGeneList('1253\n17\n9001\n')).toEqual({ genes: [1253, 17, 9001], dropped: [] });
  });

  it('should skip comments and blank lines', () => {
    const text = '# chromosome 1\n\n  \n42\n#43\n44\r\n';
    expect(parseGeneList(text)).toEqual({ genes: [42, 44], dropped: [] });
  });

  it('should trim surrounding whitespace', () => {
    expect(parseGeneList('  7 \n\t8\t\n').genes).toEqual([7, 8]);
  });

  it('should drop entries that are not positive integers', () => {
    const text = '10\nthrA\n12.5\n-3\n0\n1e3\n11\n';
    expect(parseGeneList(text)).toEqual({
      genes: [10, 11],
      dropped: ['thrA', '12.5', '-3', '0', '1e3'],
    });
  });

  it('should return an empty list for empty text', () => {
    expect(parseGeneList('')).toEqual({ genes: [], dropped: [] });
  });
});

describe('loadGeneList', () => {
  let testDir: string;
  let lines: string[];
  let logger: Logger;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'window-enrich-genes-'));
    lines = [];
    logger = new Logger({
      component: 'GeneListLoader',
      sink: (line) => {
        lines.push(line);
      },
    });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load a valid file without warnings', async () => {
    const file = join(testDir, 'genes.txt');
    await writeFile(file, '100\n200\n300\n');

    expect(await loadGeneList(file, logger)).toEqual([100, 200, 300]);
    expect(lines).toEqual([]);
  });

  it('should warn once about dropped entries', async () => {
    const file = join(testDir, 'genes.txt');
    await writeFile(file, '100\nabc\n200\nxyz\n');

    expect(await loadGeneList(file, logger)).toEqual([100, 200]);
    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>;
    expect(entry.event).toBe('non_numeric_ids_dropped');
    expect(entry.data).toEqual({ file, count: 2, sample: ['abc', 'xyz'] });
  });

  it('should fail when no valid identifiers remain', async () => {
    const file = join(testDir, 'genes.txt');
    await writeFile(file, '# only comments\nthrA\n');

    await expect(loadGeneList(file, logger)).rejects.toThrow(GeneListError);
    await expect(loadGeneList(file, logger)).rejects.toThrow('No valid Entrez Gene IDs');
  });

  it('should fail for a missing file', async () => {
    await expect(loadGeneList(join(testDir, 'missing.txt'), logger)).rejects.toThrow(
      'Cannot read gene list'
    );
  });
});
