import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { formatReport, writeReportArtifact } from './report-writer.js';
import type { ChartRecord, TermClusterReport } from './types.js';

const HEADER =
  'Category\tTerm\tCount\t%\tPvalue\tGenes\tList Total\tPop Hits\tPop Total\tFold Enrichment\tBonferroni\tBenjamini\tFDR';

function record(overrides: Partial<ChartRecord> = {}): ChartRecord {
  return {
    categoryName: 'GOTERM_BP_DIRECT',
    termName: 'GO:0006412~translation',
    listHits: 12,
    percent: 12.5,
    ease: 0.0004,
    geneIds: '6122, 6124',
    listTotals: 96,
    popHits: 400,
    popTotals: 18000,
    foldEnrichment: 5.6,
    bonferroni: 0.1,
    benjamini: 0.05,
    afdr: 0.04,
    ...overrides,
  };
}

describe('formatReport', () => {
  it('should write the marker for a null report', () => {
    expect(formatReport(null)).toBe('No clusters returned.\n');
  });

  it('should write the marker for an empty report', () => {
    expect(formatReport([])).toBe('No clusters returned.\n');
  });

  it('should write header, column header and rows per cluster', () => {
    const report: TermClusterReport = [
      { score: 3.25, records: [record()] },
      { score: 1.5, records: [record({ termName: 'hsa03010:Ribosome', ease: 0.002 })] },
    ];

    expect(formatReport(report)).toBe(
      [
        'Annotation Cluster 1\tEnrichmentScore:3.25',
        HEADER,
        'GOTERM_BP_DIRECT\tGO:0006412~translation\t12\t12.5\t0.0004\t6122, 6124\t96\t400\t18000\t5.6\t0.1\t0.05\t0.04',
        'Annotation Cluster 2\tEnrichmentScore:1.5',
        HEADER,
        'GOTERM_BP_DIRECT\thsa03010:Ribosome\t12\t12.5\t0.002\t6122, 6124\t96\t400\t18000\t5.6\t0.1\t0.05\t0.04',
        '',
      ].join('\n')
    );
  });

  it('should write empty fields for missing numbers', () => {
    const text = formatReport([
      { score: null, records: [record({ listHits: null, ease: null, afdr: null })] },
    ]);
    const lines = text.split('\n');
    expect(lines[0]).toBe('Annotation Cluster 1\tEnrichmentScore:');
    expect(lines[2]).toBe(
      'GOTERM_BP_DIRECT\tGO:0006412~translation\t\t12.5\t\t6122, 6124\t96\t400\t18000\t5.6\t0.1\t0.05\t'
    );
  });

  it('should keep embedded tabs and newlines inside their row', () => {
    const text = formatReport([
      { score: 2, records: [record({ termName: 'odd\tterm\nname' })] },
    ]);
    const row = text.split('\n')[2] ?? '';
    expect(row.split('\t')).toHaveLength(13);
    expect(row.split('\t')[1]).toBe('odd term name');
  });
});

describe('writeReportArtifact', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'window-enrich-writer-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write the formatted report to disk', async () => {
    const file = join(testDir, '1to101_fullReport.txt');
    await writeReportArtifact(file, null);
    expect(await readFile(file, 'utf-8')).toBe('No clusters returned.\n');
  });

  it('should replace an existing artifact', async () => {
    const file = join(testDir, '1to101_fullReport.txt');
    await writeReportArtifact(file, [{ score: 1, records: [] }]);
    await writeReportArtifact(file, null);
    expect(await readFile(file, 'utf-8')).toBe('No clusters returned.\n');
  });
});
