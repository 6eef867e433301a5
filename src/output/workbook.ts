/**
 * Summary workbook (`.xlsx`) generation.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as XLSX from 'xlsx';
import { formatTerms, type ClusterRecord } from '../report/types.js';
import type { WindowSummary } from '../summary/aggregator.js';
import { safeWriteBinary } from '../utils/safe-fs.js';
import { buildChartSeries } from './chart-series.js';

/** A worksheet cell; null renders as blank. */
export type Cell = string | number | null;

/** A sheet as a header row followed by data rows. */
export type SheetRows = Cell[][];

export const ALL_RESULTS_SHEET = 'All Results';
export const CHART_DATA_SHEET = 'Chart Data';

/** Excel's limit on worksheet name length. */
export const MAX_SHEET_NAME_LENGTH = 31;

/**
 * Name of the filtered sheet, e.g. `Filtered (P<0.01)`.
 *
 * The threshold is shown to six significant digits and the name is capped at
 * the worksheet name limit.
 */
export function filteredSheetName(threshold: number): string {
  const shown = String(Number(threshold.toPrecision(6)));
  return `Filtered (P<${shown})`.slice(0, MAX_SHEET_NAME_LENGTH);
}

/**
 * Workbook file name, e.g. `Hs_DAVID_enrichment_2024-03-01.xlsx`.
 *
 * Uses the local calendar date of `date`.
 */
export function workbookFileName(species: string, date: Date): string {
  const yyyy = String(date.getFullYear());
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${species}_DAVID_enrichment_${yyyy}-${mm}-${dd}.xlsx`;
}

function termsCell(terms: readonly string[]): Cell {
  return terms.length === 0 ? null : formatTerms(terms);
}

function clusterIndexes(maxClusters: number): number[] {
  return Array.from({ length: maxClusters }, (_, i) => i + 1);
}

/**
 * Rows of the unfiltered sheet: `Window`, then per cluster `Enrich{i}`,
 * `Pval{i}`, `Cluster {i} Terms`, `Size{i}`.
 */
export function allResultsRows(summaries: readonly WindowSummary[], maxClusters: number): SheetRows {
  const indexes = clusterIndexes(maxClusters);
  const header: Cell[] = [
    'Window',
    ...indexes.flatMap((i) => [
      `Enrich${String(i)}`,
      `Pval${String(i)}`,
      `Cluster ${String(i)} Terms`,
      `Size${String(i)}`,
    ]),
  ];

  const rows = summaries.map((summary): Cell[] => [
    summary.label,
    ...indexes.flatMap((i): Cell[] => {
      const cluster = summary.clusters[i - 1];
      return [
        cluster?.score ?? null,
        cluster?.representativePvalue ?? null,
        termsCell(cluster?.terms ?? []),
        cluster?.size ?? null,
      ];
    }),
  ]);

  return [header, ...rows];
}

/**
 * Rows of the filtered sheet, grouped by field: `Window`, `Enrich1..K`,
 * `Cluster 1..K Terms`, `Size1..K`.
 */
export function filteredRows(summaries: readonly WindowSummary[], maxClusters: number): SheetRows {
  const indexes = clusterIndexes(maxClusters);
  const header: Cell[] = [
    'Window',
    ...indexes.map((i) => `Enrich${String(i)}`),
    ...indexes.map((i) => `Cluster ${String(i)} Terms`),
    ...indexes.map((i) => `Size${String(i)}`),
  ];

  const rows = summaries.map((summary): Cell[] => {
    const slot = (i: number): ClusterRecord | undefined => summary.clusters[i - 1];
    return [
      summary.label,
      ...indexes.map((i) => slot(i)?.score ?? null),
      ...indexes.map((i) => termsCell(slot(i)?.terms ?? [])),
      ...indexes.map((i) => slot(i)?.size ?? null),
    ];
  });

  return [header, ...rows];
}

/**
 * Rows of the chart data sheet.
 */
export function chartDataRows(summaries: readonly WindowSummary[]): SheetRows {
  const header: Cell[] = ['Window', 'Enrichment Score (Cluster 1)', '-log10(Pvalue) Cluster 1'];
  const rows = buildChartSeries(summaries).map((point): Cell[] => [
    point.label,
    point.enrichmentScore,
    point.negLog10Pvalue,
  ]);
  return [header, ...rows];
}

/**
 * Input for building a workbook.
 */
export interface WorkbookInput {
  /** Every window, in generation order. */
  readonly all: readonly WindowSummary[];
  /** Significant windows, best first. */
  readonly filtered: readonly WindowSummary[];
  readonly maxClusters: number;
  readonly pvalThreshold: number;
  /** Adds the chart data sheet. */
  readonly charts: boolean;
}

/**
 * Builds the in-memory workbook.
 */
export function buildWorkbook(input: WorkbookInput): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(allResultsRows(input.all, input.maxClusters)),
    ALL_RESULTS_SHEET
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(filteredRows(input.filtered, input.maxClusters)),
    filteredSheetName(input.pvalThreshold)
  );
  if (input.charts) {
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet(chartDataRows(input.all)),
      CHART_DATA_SHEET
    );
  }
  return workbook;
}

/**
 * Serialises a workbook to `.xlsx` bytes.
 */
export function encodeWorkbook(workbook: XLSX.WorkBook): Uint8Array {
  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!(output instanceof Uint8Array)) {
    throw new Error('Workbook serialisation did not produce binary output');
  }
  return output;
}

/**
 * Options for writeWorkbook.
 */
export interface WriteWorkbookOptions extends WorkbookInput {
  readonly outdir: string;
  readonly species: string;
  /** Date stamped in the file name (default: now). */
  readonly date?: Date;
}

/**
 * Writes the summary workbook into `outdir`.
 *
 * @returns Path of the written file.
 */
export async function writeWorkbook(options: WriteWorkbookOptions): Promise<string> {
  const filePath = path.join(
    options.outdir,
    workbookFileName(options.species, options.date ?? new Date())
  );
  await safeWriteBinary(filePath, encodeWorkbook(buildWorkbook(options)));
  return filePath;
}
