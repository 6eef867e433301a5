/**
 * Report artifact parser.
 *
 * A three-state machine reads the artifact line by line:
 *
 * - `Seeking` → `InClusterHeader` on an `Annotation Cluster` line
 * - `InClusterHeader` → `InDataRows` on the `Category\tTerm` column header
 * - `InDataRows` → `InClusterHeader` on the next cluster header
 *
 * Each cluster header flushes the previous cluster. Malformed values become
 * null; nothing in a report makes the parser throw.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import { safeReadText } from '../utils/safe-fs.js';
import {
  CLUSTER_HEADER_PREFIX,
  COLUMN_HEADER_PREFIX,
  FIELD,
  MIN_DATA_FIELDS,
  NO_CLUSTERS_MARKER,
} from './format.js';
import { EMPTY_CLUSTER, type ClusterRecord, type ParseOutcome, type ParserState } from './types.js';

/** Terms kept per cluster. */
export const MAX_TERMS_PER_CLUSTER = 3;

const SCORE_PATTERN = /EnrichmentScore:([-0-9.eE]+)/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a decimal field, null unless it is a finite number.
 */
export function parseDecimal(field: string | undefined): number | null {
  const trimmed = field?.trim() ?? '';
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parses an integer field, null unless it is a whole number.
 */
export function parseInteger(field: string | undefined): number | null {
  const trimmed = field?.trim() ?? '';
  return INTEGER_PATTERN.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Extracts the enrichment score from a cluster header line.
 */
export function parseScore(headerLine: string): number | null {
  const match = SCORE_PATTERN.exec(headerLine);
  const raw = match?.[1];
  if (raw === undefined) {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/**
 * Removes a term's identifier prefix.
 *
 * @example
 * ```typescript
 * stripTermPrefix('GO:0006412~translation'); // "translation"
 * stripTermPrefix('hsa03010:Ribosome');      // "Ribosome"
 * stripTermPrefix('Ribosomal protein');      // "Ribosomal protein"
 * ```
 */
export function stripTermPrefix(term: string): string {
  const tilde = term.indexOf('~');
  if (tilde >= 0) {
    return term.slice(tilde + 1).trim();
  }
  const colon = term.indexOf(':');
  if (colon >= 0) {
    return term.slice(colon + 1).trim();
  }
  return term.trim();
}

interface PendingCluster {
  score: number | null;
  representativePvalue: number | null;
  size: number | null;
  terms: string[];
  rowCount: number;
}

/**
 * Line-driven state machine over one report.
 */
class ReportStateMachine {
  private state: ParserState = 'Seeking';
  private pending: PendingCluster | null = null;
  private readonly clusters: ClusterRecord[] = [];

  /**
   * Consumes one line. Returns false when the report turns out to be the
   * no-clusters marker and parsing should stop.
   */
  feed(line: string): boolean {
    if (line.trim() === NO_CLUSTERS_MARKER) {
      return false;
    }

    if (line.startsWith(CLUSTER_HEADER_PREFIX)) {
      this.flush();
      this.pending = this.openCluster(parseScore(line));
      this.state = 'InClusterHeader';
      return true;
    }

    if (line.startsWith(COLUMN_HEADER_PREFIX)) {
      // Rows without a preceding cluster header still form a cluster.
      this.pending ??= this.openCluster(null);
      this.state = 'InDataRows';
      return true;
    }

    if (this.state === 'InDataRows' && line.trim() !== '') {
      this.consumeDataRow(line);
    }
    return true;
  }

  finish(): readonly ClusterRecord[] {
    this.flush();
    this.state = 'Seeking';
    return this.clusters;
  }

  private openCluster(score: number | null): PendingCluster {
    return { score, representativePvalue: null, size: null, terms: [], rowCount: 0 };
  }

  private consumeDataRow(line: string): void {
    const cluster = this.pending;
    const fields = line.split('\t');
    if (cluster === null || fields.length < MIN_DATA_FIELDS) {
      return;
    }

    if (cluster.rowCount === 0) {
      cluster.representativePvalue = parseDecimal(fields[FIELD.pvalue]);
      cluster.size = parseInteger(fields[FIELD.count]);
    }
    cluster.rowCount += 1;

    if (cluster.terms.length < MAX_TERMS_PER_CLUSTER) {
      cluster.terms.push(stripTermPrefix(fields[FIELD.term] ?? ''));
    }
  }

  private flush(): void {
    if (this.pending === null) {
      return;
    }
    const { score, representativePvalue, size, terms } = this.pending;
    this.clusters.push({ score, representativePvalue, size, terms });
    this.pending = null;
  }
}

/**
 * Parses report artifact text into cluster records, in report order.
 *
 * @example
 * ```typescript
 * parseReport('No clusters returned.\n'); // { kind: 'no-clusters' }
 * ```
 */
export function parseReport(text: string): ParseOutcome {
  const machine = new ReportStateMachine();

  for (const rawLine of text.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!machine.feed(line)) {
      return { kind: 'no-clusters' };
    }
  }

  return { kind: 'clusters', clusters: machine.finish() };
}

/**
 * Truncates or pads parsed clusters to exactly `maxClusters` slots.
 */
export function toClusterSlots(outcome: ParseOutcome, maxClusters: number): ClusterRecord[] {
  const clusters = outcome.kind === 'clusters' ? outcome.clusters : [];
  const slots = clusters.slice(0, maxClusters);
  while (slots.length < maxClusters) {
    slots.push(EMPTY_CLUSTER);
  }
  return slots;
}

/**
 * Reads and parses a report artifact into `maxClusters` slots.
 *
 * A missing or unreadable file gives all-empty slots and a `report_missing`
 * warning.
 */
export async function readReportFile(
  filePath: string,
  maxClusters: number,
  logger: Logger
): Promise<ClusterRecord[]> {
  let text: string;
  try {
    text = await safeReadText(filePath);
  } catch (error) {
    logger.warn('report_missing', {
      file: filePath,
      message: error instanceof Error ? error.message : String(error),
    });
    return toClusterSlots({ kind: 'no-clusters' }, maxClusters);
  }

  return toClusterSlots(parseReport(text), maxClusters);
}
