/**
 * Serialises term cluster reports to the tab-delimited artifact format.
 *
 * Summaries are always parsed back from the written artifact, never from the
 * in-memory report.
 *
 * @packageDocumentation
 */

import {
  CLUSTER_HEADER_PREFIX,
  COLUMN_HEADER,
  NO_CLUSTERS_MARKER,
  SCORE_MARKER,
} from '../report/format.js';
import { safeWriteText } from '../utils/safe-fs.js';
import type { ChartRecord, TermClusterReport } from './types.js';

function formatNumber(value: number | null): string {
  return value === null ? '' : String(value);
}

/** Collapses tabs and line breaks so the field stays within its row. */
function formatText(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

function formatRecord(record: ChartRecord): string {
  return [
    formatText(record.categoryName),
    formatText(record.termName),
    formatNumber(record.listHits),
    formatNumber(record.percent),
    formatNumber(record.ease),
    formatText(record.geneIds),
    formatNumber(record.listTotals),
    formatNumber(record.popHits),
    formatNumber(record.popTotals),
    formatNumber(record.foldEnrichment),
    formatNumber(record.bonferroni),
    formatNumber(record.benjamini),
    formatNumber(record.afdr),
  ].join('\t');
}

/**
 * Renders a report as artifact text.
 *
 * A missing or empty report renders as the no-clusters marker line.
 *
 * @example
 * ```typescript
 * formatReport(null); // "No clusters returned.\n"
 * ```
 */
export function formatReport(report: TermClusterReport | null): string {
  if (report === null || report.length === 0) {
    return `${NO_CLUSTERS_MARKER}\n`;
  }

  const lines: string[] = [];
  report.forEach((cluster, index) => {
    lines.push(
      `${CLUSTER_HEADER_PREFIX} ${String(index + 1)}\t${SCORE_MARKER}${formatNumber(cluster.score)}`
    );
    lines.push(COLUMN_HEADER);
    for (const record of cluster.records) {
      lines.push(formatRecord(record));
    }
  });

  return lines.join('\n') + '\n';
}

/**
 * Writes a report artifact, replacing any previous one.
 */
export async function writeReportArtifact(
  filePath: string,
  report: TermClusterReport | null
): Promise<void> {
  await safeWriteText(filePath, formatReport(report));
}
