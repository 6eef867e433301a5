/**
 * Primary-cluster series across windows, for charting.
 *
 * @packageDocumentation
 */

import type { WindowSummary } from '../summary/aggregator.js';

/**
 * One window's point on the primary-cluster charts.
 */
export interface ChartPoint {
  readonly label: string;
  readonly enrichmentScore: number | null;
  readonly negLog10Pvalue: number | null;
}

/**
 * `-log10(p)`, or null when p is missing, not positive, or not finite.
 *
 * @example
 * ```typescript
 * negLog10(0.001); // 3
 * negLog10(0);     // null
 * ```
 */
export function negLog10(pvalue: number | null): number | null {
  if (pvalue === null || !Number.isFinite(pvalue) || pvalue <= 0) {
    return null;
  }
  return -Math.log10(pvalue);
}

/**
 * Builds the chart series in window order.
 */
export function buildChartSeries(summaries: readonly WindowSummary[]): ChartPoint[] {
  return summaries.map((summary) => {
    const primary = summary.clusters[0];
    return {
      label: summary.label,
      enrichmentScore: primary?.score ?? null,
      negLog10Pvalue: negLog10(primary?.representativePvalue ?? null),
    };
  });
}
