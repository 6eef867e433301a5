/**
 * Per-window summary table.
 *
 * @packageDocumentation
 */

import { toClusterSlots } from '../report/parser.js';
import type { ClusterRecord } from '../report/types.js';
import { windowLabel, type Window } from '../windows/generator.js';
import { applyClusterFilter } from './filter.js';

/**
 * One row of the summary table.
 */
export interface WindowSummary {
  /** Display label, e.g. `1-101`. */
  readonly label: string;
  readonly window: Window;
  /** Exactly `maxClusters` slots, primary first. */
  readonly clusters: readonly ClusterRecord[];
}

/**
 * Options for a SummaryAggregator.
 */
export interface SummaryAggregatorOptions {
  /** Cluster slots per window. */
  readonly maxClusters: number;
  /** P-value threshold of the cluster filter. */
  readonly pvalThreshold: number;
}

/**
 * Descending by primary score, null scores last.
 */
function compareByPrimaryScore(a: WindowSummary, b: WindowSummary): number {
  const scoreA = a.clusters[0]?.score ?? null;
  const scoreB = b.clusters[0]?.score ?? null;
  if (scoreA === null && scoreB === null) {
    return 0;
  }
  if (scoreA === null) {
    return 1;
  }
  if (scoreB === null) {
    return -1;
  }
  return scoreB - scoreA;
}

/**
 * Collects window summaries in generation order.
 *
 * @example
 * ```typescript
 * const aggregator = new SummaryAggregator({ maxClusters: 3, pvalThreshold: 0.01 });
 * aggregator.append({ start: 0, end: 100 }, slots);
 * aggregator.filtered(); // significant windows, best first
 * ```
 */
export class SummaryAggregator {
  private readonly maxClusters: number;
  private readonly pvalThreshold: number;
  private readonly summaries: WindowSummary[] = [];

  constructor(options: SummaryAggregatorOptions) {
    this.maxClusters = options.maxClusters;
    this.pvalThreshold = options.pvalThreshold;
  }

  /**
   * Fits the slots to `maxClusters`, filters them, and records the window.
   */
  append(window: Window, slots: readonly ClusterRecord[]): WindowSummary {
    const fitted = toClusterSlots({ kind: 'clusters', clusters: slots }, this.maxClusters);
    const summary: WindowSummary = {
      label: windowLabel(window),
      window,
      clusters: applyClusterFilter(fitted, this.pvalThreshold),
    };
    this.summaries.push(summary);
    return summary;
  }

  get size(): number {
    return this.summaries.length;
  }

  /**
   * Every summary, in generation order.
   */
  all(): readonly WindowSummary[] {
    return [...this.summaries];
  }

  /**
   * Summaries with at least one p-value, best primary score first.
   *
   * The sort is stable, so equal scores keep generation order.
   */
  filtered(): readonly WindowSummary[] {
    return this.summaries
      .filter((summary) => summary.clusters.some((c) => c.representativePvalue !== null))
      .sort(compareByPrimaryScore);
  }
}
