/**
 * Significance filter over a window's cluster slots.
 *
 * @packageDocumentation
 */

import { EMPTY_CLUSTER, type ClusterRecord } from '../report/types.js';

/**
 * Whether a cluster's representative p-value passes the threshold.
 *
 * A cluster without a p-value never passes.
 */
export function isSignificant(cluster: ClusterRecord, threshold: number): boolean {
  const pvalue = cluster.representativePvalue;
  return pvalue !== null && pvalue <= threshold;
}

/**
 * Replaces every non-primary cluster that fails the threshold with the empty
 * cluster. The primary cluster (first slot) is kept whatever its p-value.
 *
 * @param slots - Cluster slots of one window, primary first.
 * @param threshold - Largest p-value kept.
 * @returns A new slot array of the same length.
 *
 * @example
 * ```typescript
 * applyClusterFilter([primary, weak, strong], 0.01); // [primary, EMPTY_CLUSTER, strong]
 * ```
 */
export function applyClusterFilter(
  slots: readonly ClusterRecord[],
  threshold: number
): ClusterRecord[] {
  return slots.map((cluster, index) =>
    index === 0 || isSignificant(cluster, threshold) ? cluster : EMPTY_CLUSTER
  );
}
