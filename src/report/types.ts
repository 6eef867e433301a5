/**
 * Structured cluster records parsed from report artifacts.
 *
 * @packageDocumentation
 */

/**
 * One annotation cluster as summarised from a report.
 */
export interface ClusterRecord {
  /** Cluster enrichment score, null if absent or unparsable. */
  readonly score: number | null;
  /** P-value of the cluster's first term row. */
  readonly representativePvalue: number | null;
  /** Gene count of the cluster's first term row. */
  readonly size: number | null;
  /** Up to three display terms, identifier prefixes removed, in report order. */
  readonly terms: readonly string[];
}

/**
 * Fills cluster slots that have no cluster.
 */
export const EMPTY_CLUSTER: ClusterRecord = Object.freeze({
  score: null,
  representativePvalue: null,
  size: null,
  terms: Object.freeze([]),
});

/**
 * Result of parsing a report.
 *
 * `no-clusters` is the explicit marker the service writes when it returned
 * nothing; it is not an error.
 */
export type ParseOutcome =
  | { readonly kind: 'clusters'; readonly clusters: readonly ClusterRecord[] }
  | { readonly kind: 'no-clusters' };

/**
 * Parser states.
 */
export type ParserState = 'Seeking' | 'InClusterHeader' | 'InDataRows';

/**
 * Checks whether a slot holds no cluster data at all.
 */
export function isEmptyCluster(cluster: ClusterRecord): boolean {
  return (
    cluster.score === null &&
    cluster.representativePvalue === null &&
    cluster.size === null &&
    cluster.terms.length === 0
  );
}

/**
 * Display form of a cluster's terms, e.g. `translation; Ribosome`.
 */
export function formatTerms(terms: readonly string[]): string {
  return terms.join('; ');
}
