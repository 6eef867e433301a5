/**
 * Layout of the per-window report artifact.
 *
 * @packageDocumentation
 */

/** Written in place of a report when the service returned nothing. */
export const NO_CLUSTERS_MARKER = 'No clusters returned.';

/** Prefix of a cluster header line. */
export const CLUSTER_HEADER_PREFIX = 'Annotation Cluster';

/** Marker preceding the enrichment score on a cluster header line. */
export const SCORE_MARKER = 'EnrichmentScore:';

/** Column names of a cluster's data rows. */
export const REPORT_COLUMNS = [
  'Category',
  'Term',
  'Count',
  '%',
  'Pvalue',
  'Genes',
  'List Total',
  'Pop Hits',
  'Pop Total',
  'Fold Enrichment',
  'Bonferroni',
  'Benjamini',
  'FDR',
] as const;

/** The column header line, without line terminator. */
export const COLUMN_HEADER = REPORT_COLUMNS.join('\t');

/** Prefix that identifies the column header line. */
export const COLUMN_HEADER_PREFIX = 'Category\tTerm';

/** Field positions within a data row. */
export const FIELD = {
  term: 1,
  count: 2,
  pvalue: 4,
} as const;

/** Data rows with fewer fields are ignored. */
export const MIN_DATA_FIELDS = REPORT_COLUMNS.length;
