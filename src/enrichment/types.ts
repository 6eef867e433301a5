/**
 * Types for the external annotation-enrichment service.
 *
 * The service is a capability interface so the scan can run against DAVID in
 * production and against in-process stubs in tests.
 *
 * @packageDocumentation
 */

/**
 * One annotation term row of a cluster, as reported by the service.
 *
 * Numeric fields are null when the service omitted them.
 */
export interface ChartRecord {
  readonly categoryName: string;
  /** Term with its identifier prefix, e.g. `GO:0006412~translation`. */
  readonly termName: string;
  /** Number of list genes annotated with the term. */
  readonly listHits: number | null;
  readonly percent: number | null;
  /** EASE score (modified Fisher exact p-value). */
  readonly ease: number | null;
  /** Comma-separated gene identifiers. */
  readonly geneIds: string;
  readonly listTotals: number | null;
  readonly popHits: number | null;
  readonly popTotals: number | null;
  readonly foldEnrichment: number | null;
  readonly bonferroni: number | null;
  readonly benjamini: number | null;
  readonly afdr: number | null;
}

/**
 * One annotation cluster with its enrichment score and member terms.
 */
export interface AnnotationCluster {
  readonly score: number | null;
  readonly records: readonly ChartRecord[];
}

/**
 * A term cluster report, highest-ranked cluster first. May be empty.
 */
export type TermClusterReport = readonly AnnotationCluster[];

/**
 * Failure categories for a single service call.
 */
export type ServiceFaultKind = 'service' | 'timeout' | 'transport';

/**
 * A failed service call.
 */
export interface ServiceFault {
  readonly kind: ServiceFaultKind;
  readonly message: string;
  readonly cause?: Error;
}

/**
 * Outcome of one service call.
 */
export type EnrichmentResult =
  | { readonly success: true; readonly report: TermClusterReport }
  | { readonly success: false; readonly fault: ServiceFault };

/**
 * The external enrichment service.
 *
 * Implementations report failures as faults but may also reject; callers
 * treat a rejection as a transport fault.
 */
export interface EnrichmentService {
  /**
   * Submits a gene list and returns its term cluster report.
   *
   * @param geneIds - Entrez Gene IDs of one window.
   * @param listName - Unique name for the submitted list.
   */
  submit(geneIds: readonly number[], listName: string): Promise<EnrichmentResult>;
}

/**
 * Creates a fault, leaving out an absent cause.
 */
export function createFault(kind: ServiceFaultKind, message: string, cause?: Error): ServiceFault {
  return cause === undefined ? { kind, message } : { kind, message, cause };
}

/**
 * Creates a successful result.
 */
export function createReportResult(report: TermClusterReport): EnrichmentResult {
  return { success: true, report };
}

/**
 * Creates a failed result.
 */
export function createFaultResult(fault: ServiceFault): EnrichmentResult {
  return { success: false, fault };
}
