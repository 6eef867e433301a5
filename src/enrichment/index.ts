/**
 * Enrichment service access: types, retries, the DAVID adapter and report
 * artifacts.
 *
 * @packageDocumentation
 */

export type {
  AnnotationCluster,
  ChartRecord,
  EnrichmentResult,
  EnrichmentService,
  ServiceFault,
  ServiceFaultKind,
  TermClusterReport,
} from './types.js';
export { createFault, createFaultResult, createReportResult } from './types.js';

export {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  defaultSleep,
  faultFromError,
  validateRetryConfig,
  withRetry,
} from './retry.js';
export type { AttemptFailureInfo, RetryConfig, RetryOutcome, WithRetryOptions } from './retry.js';

export { EnrichmentClient } from './client.js';
export type { EnrichmentClientOptions, SubmissionOutcome } from './client.js';

export {
  CLUSTERING_PARAMETERS,
  DavidAuthenticationError,
  DavidEnrichmentService,
  ENTREZ_GENE_ID,
  GENE_LIST_TYPE,
  classifyError,
  connectDavidService,
  createSoapPort,
  normalizeTermClusterReport,
  toNumber,
} from './david-service.js';
export type {
  ConnectDavidOptions,
  DavidConnectionOptions,
  DavidPortFactory,
  DavidSoapPort,
} from './david-service.js';

export { formatReport, writeReportArtifact } from './report-writer.js';
