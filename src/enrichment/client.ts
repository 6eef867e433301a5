/**
 * Enrichment client: one window's submission with retries.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import { defaultSleep, withRetry } from './retry.js';
import type { EnrichmentService, ServiceFault, TermClusterReport } from './types.js';

/**
 * Result of submitting one window. `no-report` means every attempt failed.
 */
export type SubmissionOutcome =
  | { readonly kind: 'report'; readonly report: TermClusterReport; readonly attempts: number }
  | { readonly kind: 'no-report'; readonly attempts: number; readonly lastFault: ServiceFault };

/**
 * Options for an EnrichmentClient.
 */
export interface EnrichmentClientOptions {
  readonly service: EnrichmentService;
  readonly logger: Logger;
  /** Attempts per submission (default: 3). */
  readonly retries?: number;
  /** Backoff unit in seconds; attempt n waits `wait * n` (default: 10). */
  readonly waitSeconds?: number;
  /** Sleep function (injectable for testing). */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Submits gene lists to an enrichment service, retrying with linear backoff.
 *
 * Service failures never escape as exceptions: after the last attempt the
 * client returns `no-report` so that one bad window cannot stop a scan.
 */
export class EnrichmentClient {
  private readonly service: EnrichmentService;
  private readonly logger: Logger;
  private readonly retries: number;
  private readonly waitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: EnrichmentClientOptions) {
    this.service = options.service;
    this.logger = options.logger;
    this.retries = options.retries ?? 3;
    this.waitMs = (options.waitSeconds ?? 10) * 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Submits one window's genes.
   *
   * @param geneIds - Entrez Gene IDs of the window.
   * @param listName - Unique list name, e.g. `1to101`.
   */
  async submit(geneIds: readonly number[], listName: string): Promise<SubmissionOutcome> {
    const outcome = await withRetry(() => this.service.submit(geneIds, listName), {
      config: { maxAttempts: this.retries, baseDelayMs: this.waitMs },
      sleep: this.sleep,
      onFailure: (info) => {
        this.logger.warn('submission_failed', {
          listName,
          attempt: info.attempt,
          totalAttempts: info.totalAttempts,
          faultKind: info.fault.kind,
          message: info.fault.message,
          nextDelayMs: info.nextDelayMs,
        });
      },
    });

    if (outcome.success) {
      return { kind: 'report', report: outcome.report, attempts: outcome.attempts };
    }

    this.logger.error('submission_abandoned', {
      listName,
      attempts: outcome.attempts,
      message: outcome.fault.message,
    });
    return { kind: 'no-report', attempts: outcome.attempts, lastFault: outcome.fault };
  }
}
