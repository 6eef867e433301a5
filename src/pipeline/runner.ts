/**
 * The scan loop: windows are submitted, persisted, parsed and summarised one
 * at a time, in genome order.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { ResolvedConfig } from '../config/types.js';
import { EnrichmentClient } from '../enrichment/client.js';
import { formatReport, writeReportArtifact } from '../enrichment/report-writer.js';
import { defaultSleep } from '../enrichment/retry.js';
import type { EnrichmentService, TermClusterReport } from '../enrichment/types.js';
import type { GeneList } from '../genes/loader.js';
import { parseReport, readReportFile, toClusterSlots } from '../report/parser.js';
import { isEmptyCluster, type ClusterRecord } from '../report/types.js';
import { SummaryAggregator, type WindowSummary } from '../summary/aggregator.js';
import type { Logger } from '../utils/logger.js';
import {
  countWindows,
  generateWindows,
  windowLabel,
  windowListName,
  type Window,
} from '../windows/generator.js';

/**
 * Collaborators of a scan.
 */
export interface ScanDependencies {
  readonly service: EnrichmentService;
  readonly logger: Logger;
  /** Sleep function for backoff and the inter-window delay (injectable for testing). */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Result of a completed scan.
 */
export interface ScanResult {
  /** Every window in generation order. */
  readonly all: readonly WindowSummary[];
  /** Windows with at least one p-value, best primary score first. */
  readonly filtered: readonly WindowSummary[];
  readonly windowCount: number;
  /** Windows for which every attempt failed. */
  readonly failedWindows: number;
}

/**
 * Path of a window's report artifact, e.g. `results/1to101_fullReport.txt`.
 */
export function reportArtifactPath(outdir: string, window: Window): string {
  return path.join(outdir, `${windowListName(window)}_fullReport.txt`);
}

/**
 * Persists a window's report and reads the cluster slots back from the
 * artifact. When the artifact cannot be written the slots come from the
 * in-memory report instead.
 */
async function recordReport(
  artifact: string,
  report: TermClusterReport | null,
  maxClusters: number,
  logger: Logger
): Promise<ClusterRecord[]> {
  try {
    await writeReportArtifact(artifact, report);
  } catch (error) {
    logger.warn('artifact_write_failed', {
      file: artifact,
      message: error instanceof Error ? error.message : String(error),
    });
    return toClusterSlots(parseReport(formatReport(report)), maxClusters);
  }
  return readReportFile(artifact, maxClusters, logger);
}

/**
 * Runs the scan over `genes`.
 *
 * Window parameters are checked before the first service call. Service
 * failures never abort the scan: a window without a report is summarised with
 * empty cluster slots, and an artifact that cannot be written only costs the
 * file. After every window the runner pauses for
 * `service.wait_seconds`.
 *
 * @throws {WindowValidationError} If the window parameters do not fit the gene list.
 */
export async function runScan(
  genes: GeneList,
  config: ResolvedConfig,
  deps: ScanDependencies
): Promise<ScanResult> {
  const { scan, service, output } = config;
  const logger = deps.logger;
  const sleep = deps.sleep ?? defaultSleep;

  const windows = generateWindows(genes.length, scan.window_size, scan.step_size);
  const total = countWindows(genes.length, scan.window_size, scan.step_size);
  logger.info('windows_planned', {
    genes: genes.length,
    windowSize: scan.window_size,
    stepSize: scan.step_size,
    windows: total,
  });

  const client = new EnrichmentClient({
    service: deps.service,
    logger: logger.child('EnrichmentClient'),
    retries: service.retries,
    waitSeconds: service.wait_seconds,
    sleep,
  });
  const aggregator = new SummaryAggregator({
    maxClusters: scan.max_clusters,
    pvalThreshold: scan.pval_threshold,
  });

  let index = 0;
  let failedWindows = 0;
  for (const window of windows) {
    index++;
    const label = windowLabel(window);
    const listName = windowListName(window);
    logger.info('window_started', { window: label, index, total });

    const outcome = await client.submit(genes.slice(window.start, window.end), listName);
    if (outcome.kind === 'no-report') {
      failedWindows++;
    }

    const artifact = reportArtifactPath(output.outdir, window);
    const slots = await recordReport(
      artifact,
      outcome.kind === 'report' ? outcome.report : null,
      scan.max_clusters,
      logger
    );
    const summary = aggregator.append(window, slots);

    logger.info('window_completed', {
      window: label,
      outcome: outcome.kind,
      attempts: outcome.attempts,
      clusters: summary.clusters.filter((cluster) => !isEmptyCluster(cluster)).length,
      artifact,
    });

    await sleep(service.wait_seconds * 1000);
  }

  return {
    all: aggregator.all(),
    filtered: aggregator.filtered(),
    windowCount: aggregator.size,
    failedWindows,
  };
}
