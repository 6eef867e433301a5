/**
 * Attempt loop with linear backoff for enrichment service calls.
 *
 * The pause after failed attempt `n` is `baseDelayMs * n`, without jitter.
 *
 * @packageDocumentation
 */

import type { EnrichmentResult, ServiceFault, TermClusterReport } from './types.js';
import { createFault } from './types.js';

/**
 * Configuration options for retry behavior.
 */
export interface RetryConfig {
  /** Total attempts, including the first (default: 3). */
  maxAttempts: number;
  /** Backoff unit in milliseconds (default: 10000). */
  baseDelayMs: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  baseDelayMs: 10_000,
} as const;

/**
 * Validates retry configuration values.
 *
 * @param config - Partial retry configuration to validate.
 * @returns Valid retry configuration with defaults applied.
 * @throws Error if configuration values are invalid.
 */
export function validateRetryConfig(config: Partial<RetryConfig> = {}): RetryConfig {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
  } = config;

  if (maxAttempts < 1 || !Number.isInteger(maxAttempts)) {
    throw new Error(`maxAttempts must be a positive integer, got: ${String(maxAttempts)}`);
  }

  if (!(baseDelayMs >= 0) || !Number.isFinite(baseDelayMs)) {
    throw new Error(`baseDelayMs must be non-negative, got: ${String(baseDelayMs)}`);
  }

  return { maxAttempts, baseDelayMs };
}

/**
 * Delay before the attempt that follows failed attempt `attempt` (1-indexed).
 *
 * @example
 * ```typescript
 * calculateBackoffDelay(1, { maxAttempts: 3, baseDelayMs: 5000 }); // 5000
 * calculateBackoffDelay(2, { maxAttempts: 3, baseDelayMs: 5000 }); // 10000
 * ```
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  return config.baseDelayMs * attempt;
}

/**
 * Information about a failed attempt.
 */
export interface AttemptFailureInfo {
  /** The attempt that failed (1-indexed). */
  attempt: number;
  totalAttempts: number;
  fault: ServiceFault;
  /** Pause before the next attempt, or null when no attempt remains. */
  nextDelayMs: number | null;
}

/**
 * Outcome of an attempt loop.
 */
export type RetryOutcome =
  | { readonly success: true; readonly report: TermClusterReport; readonly attempts: number }
  | { readonly success: false; readonly fault: ServiceFault; readonly attempts: number };

/**
 * Options for withRetry.
 */
export interface WithRetryOptions {
  config?: Partial<RetryConfig>;
  /** Called after every failed attempt, before any pause. */
  onFailure?: (info: AttemptFailureInfo) => void;
  /** Sleep function for delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default sleep implementation using setTimeout.
 */
export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Converts a rejection into a transport fault.
 */
export function faultFromError(error: unknown): ServiceFault {
  if (error instanceof Error) {
    return createFault('transport', error.message, error);
  }
  return createFault('transport', String(error));
}

/**
 * Runs an operation until it succeeds or the attempts run out.
 *
 * A rejected operation counts as a failed attempt with a transport fault.
 * Every fault kind is retried.
 *
 * @param operation - The call to attempt, given the 1-indexed attempt number.
 * @param options - Retry options.
 * @returns The report and attempt count, or the last fault and attempt count.
 *
 * @example
 * ```typescript
 * const outcome = await withRetry(() => service.submit(ids, '1to101'), {
 *   config: { maxAttempts: 3, baseDelayMs: 10_000 },
 *   onFailure: (info) => logger.warn('submission_failed', { attempt: info.attempt }),
 * });
 * ```
 */
export async function withRetry(
  operation: (attempt: number) => Promise<EnrichmentResult>,
  options: WithRetryOptions = {}
): Promise<RetryOutcome> {
  const config = validateRetryConfig(options.config);
  const sleep = options.sleep ?? defaultSleep;
  const { onFailure } = options;

  let lastFault: ServiceFault = createFault('transport', 'No attempt was made');

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let result: EnrichmentResult;
    try {
      result = await operation(attempt);
    } catch (error) {
      result = { success: false, fault: faultFromError(error) };
    }

    if (result.success) {
      return { success: true, report: result.report, attempts: attempt };
    }

    lastFault = result.fault;
    const hasNext = attempt < config.maxAttempts;
    const nextDelayMs = hasNext ? calculateBackoffDelay(attempt, config) : null;

    onFailure?.({ attempt, totalAttempts: config.maxAttempts, fault: lastFault, nextDelayMs });

    if (nextDelayMs !== null) {
      await sleep(nextDelayMs);
    }
  }

  return { success: false, fault: lastFault, attempts: config.maxAttempts };
}
