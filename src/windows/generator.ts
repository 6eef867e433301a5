/**
 * Sliding window generation over a genome-ordered gene list.
 *
 * @packageDocumentation
 */

/**
 * A contiguous slice `[start, end)` of the gene list, 0-based.
 */
export interface Window {
  readonly start: number;
  readonly end: number;
}

/**
 * Why a windowing request was rejected.
 */
export type WindowValidationCode = 'invalid_size' | 'insufficient_genes';

/**
 * Error thrown when windows cannot be generated.
 */
export class WindowValidationError extends Error {
  public readonly code: WindowValidationCode;

  constructor(message: string, code: WindowValidationCode) {
    super(message);
    this.name = 'WindowValidationError';
    this.code = code;
  }
}

/**
 * Human-readable window label, e.g. `1-101` for `[0, 100)`.
 *
 * Both figures are the 0-based bounds plus one, so the second one is one past
 * the last gene's 1-based position. Existing result files use this form.
 */
export function windowLabel(window: Window): string {
  return `${String(window.start + 1)}-${String(window.end + 1)}`;
}

/**
 * Service list name and artifact file stem, e.g. `1to101`.
 */
export function windowListName(window: Window): string {
  return `${String(window.start + 1)}to${String(window.end + 1)}`;
}

function assertWindowing(geneCount: number, windowSize: number, stepSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new WindowValidationError(
      `Window size must be a positive integer, got ${String(windowSize)}`,
      'invalid_size'
    );
  }
  if (!Number.isInteger(stepSize) || stepSize <= 0) {
    throw new WindowValidationError(
      `Step size must be a positive integer, got ${String(stepSize)}`,
      'invalid_size'
    );
  }
  if (geneCount < windowSize) {
    throw new WindowValidationError(
      `Input has fewer genes (${String(geneCount)}) than the window size (${String(windowSize)})`,
      'insufficient_genes'
    );
  }
}

/**
 * Number of windows for the given sizes: `floor((N - W) / S) + 1`.
 *
 * @throws WindowValidationError when sizes are not positive integers or N < W.
 */
export function countWindows(geneCount: number, windowSize: number, stepSize: number): number {
  assertWindowing(geneCount, windowSize, stepSize);
  return Math.floor((geneCount - windowSize) / stepSize) + 1;
}

/**
 * Produces windows `[start, start + W)` for `start = 0, S, 2S, …` while
 * `start + W <= N`.
 *
 * Arguments are checked immediately, not on first iteration. The returned
 * iterable is lazy and starts over each time it is iterated.
 *
 * @throws WindowValidationError when sizes are not positive integers or N < W.
 *
 * @example
 * ```typescript
 * [...generateWindows(120, 100, 25)]; // [{ start: 0, end: 100 }]
 * ```
 */
export function generateWindows(
  geneCount: number,
  windowSize: number,
  stepSize: number
): Iterable<Window> {
  assertWindowing(geneCount, windowSize, stepSize);

  return {
    *[Symbol.iterator](): Iterator<Window> {
      for (let start = 0; start + windowSize <= geneCount; start += stepSize) {
        yield { start, end: start + windowSize };
      }
    },
  };
}
