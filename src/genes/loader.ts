/**
 * Gene list loading.
 *
 * The input is a plain text file of Entrez Gene IDs, one per line, in genome
 * order. The order is kept exactly as read.
 *
 * @packageDocumentation
 */

import { safeReadText } from '../utils/safe-fs.js';
import type { Logger } from '../utils/logger.js';

/**
 * Genome-ordered Entrez Gene IDs.
 */
export type GeneList = readonly number[];

/**
 * Error thrown when the gene list cannot be used for a scan.
 */
export class GeneListError extends Error {
  /** The input file, when the list came from one. */
  public readonly sourcePath: string | undefined;

  constructor(message: string, sourcePath?: string) {
    super(message);
    this.name = 'GeneListError';
    this.sourcePath = sourcePath;
  }
}

/**
 * Result of parsing gene list text.
 */
export interface ParsedGeneList {
  /** Valid identifiers in input order. */
  genes: GeneList;
  /** Entries that were not positive integers, in input order. */
  dropped: readonly string[];
}

const POSITIVE_INTEGER = /^\d+$/;

/**
 * Parses gene list text.
 *
 * Lines are trimmed; blank lines and lines starting with `#` are skipped.
 * Entries that are not positive integers are collected in `dropped`.
 */
export function parseGeneList(text: string): ParsedGeneList {
  const genes: number[] = [];
  const dropped: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const id = POSITIVE_INTEGER.test(line) ? Number(line) : Number.NaN;
    if (Number.isSafeInteger(id) && id > 0) {
      genes.push(id);
    } else {
      dropped.push(line);
    }
  }

  return { genes, dropped };
}

/**
 * Reads and parses a gene list file.
 *
 * Dropped entries produce one `non_numeric_ids_dropped` warning.
 *
 * @throws GeneListError if the file cannot be read or yields no valid IDs.
 */
export async function loadGeneList(filePath: string, logger: Logger): Promise<GeneList> {
  let text: string;
  try {
    text = await safeReadText(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GeneListError(`Cannot read gene list ${filePath}: ${reason}`, filePath);
  }

  const { genes, dropped } = parseGeneList(text);

  if (dropped.length > 0) {
    logger.warn('non_numeric_ids_dropped', {
      file: filePath,
      count: dropped.length,
      sample: dropped.slice(0, 5),
    });
  }

  if (genes.length === 0) {
    throw new GeneListError(`No valid Entrez Gene IDs found in ${filePath}`, filePath);
  }

  return genes;
}
