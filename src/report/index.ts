/**
 * Report artifact layout and parsing.
 *
 * @packageDocumentation
 */

export * from './format.js';
export * from './types.js';
export {
  MAX_TERMS_PER_CLUSTER,
  parseDecimal,
  parseInteger,
  parseScore,
  stripTermPrefix,
  parseReport,
  toClusterSlots,
  readReportFile,
} from './parser.js';
