/**
 * Cluster filtering and per-window aggregation.
 *
 * @packageDocumentation
 */

export { applyClusterFilter, isSignificant } from './filter.js';
export { SummaryAggregator } from './aggregator.js';
export type { SummaryAggregatorOptions, WindowSummary } from './aggregator.js';
