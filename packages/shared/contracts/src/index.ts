/**
 * Shared contracts for metricline
 *
 * Unit tokens and the wire shape of Embedded Metric Format records.
 * Producers and consumers import from @metricline/contracts instead of defining local copies.
 */

export * from './metrics/index.js';
