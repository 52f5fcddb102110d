/**
 * Platform Core - Embedded Metric Format encoding for metricline
 *
 * - Builders for structured metric records (directives, dimensions, properties)
 * - Single-line record encoding and publishing to sinks
 * - Structured diagnostic logging
 * - Environment snapshot and configuration
 */

export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './metrics/index.js';

export { MetricUnit, type MetricUnitValue } from '@metricline/contracts';
