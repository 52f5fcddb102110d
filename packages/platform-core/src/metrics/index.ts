export * from './types.js';
export * from './metric-directive.js';
export * from './record-encoder.js';
export * from './metric-sinks.js';
export * from './embedded-metric.js';
export * from './metric-timer.js';
