export * from './MetricUnits.js';
export * from './EmfRecord.js';
