export * from './telemetry-error.js';
