export * from './telemetry-config.js';
export * from './environment-snapshot.js';
