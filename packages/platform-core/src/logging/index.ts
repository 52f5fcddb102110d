/**
 * Logging Module - Index
 */

export * from './types.js';
export * from './logger.js';
export * from './formatting.js';
export * from './error-serializer.js';
