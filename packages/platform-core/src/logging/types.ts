/**
 * Logging Types
 */

export type { Logger } from 'winston';

export interface LoggerMeta {
  service: string;
  module: string;
  env: string;
}

/**
 * Subset of the logger that encoders and sinks report through
 */
export interface DiagnosticLogger {
  warn(message: string, meta?: Record<string, unknown>): unknown;
  error(message: string, meta?: Record<string, unknown>): unknown;
}
