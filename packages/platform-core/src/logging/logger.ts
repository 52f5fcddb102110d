/**
 * Logger
 *
 * Winston logger creation and management
 */

import * as winston from 'winston';
import type { LoggerMeta } from './types.js';
import { createDevFormat, createProdFormat } from './formatting.js';
import { serializeError } from './error-serializer.js';
import { getProcessEnvironment } from '../config/environment-snapshot.js';
import {
  LOG_LEVELS,
  fallbackTelemetryConfig,
  loadTelemetryConfig,
  type LogLevel,
  type TelemetryConfig,
} from '../config/telemetry-config.js';
import { ConfigurationError } from '../errors/telemetry-error.js';

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  env?: string;
}

// stdout carries metric records; every log level goes to stderr
const STDERR_LEVELS = [...LOG_LEVELS];

interface ResolvedConfig {
  config: TelemetryConfig;
  rejected?: ConfigurationError;
}

function resolveConfig(): ResolvedConfig {
  const environment = getProcessEnvironment();
  try {
    return { config: loadTelemetryConfig(environment) };
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    return { config: fallbackTelemetryConfig(environment), rejected: error };
  }
}

/**
 * Create a Winston logger instance. An invalid environment setting falls back
 * to the NODE_ENV defaults and is reported on the new logger.
 */
export function createLogger(moduleName: string, options: LoggerOptions = {}): winston.Logger {
  const { config, rejected } = resolveConfig();
  const meta: LoggerMeta = {
    service: options.service ?? config.serviceName,
    module: moduleName,
    env: options.env ?? config.nodeEnv,
  };

  const isDevelopment = meta.env === 'development';

  const logger = winston.createLogger({
    level: options.level ?? config.logLevel,
    defaultMeta: meta,
    format: isDevelopment ? createDevFormat() : createProdFormat(),
    transports: [new winston.transports.Console({ stderrLevels: STDERR_LEVELS })],
  });

  if (rejected) {
    logger.warn('Ignoring invalid telemetry configuration', { error: serializeError(rejected) });
  }
  return logger;
}

const loggers = new Map<string, winston.Logger>();

/**
 * Get or create a logger
 */
export function getLogger(moduleName: string): winston.Logger {
  let logger = loggers.get(moduleName);
  if (!logger) {
    logger = createLogger(moduleName);
    loggers.set(moduleName, logger);
  }
  return logger;
}
