/**
 * Telemetry Configuration
 *
 * Settings read from the environment snapshot, validated with zod.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/telemetry-error.js';

export const LOG_GROUP_NAME_ENV = 'AWS_LAMBDA_LOG_GROUP_NAME';
export const LOG_STREAM_NAME_ENV = 'AWS_LAMBDA_LOG_STREAM_NAME';
export const DEFAULT_SERVICE_NAME = 'metricline';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const telemetryEnvSchema = z.object({
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
  NODE_ENV: z.string().min(1).default('development'),
  METRICLINE_SERVICE_NAME: z.string().min(1).default(DEFAULT_SERVICE_NAME),
});

export interface TelemetryConfig {
  logLevel: LogLevel;
  nodeEnv: string;
  serviceName: string;
}

export interface EnvironmentReader {
  get(name: string): string | undefined;
}

function defaultLogLevel(nodeEnv: string): LogLevel {
  switch (nodeEnv) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

export function loadTelemetryConfig(environment: EnvironmentReader): TelemetryConfig {
  const result = telemetryEnvSchema.safeParse({
    LOG_LEVEL: environment.get('LOG_LEVEL'),
    NODE_ENV: environment.get('NODE_ENV'),
    METRICLINE_SERVICE_NAME: environment.get('METRICLINE_SERVICE_NAME'),
  });

  if (!result.success) {
    const issues = result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message }));
    throw new ConfigurationError(
      `Invalid telemetry configuration: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      { details: { issues } }
    );
  }

  const env = result.data;
  return {
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    nodeEnv: env.NODE_ENV,
    serviceName: env.METRICLINE_SERVICE_NAME,
  };
}

/**
 * Defaults derived from NODE_ENV alone. Used where an invalid setting must not
 * stop the caller, such as logger creation.
 */
export function fallbackTelemetryConfig(environment: EnvironmentReader): TelemetryConfig {
  const nodeEnv = environment.get('NODE_ENV') || 'development';
  return {
    logLevel: defaultLogLevel(nodeEnv),
    nodeEnv,
    serviceName: environment.get('METRICLINE_SERVICE_NAME') || DEFAULT_SERVICE_NAME,
  };
}
