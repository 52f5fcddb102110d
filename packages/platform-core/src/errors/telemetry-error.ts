export const TelemetryErrorCode = {
  ENCODING_FAILED: 'ENCODING_FAILED',
  SINK_WRITE_FAILED: 'SINK_WRITE_FAILED',
  INVALID_DIRECTIVE_HANDLE: 'INVALID_DIRECTIVE_HANDLE',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
} as const;

export type TelemetryErrorCodeValue = (typeof TelemetryErrorCode)[keyof typeof TelemetryErrorCode];

export interface TelemetryErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class TelemetryError extends Error {
  readonly code: TelemetryErrorCodeValue;
  readonly details?: Record<string, unknown>;

  constructor(name: string, message: string, code: TelemetryErrorCodeValue, options: TelemetryErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = name;
    this.code = code;
    this.details = options.details;
  }
}

export function createTelemetryError(name: string, code: TelemetryErrorCodeValue) {
  return class extends TelemetryError {
    constructor(message: string, options: TelemetryErrorOptions = {}) {
      super(name, message, code, options);
    }
  };
}

export const EncodingError = createTelemetryError('EncodingError', TelemetryErrorCode.ENCODING_FAILED);
export type EncodingError = InstanceType<typeof EncodingError>;

export const SinkWriteError = createTelemetryError('SinkWriteError', TelemetryErrorCode.SINK_WRITE_FAILED);
export type SinkWriteError = InstanceType<typeof SinkWriteError>;

export const DirectiveHandleError = createTelemetryError(
  'DirectiveHandleError',
  TelemetryErrorCode.INVALID_DIRECTIVE_HANDLE
);
export type DirectiveHandleError = InstanceType<typeof DirectiveHandleError>;

export const ConfigurationError = createTelemetryError('ConfigurationError', TelemetryErrorCode.INVALID_CONFIGURATION);
export type ConfigurationError = InstanceType<typeof ConfigurationError>;
