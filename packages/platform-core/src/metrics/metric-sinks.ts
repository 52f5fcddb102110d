/**
 * Metric Sinks
 *
 * Destinations for encoded lines. A sink throws when a write is rejected;
 * the publisher reports the failure on the diagnostic logger.
 */

import { appendFileSync } from 'fs';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import type { DiagnosticLogger } from '../logging/types.js';
import { SinkWriteError } from '../errors/telemetry-error.js';

export interface MetricSink {
  write(chunk: string): void;
}

/**
 * Hands chunks to a Node writable stream. Errors the stream reports later,
 * through the write callback or an 'error' event, are logged.
 */
export class StreamSink implements MetricSink {
  constructor(
    private readonly stream: NodeJS.WritableStream,
    private readonly logger: DiagnosticLogger = getLogger('metric-sink')
  ) {
    this.stream.on('error', error => {
      this.logger.error('Metric stream error', { error: serializeError(error) });
    });
  }

  write(chunk: string): void {
    this.stream.write(chunk, error => {
      if (error) {
        this.logger.error('Metric stream write failed', {
          bytes: Buffer.byteLength(chunk, 'utf8'),
          error: serializeError(error),
        });
      }
    });
  }
}

export class FileSink implements MetricSink {
  constructor(readonly path: string) {}

  write(chunk: string): void {
    try {
      appendFileSync(this.path, chunk, 'utf8');
    } catch (error) {
      throw new SinkWriteError(`Failed to append metric record to ${this.path}`, {
        cause: error,
        details: { path: this.path },
      });
    }
  }
}

/**
 * In-memory sink holding the exact UTF-8 bytes written
 */
export class BufferSink implements MetricSink {
  private chunks: Buffer[] = [];

  write(chunk: string): void {
    this.chunks.push(Buffer.from(chunk, 'utf8'));
  }

  get byteLength(): number {
    return this.chunks.reduce((total, chunk) => total + chunk.length, 0);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  contents(): string {
    return this.toBuffer().toString('utf8');
  }

  /**
   * Complete lines written so far, without terminators
   */
  lines(): string[] {
    return this.contents()
      .split('\n')
      .filter(line => line.length > 0);
  }

  clear(): void {
    this.chunks = [];
  }
}

let stdoutSink: StreamSink | undefined;

export function getStdoutSink(): MetricSink {
  if (!stdoutSink) {
    stdoutSink = new StreamSink(process.stdout);
  }
  return stdoutSink;
}
