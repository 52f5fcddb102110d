/**
 * Embedded Metric
 *
 * Builder for one Embedded Metric Format record: an ordered list of metric
 * directives plus a property bag of searchable, non-metric context.
 *
 * Values must not contain line breaks. JSON escaping keeps the encoded record
 * on one line, but log consumers search the unescaped values.
 */

import { MAX_DIMENSIONS_PER_SET, MetricUnit, type EmfDocument, type MetricUnitValue } from '@metricline/contracts';
import { getProcessEnvironment, type EnvironmentSnapshot } from '../config/environment-snapshot.js';
import { DirectiveHandleError, EncodingError } from '../errors/telemetry-error.js';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import type { DiagnosticLogger } from '../logging/types.js';
import { DirectiveHandle, MetricDirective } from './metric-directive.js';
import { getStdoutSink, type MetricSink } from './metric-sinks.js';
import { encodeRecord, formatPublishError, type EncodableState } from './record-encoder.js';
import type {
  Clock,
  DimensionMap,
  DirectiveSnapshot,
  EmbeddedMetricOptions,
  MetricScalar,
  PropertyMap,
} from './types.js';

export class EmbeddedMetric {
  private readonly directives: MetricDirective[] = [];
  private readonly handles = new WeakMap<DirectiveHandle, MetricDirective>();
  private readonly properties = new Map<string, unknown>();
  private readonly environment: EnvironmentSnapshot;
  private readonly clock: Clock;
  private readonly logger: DiagnosticLogger;

  constructor(options: EmbeddedMetricOptions = {}) {
    this.environment = options.environment ?? getProcessEnvironment();
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? getLogger('embedded-metric');
  }

  /**
   * Add a property. Properties are for high cardinality values that should be
   * searchable but are not metrics. Last write wins.
   */
  withProperty(key: string, value: unknown): this {
    this.properties.set(key, value);
    return this;
  }

  withProperties(properties: PropertyMap): this {
    for (const [key, value] of Object.entries(properties)) {
      this.withProperty(key, value);
    }
    return this;
  }

  getProperties(): Readonly<PropertyMap> {
    return Object.freeze(Object.fromEntries(this.properties));
  }

  /**
   * Create a directive owned by this record. The namespace is not validated.
   */
  createDirective(namespace: string, dimensions?: DimensionMap): DirectiveHandle {
    const directive = new MetricDirective(namespace, dimensions ?? {});
    const handle = new DirectiveHandle(this.directives.push(directive) - 1, namespace);
    this.handles.set(handle, directive);
    return handle;
  }

  putMetric(
    handle: DirectiveHandle,
    name: string,
    value: MetricScalar,
    unit: MetricUnitValue = MetricUnit.NONE
  ): this {
    this.resolve(handle).putMetric(name, value, unit);
    return this;
  }

  putDimension(handle: DirectiveHandle, name: string, value: string): this {
    this.resolve(handle).putDimension(name, value);
    return this;
  }

  getDirective(handle: DirectiveHandle): DirectiveSnapshot {
    return this.resolve(handle).snapshot();
  }

  listDirectives(): DirectiveSnapshot[] {
    return this.directives.map(directive => directive.snapshot());
  }

  /**
   * Encode the current state as one line, without a terminator.
   * Throws EncodingError when a value cannot be represented.
   */
  encode(): string {
    return encodeRecord(this.encodableState());
  }

  /**
   * The record as a plain object, with the same fields encode() writes.
   * Properties may overwrite the reserved log fields with any value.
   */
  toDocument(): EmfDocument {
    const document: EmfDocument = JSON.parse(this.encode());
    return document;
  }

  toJSON(): EmfDocument {
    return this.toDocument();
  }

  /**
   * Merge additional properties and write the record to the sink. Never throws:
   * an encoding failure writes an error line instead of the record, and a
   * rejected write is reported on the diagnostic logger.
   */
  publishToSink(additionalProperties: PropertyMap, sink: MetricSink): void {
    this.warnOnDimensionOverflow();
    this.withProperties(additionalProperties);

    let line: string;
    try {
      line = this.encode();
    } catch (error) {
      const failure = error instanceof Error ? error : new EncodingError(String(error));
      this.logger.error('Failed to encode metric record', { error: serializeError(failure) });
      line = formatPublishError(failure);
    }

    try {
      sink.write(`${line}\n`);
    } catch (error) {
      this.logger.error('Failed to write metric record to sink', { error: serializeError(error) });
    }
  }

  /**
   * Publish to standard output
   */
  publish(additionalProperties: PropertyMap = {}): void {
    let sink: MetricSink;
    try {
      sink = getStdoutSink();
    } catch (error) {
      this.logger.error('Failed to open standard output for metric records', { error: serializeError(error) });
      return;
    }
    this.publishToSink(additionalProperties, sink);
  }

  private warnOnDimensionOverflow(): void {
    for (const directive of this.directives) {
      if (directive.dimensionCount > MAX_DIMENSIONS_PER_SET) {
        this.logger.warn(
          `DimensionSet for structured metric must not have more than ${MAX_DIMENSIONS_PER_SET} elements`,
          { namespace: directive.namespace, count: directive.dimensionCount }
        );
      }
    }
  }

  private resolve(handle: DirectiveHandle): MetricDirective {
    const directive = this.handles.get(handle);
    if (!directive) {
      throw new DirectiveHandleError(`Directive handle for namespace "${handle.namespace}" is not owned by this metric`, {
        details: { index: handle.index, namespace: handle.namespace },
      });
    }
    return directive;
  }

  private encodableState(): EncodableState {
    return {
      environment: this.environment,
      properties: this.properties,
      directives: this.directives,
      timestamp: this.clock(),
    };
  }
}

export function createEmbeddedMetric(options: EmbeddedMetricOptions = {}): EmbeddedMetric {
  return new EmbeddedMetric(options);
}

export function createEmbeddedMetricWithProperties(
  properties: PropertyMap,
  options: EmbeddedMetricOptions = {}
): EmbeddedMetric {
  return new EmbeddedMetric(options).withProperties(properties);
}
