/**
 * Record Encoder
 *
 * Turns the state of an EmbeddedMetric into one Embedded Metric Format line.
 *
 * Top-level fields are merged into a single ordered map in a fixed order:
 * reserved log fields, properties, then for each directive its metrics and
 * its dimensions, and finally the `_aws` metadata block. A later write to an
 * existing key replaces the value but keeps the key's original position.
 */

import {
  EMF_METADATA_KEY,
  LOG_GROUP_NAME_KEY,
  LOG_STREAM_NAME_KEY,
  type EmfDirective,
  type EmfMetadata,
} from '@metricline/contracts';
import type { EnvironmentSnapshot } from '../config/environment-snapshot.js';
import { EncodingError } from '../errors/telemetry-error.js';
import type { MetricDirective } from './metric-directive.js';

export interface EncodableState {
  environment: EnvironmentSnapshot;
  properties: ReadonlyMap<string, unknown>;
  directives: readonly MetricDirective[];
  timestamp: number;
}

export function buildDirectiveMetadata(directive: MetricDirective): EmfDirective {
  const element: EmfDirective = {
    Namespace: directive.namespace,
    Dimensions: [],
    Metrics: [],
  };
  for (const [name, metric] of directive.metricEntries()) {
    element.Metrics.push({ Name: name, Unit: metric.unit });
  }
  // one dimension set per name; names are never grouped
  for (const [name] of directive.dimensionEntries()) {
    element.Dimensions.push([name]);
  }
  return element;
}

export function buildMetadata(directives: readonly MetricDirective[], timestamp: number): EmfMetadata {
  return {
    Timestamp: Math.trunc(timestamp),
    CloudWatchMetrics: directives.map(buildDirectiveMetadata),
  };
}

export function mergeRecordFields(state: EncodableState): Map<string, unknown> {
  const fields = new Map<string, unknown>([
    [LOG_GROUP_NAME_KEY, state.environment.logGroupName],
    [LOG_STREAM_NAME_KEY, state.environment.logStreamName],
  ]);

  for (const [key, value] of state.properties) {
    fields.set(key, value);
  }

  for (const directive of state.directives) {
    for (const [name, metric] of directive.metricEntries()) {
      if (typeof metric.value === 'number' && !Number.isFinite(metric.value)) {
        throw new EncodingError(`Metric "${name}" has non-finite value ${metric.value}`, {
          details: { namespace: directive.namespace, metric: name },
        });
      }
      fields.set(name, metric.value);
    }
    for (const [name, value] of directive.dimensionEntries()) {
      fields.set(name, value);
    }
  }

  fields.set(EMF_METADATA_KEY, buildMetadata(state.directives, state.timestamp));
  return fields;
}

/**
 * Serialize an ordered field map as one JSON object. Fields whose value has no
 * JSON representation (undefined, functions, symbols) are left out.
 */
export function serializeRecord(fields: ReadonlyMap<string, unknown>): string {
  const members: string[] = [];
  for (const [key, value] of fields) {
    let json: string | undefined;
    try {
      json = JSON.stringify(value);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EncodingError(`Field "${key}" cannot be serialized: ${reason}`, {
        cause: error,
        details: { field: key },
      });
    }
    if (json === undefined) continue;
    members.push(`${JSON.stringify(key)}:${json}`);
  }
  return `{${members.join(',')}}`;
}

export function encodeRecord(state: EncodableState): string {
  return serializeRecord(mergeRecordFields(state));
}

export function formatPublishError(error: Error): string {
  return `Error publishing metric: ${error.message}`;
}
