import type { MetricUnitValue } from '@metricline/contracts';
import type { EnvironmentSnapshot } from '../config/environment-snapshot.js';
import type { DiagnosticLogger } from '../logging/types.js';

export type MetricScalar = number | string;

export interface MetricValue {
  readonly value: MetricScalar;
  readonly unit: MetricUnitValue;
}

export type DimensionMap = Record<string, string>;

export type PropertyMap = Record<string, unknown>;

export interface DirectiveSnapshot {
  readonly namespace: string;
  readonly dimensions: Readonly<DimensionMap>;
  readonly metrics: Readonly<Record<string, MetricValue>>;
}

export type Clock = () => number;

export interface EmbeddedMetricOptions {
  /** Source of the log group and log stream fields (default: snapshot of process.env) */
  environment?: EnvironmentSnapshot;
  /** Milliseconds since epoch (default: Date.now) */
  clock?: Clock;
  /** Receives dimension warnings and sink failures (default: module logger) */
  logger?: DiagnosticLogger;
}
