import type { MetricUnitValue } from '@metricline/contracts';
import type { DimensionMap, DirectiveSnapshot, MetricScalar, MetricValue } from './types.js';

/**
 * One namespace with its dimensions and metrics. Only the owning EmbeddedMetric
 * holds a reference; callers reach it through a DirectiveHandle.
 */
export class MetricDirective {
  readonly namespace: string;
  private readonly dimensions = new Map<string, string>();
  private readonly metrics = new Map<string, MetricValue>();

  constructor(namespace: string, dimensions: DimensionMap = {}) {
    this.namespace = namespace;
    for (const [name, value] of Object.entries(dimensions)) {
      this.dimensions.set(name, value);
    }
  }

  putMetric(name: string, value: MetricScalar, unit: MetricUnitValue): void {
    this.metrics.set(name, Object.freeze({ value, unit }));
  }

  putDimension(name: string, value: string): void {
    this.dimensions.set(name, value);
  }

  get dimensionCount(): number {
    return this.dimensions.size;
  }

  metricEntries(): Iterable<[string, MetricValue]> {
    return this.metrics.entries();
  }

  dimensionEntries(): Iterable<[string, string]> {
    return this.dimensions.entries();
  }

  snapshot(): DirectiveSnapshot {
    return Object.freeze({
      namespace: this.namespace,
      dimensions: Object.freeze(Object.fromEntries(this.dimensions)),
      metrics: Object.freeze(Object.fromEntries(this.metrics)),
    });
  }
}

/**
 * Opaque reference to a directive. Only the EmbeddedMetric that issued a handle
 * resolves it; an equal-looking handle built elsewhere is rejected.
 */
export class DirectiveHandle {
  constructor(
    readonly index: number,
    readonly namespace: string
  ) {}
}
