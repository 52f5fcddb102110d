/**
 * Metric Timer
 *
 * Records elapsed wall time into a directive as a Milliseconds metric.
 */

import { MetricUnit } from '@metricline/contracts';
import type { EmbeddedMetric } from './embedded-metric.js';
import type { DirectiveHandle } from './metric-directive.js';
import type { Clock } from './types.js';

export function startMetricTimer(
  metric: EmbeddedMetric,
  handle: DirectiveHandle,
  name: string,
  clock: Clock = Date.now
): () => number {
  const start = clock();
  return () => {
    const elapsed = clock() - start;
    metric.putMetric(handle, name, elapsed, MetricUnit.MILLISECONDS);
    return elapsed;
  };
}
