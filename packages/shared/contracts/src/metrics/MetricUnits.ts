/**
 * Metric Units
 *
 * Closed set of unit tokens accepted by the Embedded Metric Format.
 * Tokens are written to the wire verbatim.
 */

import { z } from 'zod';

export const MetricUnit = {
  SECONDS: 'Seconds',
  MICROSECONDS: 'Microseconds',
  MILLISECONDS: 'Milliseconds',
  BYTES: 'Bytes',
  KILOBYTES: 'Kilobytes',
  MEGABYTES: 'Megabytes',
  GIGABYTES: 'Gigabytes',
  TERABYTES: 'Terabytes',
  BITS: 'Bits',
  KILOBITS: 'Kilobits',
  MEGABITS: 'Megabits',
  GIGABITS: 'Gigabits',
  TERABITS: 'Terabits',
  PERCENT: 'Percent',
  COUNT: 'Count',
  BYTES_PER_SECOND: 'Bytes/Second',
  KILOBYTES_PER_SECOND: 'Kilobytes/Second',
  MEGABYTES_PER_SECOND: 'Megabytes/Second',
  GIGABYTES_PER_SECOND: 'Gigabytes/Second',
  TERABYTES_PER_SECOND: 'Terabytes/Second',
  BITS_PER_SECOND: 'Bits/Second',
  KILOBITS_PER_SECOND: 'Kilobits/Second',
  MEGABITS_PER_SECOND: 'Megabits/Second',
  GIGABITS_PER_SECOND: 'Gigabits/Second',
  TERABITS_PER_SECOND: 'Terabits/Second',
  COUNT_PER_SECOND: 'Count/Second',
  NONE: 'None',
} as const;

export type MetricUnitValue = (typeof MetricUnit)[keyof typeof MetricUnit];

const METRIC_UNIT_VALUES: readonly string[] = Object.values(MetricUnit);

export const metricUnitSchema = z.nativeEnum(MetricUnit);

export function isMetricUnit(token: unknown): token is MetricUnitValue {
  return typeof token === 'string' && METRIC_UNIT_VALUES.includes(token);
}
