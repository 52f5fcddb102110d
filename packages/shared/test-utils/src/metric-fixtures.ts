import { EnvironmentSnapshot, type Clock, type MetricSink, type RawEnvironment } from '@metricline/platform-core';

export const TEST_LOG_GROUP_NAME = '/aws/lambda/orders-handler';
export const TEST_LOG_STREAM_NAME = '2026/10/19/[$LATEST]0a1b2c3d';
export const TEST_EPOCH_MS = 1_760_000_000_000;

export function createTestEnvironment(overrides: RawEnvironment = {}): EnvironmentSnapshot {
  return EnvironmentSnapshot.capture({
    AWS_LAMBDA_LOG_GROUP_NAME: TEST_LOG_GROUP_NAME,
    AWS_LAMBDA_LOG_STREAM_NAME: TEST_LOG_STREAM_NAME,
    ...overrides,
  });
}

/**
 * Clock that returns `start`, then advances by `step` on every read
 */
export function createSteppingClock(start: number = TEST_EPOCH_MS, step: number = 0): Clock {
  let now = start - step;
  return () => {
    now += step;
    return now;
  };
}

export function createFailingSink(error: Error = new Error('disk full')): MetricSink {
  return {
    write: () => {
      throw error;
    },
  };
}
