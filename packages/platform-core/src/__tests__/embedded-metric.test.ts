import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MetricUnit, findUndeclaredReferences } from '@metricline/contracts';
import {
  TEST_EPOCH_MS,
  TEST_LOG_GROUP_NAME,
  TEST_LOG_STREAM_NAME,
  createFailingSink,
  createMockLogger,
  createSteppingClock,
  createTestEnvironment,
  type MockLogger,
} from '@metricline/test-utils';
import { EnvironmentSnapshot, resetProcessEnvironment } from '../config/environment-snapshot.js';
import { DirectiveHandleError } from '../errors/telemetry-error.js';
import { EmbeddedMetric, createEmbeddedMetric, createEmbeddedMetricWithProperties } from '../metrics/embedded-metric.js';
import { DirectiveHandle } from '../metrics/metric-directive.js';
import { BufferSink } from '../metrics/metric-sinks.js';

describe('EmbeddedMetric', () => {
  let logger: MockLogger;
  let sink: BufferSink;

  const build = (environment = createTestEnvironment()) =>
    new EmbeddedMetric({ environment, clock: createSteppingClock(), logger });

  beforeEach(() => {
    logger = createMockLogger();
    sink = new BufferSink();
  });

  describe('publishToSink', () => {
    it('should write the request scenario as one exact line', () => {
      const metric = build().withProperty('requestId', 'abc-123');
      const handle = metric.createDirective('MyService', { Stage: 'prod' });
      metric.putMetric(handle, 'Latency', 42, MetricUnit.MILLISECONDS);

      metric.publishToSink({}, sink);

      expect(sink.contents()).toBe(
        '{"log_group_name":"/aws/lambda/orders-handler","log_steam_name":"2026/10/19/[$LATEST]0a1b2c3d",' +
          '"requestId":"abc-123","Latency":42,"Stage":"prod",' +
          '"_aws":{"Timestamp":1760000000000,"CloudWatchMetrics":[{"Namespace":"MyService",' +
          '"Dimensions":[["Stage"]],"Metrics":[{"Name":"Latency","Unit":"Milliseconds"}]}]}}\n'
      );
    });

    it('should expose properties, metrics and dimensions as top-level keys', () => {
      const metric = build().withProperty('requestId', 'abc-123');
      const handle = metric.createDirective('MyService', { Stage: 'prod' });
      metric.putMetric(handle, 'Latency', 42, MetricUnit.MILLISECONDS);

      metric.publishToSink({}, sink);
      const record = JSON.parse(sink.contents());

      expect(record.requestId).toBe('abc-123');
      expect(record.Stage).toBe('prod');
      expect(record.Latency).toBe(42);
      expect(record._aws.CloudWatchMetrics[0]).toEqual({
        Namespace: 'MyService',
        Dimensions: [['Stage']],
        Metrics: [{ Name: 'Latency', Unit: 'Milliseconds' }],
      });
      expect(findUndeclaredReferences(record)).toEqual([]);
    });

    it('should emit reserved fields and an empty directive list when nothing was recorded', () => {
      const metric = build(EnvironmentSnapshot.empty());

      metric.publishToSink({}, sink);
      const record = JSON.parse(sink.contents());

      expect(record.log_group_name).toBe('');
      expect(record.log_steam_name).toBe('');
      expect(record._aws).toEqual({ Timestamp: TEST_EPOCH_MS, CloudWatchMetrics: [] });
    });

    it('should take the log group and stream from the injected environment', () => {
      const metric = build();

      metric.publishToSink({}, sink);
      const record = JSON.parse(sink.contents());

      expect(record.log_group_name).toBe(TEST_LOG_GROUP_NAME);
      expect(record.log_steam_name).toBe(TEST_LOG_STREAM_NAME);
      expect(record).not.toHaveProperty('log_stream_name');
    });

    it('should keep directives in creation order', () => {
      const metric = build();
      const orders = metric.createDirective('Orders');
      const payments = metric.createDirective('Payments');
      metric.putMetric(payments, 'Captured', 1, MetricUnit.COUNT);
      metric.putMetric(orders, 'Placed', 2, MetricUnit.COUNT);

      metric.publishToSink({}, sink);
      const record = JSON.parse(sink.contents());

      expect(record._aws.CloudWatchMetrics).toHaveLength(2);
      expect(record._aws.CloudWatchMetrics[0].Namespace).toBe('Orders');
      expect(record._aws.CloudWatchMetrics[1].Namespace).toBe('Payments');
    });

    it('should declare every metric and one single-name dimension set per dimension', () => {
      const metric = build();
      const handle = metric.createDirective('Checkout', { Region: 'eu-west-1', Tier: 'gold' });
      metric
        .putDimension(handle, 'Channel', 'web')
        .putMetric(handle, 'Items', 3, MetricUnit.COUNT)
        .putMetric(handle, 'Basket', 1024, MetricUnit.BYTES);

      metric.publishToSink({}, sink);
      const [directive] = JSON.parse(sink.contents())._aws.CloudWatchMetrics;

      expect(directive.Metrics).toHaveLength(2);
      expect(directive.Metrics).toEqual(
        expect.arrayContaining([
          { Name: 'Items', Unit: 'Count' },
          { Name: 'Basket', Unit: 'Bytes' },
        ])
      );
      expect(directive.Dimensions).toHaveLength(3);
      for (const dimensionSet of directive.Dimensions) {
        expect(dimensionSet).toHaveLength(1);
      }
      expect(directive.Dimensions.flat().sort()).toEqual(['Channel', 'Region', 'Tier']);
    });

    it('should default the unit to None', () => {
      const metric = build();
      const handle = metric.createDirective('Jobs');
      metric.putMetric(handle, 'Queue', 'deep');

      metric.publishToSink({}, sink);
      const record = JSON.parse(sink.contents());

      expect(record.Queue).toBe('deep');
      expect(record._aws.CloudWatchMetrics[0].Metrics).toEqual([{ Name: 'Queue', Unit: 'None' }]);
    });

    it('should accept an empty namespace without complaint', () => {
      const metric = build();
      metric.createDirective('');

      metric.publishToSink({}, sink);

      expect(JSON.parse(sink.contents())._aws.CloudWatchMetrics[0].Namespace).toBe('');
      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should merge additional properties with last write winning', () => {
      const metric = build().withProperty('traceId', 'first');

      metric.publishToSink({ traceId: 'second', coldStart: true }, sink);
      const line = sink.lines()[0];

      expect(line.match(/"traceId"/g)).toHaveLength(1);
      expect(JSON.parse(line).traceId).toBe('second');
      expect(JSON.parse(line).coldStart).toBe(true);
    });

    it('should warn but still emit every dimension when a directive has more than nine', () => {
      const dimensions = Object.fromEntries(Array.from({ length: 10 }, (_, i) => [`dim${i}`, `value${i}`]));
      const metric = build();
      const handle = metric.createDirective('Wide', dimensions);
      metric.putMetric(handle, 'Hits', 1, MetricUnit.COUNT);

      expect(() => metric.publishToSink({}, sink)).not.toThrow();
      const record = JSON.parse(sink.contents());

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'DimensionSet for structured metric must not have more than 9 elements',
        { namespace: 'Wide', count: 10 }
      );
      expect(record._aws.CloudWatchMetrics[0].Dimensions).toHaveLength(10);
      expect(record.dim9).toBe('value9');
    });

    it('should not warn for exactly nine dimensions', () => {
      const dimensions = Object.fromEntries(Array.from({ length: 9 }, (_, i) => [`dim${i}`, `value${i}`]));
      const metric = build();
      metric.createDirective('Nine', dimensions);

      metric.publishToSink({}, sink);

      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should write an error line instead of the record when a metric cannot be encoded', () => {
      const metric = build();
      const handle = metric.createDirective('Broken');
      metric.putMetric(handle, 'Ratio', Number.NaN, MetricUnit.PERCENT);

      expect(() => metric.publishToSink({}, sink)).not.toThrow();

      expect(sink.contents()).toBe('Error publishing metric: Metric "Ratio" has non-finite value NaN\n');
      expect(logger.error).toHaveBeenCalledWith(
        'Failed to encode metric record',
        expect.objectContaining({ error: expect.objectContaining({ code: 'ENCODING_FAILED' }) })
      );
    });

    it('should write an error line when a property cannot be serialized', () => {
      const metric = build().withProperty('sequence', 10n);

      metric.publishToSink({}, sink);

      expect(sink.contents().startsWith('Error publishing metric: Field "sequence" cannot be serialized')).toBe(true);
      expect(sink.lines()).toHaveLength(1);
    });

    it('should log and swallow a sink failure', () => {
      const metric = build();
      metric.createDirective('Orders');

      expect(() => metric.publishToSink({}, createFailingSink(new Error('disk full')))).not.toThrow();

      expect(logger.error).toHaveBeenCalledWith('Failed to write metric record to sink', {
        error: expect.objectContaining({ message: 'disk full' }),
      });
    });

    it('should re-read state and emit a full line on every publish', () => {
      const metric = new EmbeddedMetric({
        environment: createTestEnvironment(),
        clock: createSteppingClock(TEST_EPOCH_MS, 250),
        logger,
      });
      const handle = metric.createDirective('Orders');
      metric.putMetric(handle, 'Placed', 1, MetricUnit.COUNT);
      metric.publishToSink({}, sink);
      metric.putMetric(handle, 'Placed', 2, MetricUnit.COUNT);
      metric.publishToSink({}, sink);

      const [first, second] = sink.lines().map(line => JSON.parse(line));

      expect(first.Placed).toBe(1);
      expect(second.Placed).toBe(2);
      expect(first._aws.Timestamp).toBe(TEST_EPOCH_MS);
      expect(second._aws.Timestamp).toBe(TEST_EPOCH_MS + 250);
    });
  });

  describe('encode', () => {
    it('should produce non-decreasing wall clock timestamps', () => {
      const metric = new EmbeddedMetric({ environment: createTestEnvironment(), logger });

      const before = Date.now();
      const first = JSON.parse(metric.encode())._aws.Timestamp;
      const second = JSON.parse(metric.encode())._aws.Timestamp;
      const after = Date.now();

      expect(Number.isInteger(first)).toBe(true);
      expect(second).toBeGreaterThanOrEqual(first);
      expect(first).toBeGreaterThanOrEqual(before);
      expect(second).toBeLessThanOrEqual(after);
      expect(after - before).toBeLessThan(5000);
    });

    it('should keep values with line breaks on a single line', () => {
      const metric = build().withProperty('note', 'first\nsecond');

      const line = metric.encode();

      expect(line.includes('\n')).toBe(false);
      expect(JSON.parse(line).note).toBe('first\nsecond');
    });
  });

  describe('directive handles', () => {
    it('should copy the dimension map passed at creation', () => {
      const dimensions = { Stage: 'prod' };
      const metric = build();
      const handle = metric.createDirective('MyService', dimensions);

      dimensions.Stage = 'dev';

      expect(metric.getDirective(handle).dimensions).toEqual({ Stage: 'prod' });
    });

    it('should return snapshots that do not change the directive', () => {
      const metric = build();
      const handle = metric.createDirective('MyService');
      metric.putMetric(handle, 'Latency', 5, MetricUnit.MILLISECONDS);

      const snapshot = metric.getDirective(handle);

      expect(Object.isFrozen(snapshot.metrics)).toBe(true);
      expect(snapshot).toEqual({
        namespace: 'MyService',
        dimensions: {},
        metrics: { Latency: { value: 5, unit: 'Milliseconds' } },
      });
    });

    it('should list directives in creation order', () => {
      const metric = build();
      metric.createDirective('A', { Host: 'a1' });
      metric.createDirective('B');

      expect(metric.listDirectives().map(d => d.namespace)).toEqual(['A', 'B']);
    });

    it('should reject a handle issued by another metric', () => {
      const owner = build();
      const other = build();
      const handle = owner.createDirective('Orders');

      expect(() => other.putMetric(handle, 'Placed', 1)).toThrow(DirectiveHandleError);
      expect(() => other.putDimension(handle, 'Stage', 'prod')).toThrow(
        'Directive handle for namespace "Orders" is not owned by this metric'
      );
    });

    it('should reject a handle constructed outside the metric', () => {
      const metric = build();
      metric.createDirective('Orders');
      const forged = new DirectiveHandle(0, 'Orders');

      expect(() => metric.putMetric(forged, 'Placed', 1)).toThrow(DirectiveHandleError);
      expect(() => metric.getDirective(forged)).toThrow(
        'Directive handle for namespace "Orders" is not owned by this metric'
      );
    });
  });

  describe('properties', () => {
    it('should chain property attachment and keep the latest value', () => {
      const metric = build().withProperty('userId', 'u-1').withProperty('userId', 'u-2').withProperty('plan', 'pro');

      expect(metric.getProperties()).toEqual({ userId: 'u-2', plan: 'pro' });
    });

    it('should pre-seed properties through the factory', () => {
      const metric = createEmbeddedMetricWithProperties(
        { functionVersion: '$LATEST' },
        { environment: createTestEnvironment(), clock: createSteppingClock(), logger }
      );

      expect(JSON.parse(metric.encode()).functionVersion).toBe('$LATEST');
    });
  });

  describe('toDocument', () => {
    it('should match the encoded line and serve JSON.stringify', () => {
      const metric = build().withProperty('requestId', 'abc-123');
      const handle = metric.createDirective('MyService', { Stage: 'prod' });
      metric.putMetric(handle, 'Latency', 42, MetricUnit.MILLISECONDS);

      const document = metric.toDocument();

      expect(document).toEqual(JSON.parse(metric.encode()));
      expect(JSON.parse(JSON.stringify(metric))).toEqual(document);
      expect(document._aws.Timestamp).toBe(TEST_EPOCH_MS);
    });

    it('should return a record whose reserved fields were overwritten by properties', () => {
      const metric = build().withProperty('log_group_name', 7);

      metric.publishToSink({}, sink);
      const document = metric.toDocument();

      expect(sink.contents().startsWith('{"log_group_name":7,"log_steam_name":')).toBe(true);
      expect(document.log_group_name).toBe(7);
      expect(JSON.parse(JSON.stringify(metric))).toEqual(JSON.parse(metric.encode()));
    });
  });

  describe('publish', () => {
    afterEach(() => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      resetProcessEnvironment();
    });

    it('should publish with default loggers when LOG_LEVEL is not a known level', () => {
      vi.stubEnv('LOG_LEVEL', 'trace');
      vi.stubEnv('NODE_ENV', 'test');
      resetProcessEnvironment();
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      const metric = createEmbeddedMetric({ environment: createTestEnvironment(), clock: createSteppingClock() });
      metric.createDirective('Orders');

      expect(() => metric.publish()).not.toThrow();
      expect(writeSpy).toHaveBeenCalledWith(expect.stringContaining('"Namespace":"Orders"'), expect.any(Function));
    });

    it('should write the record to standard output', () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const metric = createEmbeddedMetric({
        environment: createTestEnvironment(),
        clock: createSteppingClock(),
        logger,
      });
      metric.createDirective('Orders');

      metric.publish({ traceId: 't-1' });

      expect(writeSpy).toHaveBeenCalledWith(expect.stringContaining('"traceId":"t-1"'), expect.any(Function));
    });
  });
});
