import { describe, it, expect, beforeEach } from 'vitest';
import {
  EventBus,
  HealthStatus,
  IngestError,
  IngestErrorCode,
  LogLevel,
  MetricType,
  SignalKind,
  type SignalRejectedEvent,
} from '@beacon/core';
import { Collector } from './collector';
import { IngestionBuffer } from './ingestion-buffer';
import type { Clock } from './clock';

const NOW = Date.parse('2024-01-01T00:00:00Z');
const clock: Clock = { now: () => NOW };

describe('Collector', () => {
  let buffer: IngestionBuffer;
  let bus: EventBus;
  let collector: Collector;
  let rejections: SignalRejectedEvent[];

  beforeEach(() => {
    buffer = new IngestionBuffer({ capacity: 2, policy: 'reject' });
    bus = new EventBus();
    rejections = [];
    bus.onSignalRejected((event) => rejections.push(event));
    collector = new Collector({ buffer, clock, bus });
  });

  it('should record a metric point stamped with the clock', () => {
    const result = collector.recordMetric('http_requests', 1, 'count', { route: '/', method: 'GET' });

    expect(result.ok).toBe(true);
    const [signal] = buffer.drain(SignalKind.METRIC);
    expect(signal.point).toEqual({
      name: 'http_requests',
      value: 1,
      unit: 'count',
      tags: { method: 'GET', route: '/' },
      timestamp: new Date(NOW),
      type: MetricType.COUNTER,
    });
    expect(Object.keys(signal.point.tags)).toEqual(['method', 'route']);
    expect(Object.isFrozen(signal.point)).toBe(true);
  });

  it('should keep an explicit timestamp and type', () => {
    collector.recordMetric('queue_depth', 7, '', {}, '2024-01-01T00:00:05Z', MetricType.GAUGE);

    const [signal] = buffer.drain(SignalKind.METRIC);
    expect(signal.point.timestamp.toISOString()).toBe('2024-01-01T00:00:05.000Z');
    expect(signal.point.type).toBe(MetricType.GAUGE);
  });

  it('should reject a malformed metric without throwing', () => {
    const result = collector.recordMetric('bad name', 1);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(IngestErrorCode.MALFORMED_SIGNAL);
      expect(result.error.message).toBe('Invalid metric: name: Invalid metric name');
    }
    expect(buffer.depth(SignalKind.METRIC)).toBe(0);
    expect(collector.stats().rejected.MALFORMED_SIGNAL).toBe(1);
    expect(rejections).toEqual([
      { kind: SignalKind.METRIC, code: 'MALFORMED_SIGNAL', message: 'Invalid metric: name: Invalid metric name' },
    ]);
  });

  it('should surface CAPACITY_EXCEEDED when the buffer is full', () => {
    collector.recordMetric('reqs', 1);
    collector.recordMetric('reqs', 1);
    const result = collector.recordMetric('reqs', 1);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(IngestErrorCode.CAPACITY_EXCEEDED);
    }
    expect(collector.stats()).toEqual({
      accepted: 2,
      rejected: { CAPACITY_EXCEEDED: 1, MALFORMED_SIGNAL: 0, TRACE_CLOSED: 0 },
    });
  });

  it('should reject a span that ends before it starts', () => {
    const result = collector.recordSpan({
      traceId: 't1',
      spanId: 's1',
      name: 'GET /',
      startTime: '2024-01-01T00:00:01Z',
      endTime: '2024-01-01T00:00:00Z',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid span: endTime: endTime precedes startTime');
    }
  });

  it('should stamp log entries and health checks', () => {
    collector.recordLog({ message: 'started', level: LogLevel.INFO });
    collector.recordHealth({ component: 'api', status: HealthStatus.HEALTHY, dependencies: ['db', 'db'] });

    const [log] = buffer.drain(SignalKind.LOG);
    const [health] = buffer.drain(SignalKind.HEALTH);
    expect(log.entry.timestamp).toEqual(new Date(NOW));
    expect(log.entry.fields).toEqual({});
    expect(health.check.lastChecked).toEqual(new Date(NOW));
    expect(health.check.dependencies).toEqual(['db']);
  });

  it('should validate untrusted input by kind', () => {
    const result = collector.record(SignalKind.LOG, 'hello');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid log: Expected object, received string');
    }
  });

  it('should accept epoch millisecond timestamps', () => {
    collector.recordSpan({ traceId: 't1', spanId: 's1', name: 'op', startTime: NOW });
    const [signal] = buffer.drain(SignalKind.SPAN);

    expect(signal.span.startTime).toEqual(new Date(NOW));
    expect(signal.span.parentSpanId).toBeUndefined();
  });

  it('should count rejections reported after the buffer', () => {
    collector.countRejection(SignalKind.SPAN, IngestError.traceClosed('t1', 's9'));

    expect(collector.stats().rejected.TRACE_CLOSED).toBe(1);
    expect(rejections[0].code).toBe('TRACE_CLOSED');
  });
});
