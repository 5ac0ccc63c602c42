import { describe, it, expect, beforeEach } from 'vitest';
import { MetricAggregator, quantile } from './aggregator';
import { IngestErrorCode, MetricPoint, MetricType, normalizeTags } from '@beacon/core';

const BASE_TIME = Date.parse('2024-01-01T00:00:00Z');

function point(
  name: string,
  value: number,
  offsetMs: number,
  options: { tags?: Record<string, string>; type?: MetricType; unit?: string } = {}
): MetricPoint {
  return {
    name,
    value,
    unit: options.unit ?? 'count',
    tags: normalizeTags(options.tags),
    timestamp: new Date(BASE_TIME + offsetMs),
    type: options.type ?? MetricType.COUNTER,
  };
}

describe('MetricAggregator', () => {
  let aggregator: MetricAggregator;

  beforeEach(() => {
    aggregator = new MetricAggregator({ windowIntervalMs: 10000, seriesIdleWindows: 2 });
  });

  it('should not emit anything for a window that has not closed', () => {
    aggregator.ingest(point('reqs', 1, 1000));

    expect(aggregator.closeWindow(BASE_TIME + 9999)).toHaveLength(0);
  });

  it('should sum three counter points recorded in one window', () => {
    aggregator.ingest(point('reqs', 1, 0));
    aggregator.ingest(point('reqs', 1, 2000));
    aggregator.ingest(point('reqs', 1, 4000));

    const snapshots = aggregator.closeWindow(BASE_TIME + 10000);

    expect(snapshots).toHaveLength(1);
    expect(snapshots[0].key).toBe('reqs');
    expect(snapshots[0].value).toBe(3);
    expect(snapshots[0].count).toBe(3);
    expect(snapshots[0].windowStart.getTime()).toBe(BASE_TIME);
    expect(snapshots[0].windowEnd.getTime()).toBe(BASE_TIME + 10000);
    expect(snapshots[0].partial).toBe(false);
  });

  it('should return the same counter on re-read of the latest snapshot', () => {
    for (const value of [2.5, 4, 0.5]) {
      aggregator.ingest(point('bytes', value, 1000));
    }
    aggregator.closeWindow(BASE_TIME + 10000);

    expect(aggregator.latest().get('bytes')?.value).toBe(7);
    expect(aggregator.latest().get('bytes')?.value).toBe(7);
  });

  it('should merge points with the same tags regardless of tag order', () => {
    aggregator.ingest(point('http', 1, 0, { tags: { method: 'GET', route: '/' } }));
    aggregator.ingest(point('http', 1, 100, { tags: { route: '/', method: 'GET' } }));
    aggregator.ingest(point('http', 1, 200, { tags: { method: 'POST', route: '/' } }));

    const snapshots = aggregator.closeWindow(BASE_TIME + 10000);
    const byKey = new Map(snapshots.map((s) => [s.key, s.value]));

    expect(byKey.get('http{method="GET",route="/"}')).toBe(2);
    expect(byKey.get('http{method="POST",route="/"}')).toBe(1);
  });

  it('should report the last value for gauges', () => {
    aggregator.ingest(point('queue_depth', 10, 0, { type: MetricType.GAUGE }));
    aggregator.ingest(point('queue_depth', 4, 5000, { type: MetricType.GAUGE }));

    const [snapshot] = aggregator.closeWindow(BASE_TIME + 10000);

    expect(snapshot.value).toBe(4);
    expect(snapshot.min).toBe(4);
    expect(snapshot.max).toBe(10);
  });

  it('should compute histogram buckets and quantiles', () => {
    const histogram = new MetricAggregator({ windowIntervalMs: 10000, histogramBuckets: [100, 300] });
    [100, 200, 300, 400, 500].forEach((latency, i) => {
      histogram.ingest(point('latency', latency, i * 1000, { type: MetricType.HISTOGRAM, unit: 'ms' }));
    });

    const [snapshot] = histogram.closeWindow(BASE_TIME + 10000);

    expect(snapshot.value).toBe(300);
    expect(snapshot.buckets).toEqual([
      { le: 100, count: 1 },
      { le: 300, count: 3 },
      { le: '+Inf', count: 5 },
    ]);
    expect(snapshot.quantiles).toEqual({ p50: 300, p90: 500, p95: 500, p99: 500 });
  });

  it('should keep points of the open window when closing the previous one', () => {
    aggregator.ingest(point('reqs', 1, 9000));
    aggregator.ingest(point('reqs', 5, 11000));

    const first = aggregator.closeWindow(BASE_TIME + 10500);
    expect(first.map((s) => s.value)).toEqual([1]);
    expect(aggregator.pendingPoints('reqs')).toHaveLength(1);

    const second = aggregator.closeWindow(BASE_TIME + 20000);
    expect(second.map((s) => s.value)).toEqual([5]);
    expect(aggregator.pendingPoints('reqs')).toHaveLength(0);
  });

  it('should close every elapsed window when ticks were missed', () => {
    aggregator.ingest(point('reqs', 1, 1000));
    aggregator.ingest(point('reqs', 2, 15000));

    const snapshots = aggregator.closeWindow(BASE_TIME + 25000);

    expect(snapshots.map((s) => [s.windowStart.getTime() - BASE_TIME, s.value])).toEqual([
      [0, 1],
      [10000, 2],
    ]);
  });

  it('should not close the same window twice', () => {
    aggregator.ingest(point('reqs', 1, 1000));
    expect(aggregator.closeWindow(BASE_TIME + 10000)).toHaveLength(1);
    expect(aggregator.closeWindow(BASE_TIME + 12000)).toHaveLength(0);
  });

  it('should emit a zero delta for a quiet counter and evict it once idle', () => {
    aggregator.ingest(point('reqs', 1, 1000));
    aggregator.closeWindow(BASE_TIME + 10000);

    const quiet = aggregator.closeWindow(BASE_TIME + 20000);
    expect(quiet).toHaveLength(1);
    expect(quiet[0].value).toBe(0);
    expect(quiet[0].count).toBe(0);

    expect(aggregator.closeWindow(BASE_TIME + 30000)).toHaveLength(0);
    expect(aggregator.latest().has('reqs')).toBe(false);
    expect(aggregator.stats().evictedSeries).toBe(1);
  });

  it('should close a window holding 200k points of one series', () => {
    const total = 200_000;
    for (let i = 0; i < total; i++) {
      aggregator.ingest(point('reqs', i % 7, Math.floor(i / 20)));
    }

    const [snapshot] = aggregator.closeWindow(BASE_TIME + 10000);

    expect(snapshot.count).toBe(total);
    expect(snapshot.sum).toBe(599994);
    expect(snapshot.min).toBe(0);
    expect(snapshot.max).toBe(6);
    expect(aggregator.latest().get('reqs')?.count).toBe(total);
    expect(aggregator.pendingPoints('reqs')).toHaveLength(0);
  });

  it('should flush 200k pending points on shutdown', () => {
    for (let i = 0; i < 200_000; i++) {
      aggregator.ingest(point('reqs', 1, Math.floor(i / 40)));
    }

    const snapshots = aggregator.flushAll(BASE_TIME + 5000);

    expect(snapshots.map((s) => [s.count, s.min, s.max, s.partial])).toEqual([[200_000, 1, 1, true]]);
  });

  it('should reject points older than the last point of their series', () => {
    aggregator.ingest(point('reqs', 1, 5000));
    const result = aggregator.ingest(point('reqs', 1, 4000));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(IngestErrorCode.MALFORMED_SIGNAL);
    }
    expect(aggregator.stats().rejected).toBe(1);
  });

  it('should reject points for a window that already closed', () => {
    aggregator.closeWindow(BASE_TIME + 10000);
    const result = aggregator.ingest(point('reqs', 1, 9000));

    expect(result.ok).toBe(false);
  });

  it('should reject a point whose type conflicts with its series', () => {
    aggregator.ingest(point('reqs', 1, 0));
    const result = aggregator.ingest(point('reqs', 1, 10, { type: MetricType.GAUGE }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Series reqs is a counter, got a gauge point');
    }
  });

  it('should flush pending points as partial snapshots', () => {
    aggregator.ingest(point('reqs', 2, 1000));
    aggregator.ingest(point('reqs', 3, 12000));

    const snapshots = aggregator.flushAll(BASE_TIME + 15000);

    expect(snapshots.map((s) => [s.value, s.partial])).toEqual([
      [2, false],
      [3, true],
    ]);
    expect(aggregator.pendingPoints('reqs')).toHaveLength(0);
  });
});

describe('quantile', () => {
  it('should use nearest rank', () => {
    const sorted = Array.from({ length: 100 }, (_, i) => i + 1);
    expect(quantile(sorted, 0.5)).toBe(50);
    expect(quantile(sorted, 0.95)).toBe(95);
    expect(quantile(sorted, 0.99)).toBe(99);
    expect(quantile([], 0.5)).toBe(0);
  });
});
