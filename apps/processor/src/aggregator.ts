import {
  DEFAULT_HISTOGRAM_BUCKETS,
  DEFAULT_SERIES_IDLE_WINDOWS,
  IngestError,
  MetricType,
  err,
  ok,
  seriesKey,
  type HistogramBucket,
  type MetricPoint,
  type MetricSnapshot,
  type Quantiles,
  type Result,
  type Tags,
} from '@beacon/core';
import { componentLogger, type Logger } from './logger';

interface SeriesState {
  key: string;
  name: string;
  unit: string;
  tags: Tags;
  type: MetricType;
  /** Ordered by timestamp; ingest rejects anything older than the tail */
  points: MetricPoint[];
  lastTimestamp: number;
  idleWindows: number;
}

export interface AggregatorConfig {
  windowIntervalMs: number;
  histogramBuckets?: readonly number[];
  /** Empty windows a series may see before it is evicted */
  seriesIdleWindows?: number;
  logger?: Logger;
}

export interface AggregatorStats {
  ingested: number;
  rejected: number;
  snapshots: number;
  series: number;
  evictedPoints: number;
  evictedSeries: number;
}

/**
 * Nearest-rank quantile over sorted values
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const rank = Math.ceil(q * sorted.length);
  const index = Math.min(Math.max(rank - 1, 0), sorted.length - 1);
  return sorted[index];
}

export class MetricAggregator {
  private series: Map<string, SeriesState> = new Map();
  private latestSnapshots: Map<string, MetricSnapshot> = new Map();
  private readonly windowMs: number;
  private readonly buckets: readonly number[];
  private readonly seriesIdleWindows: number;
  private readonly logger: Logger;
  private lastClosedBoundary?: number;
  private counters = { ingested: 0, rejected: 0, snapshots: 0, evictedPoints: 0, evictedSeries: 0 };

  constructor(config: AggregatorConfig) {
    this.windowMs = config.windowIntervalMs;
    this.buckets = config.histogramBuckets ?? DEFAULT_HISTOGRAM_BUCKETS;
    this.seriesIdleWindows = config.seriesIdleWindows ?? DEFAULT_SERIES_IDLE_WINDOWS;
    this.logger = config.logger ?? componentLogger('aggregator');
  }

  /**
   * Route a point to its series, creating the series on first sight.
   * Each call is one synchronous map update, so ingest for one series
   * never waits on another.
   */
  ingest(point: MetricPoint): Result<void, IngestError> {
    const key = seriesKey(point.name, point.tags);
    const timestamp = point.timestamp.getTime();

    if (this.lastClosedBoundary !== undefined && timestamp < this.lastClosedBoundary) {
      return this.reject(
        IngestError.malformed('Point belongs to a window that is already closed', {
          key,
          timestamp: point.timestamp.toISOString(),
          closedUntil: new Date(this.lastClosedBoundary).toISOString(),
        })
      );
    }

    let series = this.series.get(key);

    if (series) {
      if (series.type !== point.type) {
        return this.reject(
          IngestError.malformed(`Series ${key} is a ${series.type}, got a ${point.type} point`, { key })
        );
      }
      if (timestamp < series.lastTimestamp) {
        return this.reject(
          IngestError.malformed('Point timestamp precedes the last point of its series', {
            key,
            timestamp: point.timestamp.toISOString(),
            last: new Date(series.lastTimestamp).toISOString(),
          })
        );
      }
    } else {
      series = {
        key,
        name: point.name,
        unit: point.unit,
        tags: point.tags,
        type: point.type,
        points: [],
        lastTimestamp: timestamp,
        idleWindows: 0,
      };
      this.series.set(key, series);
    }

    series.points.push(point);
    series.lastTimestamp = timestamp;
    this.counters.ingested++;
    return ok(undefined);
  }

  /**
   * Close every window that ended at or before the wall-clock boundary
   * preceding `now`, emit their snapshots and evict the points they held.
   */
  closeWindow(now: number): MetricSnapshot[] {
    const boundary = Math.floor(now / this.windowMs) * this.windowMs;
    if (this.lastClosedBoundary !== undefined && boundary <= this.lastClosedBoundary) {
      return [];
    }

    const snapshots: MetricSnapshot[] = [];
    const lastWindowStart = boundary - this.windowMs;
    const cuts: Array<{ series: SeriesState; cut: number; active: boolean }> = [];
    const idle: string[] = [];

    // Points are only evicted once every snapshot of the pass is built
    for (const [key, series] of this.series.entries()) {
      const cut = this.cutIndex(series, boundary);
      const closed = series.points.slice(0, cut);
      const hadPointsInLastWindow = closed.some((p) => p.timestamp.getTime() >= lastWindowStart);
      cuts.push({ series, cut, active: hadPointsInLastWindow });

      for (const [windowStart, points] of this.groupByWindow(closed)) {
        snapshots.push(this.buildSnapshot(series, windowStart, points, false));
      }

      if (hadPointsInLastWindow) {
        continue;
      }

      if (cut === series.points.length && series.idleWindows + 1 >= this.seriesIdleWindows) {
        idle.push(key);
        continue;
      }

      // Counters report an explicit zero delta for a quiet window
      if (series.type === MetricType.COUNTER && this.latestSnapshots.has(key)) {
        snapshots.push(this.buildSnapshot(series, lastWindowStart, [], false));
      }
    }

    for (const { series, cut, active } of cuts) {
      series.idleWindows = active ? 0 : series.idleWindows + 1;
      series.points = series.points.slice(cut);
      this.counters.evictedPoints += cut;
    }

    for (const key of idle) {
      const series = this.series.get(key);
      this.series.delete(key);
      this.latestSnapshots.delete(key);
      this.counters.evictedSeries++;
      this.logger.debug({ key, idleWindows: series?.idleWindows }, 'Evicted idle series');
    }

    this.lastClosedBoundary = boundary;
    this.record(snapshots);
    return snapshots;
  }

  /**
   * Emit snapshots for every pending point, including the still-open
   * window (marked partial). Used on shutdown.
   */
  flushAll(now: number): MetricSnapshot[] {
    const snapshots: MetricSnapshot[] = [];

    for (const series of this.series.values()) {
      for (const [windowStart, points] of this.groupByWindow(series.points)) {
        const partial = windowStart + this.windowMs > now;
        snapshots.push(this.buildSnapshot(series, windowStart, points, partial));
      }
    }
    for (const series of this.series.values()) {
      series.points = [];
    }

    this.record(snapshots);
    return snapshots;
  }

  /**
   * Most recent finalized snapshot per series key
   */
  latest(): ReadonlyMap<string, MetricSnapshot> {
    return new Map(this.latestSnapshots);
  }

  pendingPoints(key: string): readonly MetricPoint[] {
    return [...(this.series.get(key)?.points ?? [])];
  }

  stats(): AggregatorStats {
    return { ...this.counters, series: this.series.size };
  }

  private reject(error: IngestError): Result<void, IngestError> {
    this.counters.rejected++;
    return err(error);
  }

  private cutIndex(series: SeriesState, boundary: number): number {
    let cut = 0;
    while (cut < series.points.length && series.points[cut].timestamp.getTime() < boundary) {
      cut++;
    }
    return cut;
  }

  private groupByWindow(points: readonly MetricPoint[]): Map<number, MetricPoint[]> {
    const windows = new Map<number, MetricPoint[]>();
    for (const point of points) {
      const start = Math.floor(point.timestamp.getTime() / this.windowMs) * this.windowMs;
      const bucket = windows.get(start);
      if (bucket) {
        bucket.push(point);
      } else {
        windows.set(start, [point]);
      }
    }
    return windows;
  }

  private buildSnapshot(
    series: SeriesState,
    windowStart: number,
    points: readonly MetricPoint[],
    partial: boolean
  ): MetricSnapshot {
    const values = points.map((p) => p.value);
    const count = values.length;
    const last = count > 0 ? values[count - 1] : 0;
    let sum = 0;
    let min = count > 0 ? values[0] : 0;
    let max = min;
    for (const value of values) {
      sum += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    const snapshot: MetricSnapshot = {
      key: series.key,
      name: series.name,
      unit: series.unit,
      tags: series.tags,
      type: series.type,
      windowStart: new Date(windowStart),
      windowEnd: new Date(windowStart + this.windowMs),
      count,
      sum,
      min,
      max,
      last,
      value: sum,
      partial,
    };

    if (series.type === MetricType.GAUGE) {
      snapshot.value = last;
    }

    if (series.type === MetricType.HISTOGRAM) {
      const sorted = [...values].sort((a, b) => a - b);
      snapshot.value = count > 0 ? sum / count : 0;
      snapshot.buckets = this.bucketCounts(sorted);
      snapshot.quantiles = this.quantiles(sorted);
    }

    return snapshot;
  }

  private bucketCounts(sorted: readonly number[]): HistogramBucket[] {
    const buckets: HistogramBucket[] = [];
    let index = 0;
    for (const bound of this.buckets) {
      while (index < sorted.length && sorted[index] <= bound) {
        index++;
      }
      buckets.push({ le: bound, count: index });
    }
    buckets.push({ le: '+Inf', count: sorted.length });
    return buckets;
  }

  private quantiles(sorted: readonly number[]): Quantiles {
    return {
      p50: quantile(sorted, 0.5),
      p90: quantile(sorted, 0.9),
      p95: quantile(sorted, 0.95),
      p99: quantile(sorted, 0.99),
    };
  }

  private record(snapshots: readonly MetricSnapshot[]): void {
    for (const snapshot of snapshots) {
      const previous = this.latestSnapshots.get(snapshot.key);
      if (!previous || previous.windowEnd.getTime() <= snapshot.windowEnd.getTime()) {
        this.latestSnapshots.set(snapshot.key, snapshot);
      }
    }
    this.counters.snapshots += snapshots.length;
  }
}
