import {
  IngestError,
  IngestErrorCode,
  SignalKind,
  alertEventInputSchema,
  err,
  healthCheckInputSchema,
  logInputSchema,
  metricInputSchema,
  normalizeTags,
  ok,
  parseWith,
  spanInputSchema,
  type AlertEventInput,
  type EventBus,
  type HealthCheckInput,
  type LogInput,
  type MetricType,
  type Result,
  type Signal,
  type SpanInput,
} from '@beacon/core';
import type { IngestionBuffer } from './ingestion-buffer';
import { systemClock, type Clock } from './clock';
import { componentLogger, type Logger } from './logger';

export interface CollectorConfig {
  buffer: IngestionBuffer;
  clock?: Clock;
  bus?: EventBus;
  logger?: Logger;
}

export interface CollectorStats {
  accepted: number;
  rejected: Record<IngestErrorCode, number>;
}

/**
 * Producer-facing ingest API. Every call validates, stamps missing
 * timestamps and records into the buffer without blocking; failures come
 * back as `IngestError` results and are never thrown.
 */
export class Collector {
  private readonly buffer: IngestionBuffer;
  private readonly clock: Clock;
  private readonly bus?: EventBus;
  private readonly logger: Logger;
  private accepted = 0;
  private rejected: Record<IngestErrorCode, number> = {
    [IngestErrorCode.CAPACITY_EXCEEDED]: 0,
    [IngestErrorCode.MALFORMED_SIGNAL]: 0,
    [IngestErrorCode.TRACE_CLOSED]: 0,
  };

  constructor(config: CollectorConfig) {
    this.buffer = config.buffer;
    this.clock = config.clock ?? systemClock;
    this.bus = config.bus;
    this.logger = config.logger ?? componentLogger('collector');
  }

  recordMetric(
    name: string,
    value: number,
    unit: string = '',
    tags: Record<string, string> = {},
    timestamp?: Date | string | number,
    type?: MetricType
  ): Result<void, IngestError> {
    return this.record(SignalKind.METRIC, { name, value, unit, tags, timestamp, type });
  }

  recordSpan(input: SpanInput): Result<void, IngestError> {
    return this.record(SignalKind.SPAN, input);
  }

  recordLog(input: LogInput): Result<void, IngestError> {
    return this.record(SignalKind.LOG, input);
  }

  recordHealth(input: HealthCheckInput): Result<void, IngestError> {
    return this.record(SignalKind.HEALTH, input);
  }

  recordAlert(input: AlertEventInput): Result<void, IngestError> {
    return this.record(SignalKind.ALERT, input);
  }

  /**
   * Validate untrusted input as a signal of the given kind and record it.
   */
  record(kind: SignalKind, input: unknown): Result<void, IngestError> {
    const signal = this.toSignal(kind, input);
    if (!signal.ok) {
      return this.reject(kind, signal.error);
    }

    const recorded = this.buffer.record(signal.value);
    if (!recorded.ok) {
      return this.reject(kind, recorded.error);
    }

    this.accepted++;
    return recorded;
  }

  /**
   * Count a rejection that happened after the buffer, e.g. a span for a
   * trace that was already flushed.
   */
  countRejection(kind: SignalKind, error: IngestError): void {
    this.reject(kind, error);
  }

  stats(): CollectorStats {
    return { accepted: this.accepted, rejected: { ...this.rejected } };
  }

  private reject(kind: SignalKind, error: IngestError): Result<void, IngestError> {
    this.rejected[error.code]++;
    if (error.code === IngestErrorCode.MALFORMED_SIGNAL) {
      this.logger.warn({ kind, code: error.code, details: error.details }, error.message);
    } else {
      this.logger.debug({ kind, code: error.code }, error.message);
    }
    this.bus?.emitSignalRejected({ kind, code: error.code, message: error.message });
    return err(error);
  }

  private malformed(kind: SignalKind, issues: string[]): IngestError {
    return IngestError.malformed(`Invalid ${kind}: ${issues.join('; ')}`, { kind, issues });
  }

  private toSignal(kind: SignalKind, input: unknown): Result<Signal, IngestError> {
    const now = new Date(this.clock.now());

    switch (kind) {
      case SignalKind.METRIC: {
        const parsed = parseWith(metricInputSchema, input);
        if (!parsed.ok) {
          return err(this.malformed(kind, parsed.error));
        }
        const { timestamp, tags, ...rest } = parsed.value;
        const point = Object.freeze({ ...rest, tags: normalizeTags(tags), timestamp: timestamp ?? now });
        return ok({ kind, point });
      }
      case SignalKind.SPAN: {
        const parsed = parseWith(spanInputSchema, input);
        if (!parsed.ok) {
          return err(this.malformed(kind, parsed.error));
        }
        return ok({ kind, span: parsed.value });
      }
      case SignalKind.LOG: {
        const parsed = parseWith(logInputSchema, input);
        if (!parsed.ok) {
          return err(this.malformed(kind, parsed.error));
        }
        const { timestamp, ...rest } = parsed.value;
        return ok({ kind, entry: { ...rest, timestamp: timestamp ?? now } });
      }
      case SignalKind.HEALTH: {
        const parsed = parseWith(healthCheckInputSchema, input);
        if (!parsed.ok) {
          return err(this.malformed(kind, parsed.error));
        }
        const { lastChecked, ...rest } = parsed.value;
        return ok({ kind, check: { ...rest, lastChecked: lastChecked ?? now } });
      }
      case SignalKind.ALERT: {
        const parsed = parseWith(alertEventInputSchema, input);
        if (!parsed.ok) {
          return err(this.malformed(kind, parsed.error));
        }
        const { timestamp, ...rest } = parsed.value;
        return ok({ kind, event: { ...rest, timestamp: timestamp ?? now } });
      }
    }
  }
}
