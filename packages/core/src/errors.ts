/**
 * Error types for the signal pipeline.
 *
 * Expected failures travel as `Result` values; these classes carry a stable
 * `code` so callers can branch without matching on messages.
 */

export class BeaconError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export enum IngestErrorCode {
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
  MALFORMED_SIGNAL = 'MALFORMED_SIGNAL',
  TRACE_CLOSED = 'TRACE_CLOSED',
}

export class IngestError extends BeaconError {
  declare readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }

  static capacityExceeded(kind: string, capacity: number): IngestError {
    return new IngestError(
      IngestErrorCode.CAPACITY_EXCEEDED,
      `Buffer for ${kind} signals is full (capacity ${capacity})`,
      { kind, capacity }
    );
  }

  static malformed(reason: string, details?: Record<string, unknown>): IngestError {
    return new IngestError(IngestErrorCode.MALFORMED_SIGNAL, reason, details);
  }

  static traceClosed(traceId: string, spanId: string): IngestError {
    return new IngestError(
      IngestErrorCode.TRACE_CLOSED,
      `Trace ${traceId} was already flushed; span ${spanId} dropped`,
      { traceId, spanId }
    );
  }
}

export enum SinkErrorCode {
  SINK_UNAVAILABLE = 'SINK_UNAVAILABLE',
  SINK_REJECTED = 'SINK_REJECTED',
}

export class SinkError extends BeaconError {
  declare readonly code: SinkErrorCode;

  constructor(code: SinkErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }

  /** Transient; the dispatcher retries */
  static unavailable(message: string, details?: Record<string, unknown>): SinkError {
    return new SinkError(SinkErrorCode.SINK_UNAVAILABLE, message, details);
  }

  /** Permanent; the batch is dead-lettered without retry */
  static rejected(message: string, details?: Record<string, unknown>): SinkError {
    return new SinkError(SinkErrorCode.SINK_REJECTED, message, details);
  }

  get retryable(): boolean {
    return this.code === SinkErrorCode.SINK_UNAVAILABLE;
  }
}

export const UNKNOWN_METRIC = 'UNKNOWN_METRIC';

export class NotifyError extends BeaconError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOTIFY_FAILED', message, details);
  }
}

export class ConfigError extends BeaconError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`, { issues });
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
