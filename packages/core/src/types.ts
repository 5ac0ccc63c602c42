// Core type definitions for the signal pipeline

export enum SignalKind {
  METRIC = 'metric',
  SPAN = 'span',
  LOG = 'log',
  ALERT = 'alert',
  HEALTH = 'health',
}

export const SIGNAL_KINDS: readonly SignalKind[] = [
  SignalKind.METRIC,
  SignalKind.SPAN,
  SignalKind.LOG,
  SignalKind.ALERT,
  SignalKind.HEALTH,
];

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

export enum MetricType {
  COUNTER = 'counter',
  GAUGE = 'gauge',
  HISTOGRAM = 'histogram',
}

export type Tags = Readonly<Record<string, string>>;

/**
 * A single recorded measurement. Frozen once it enters the buffer.
 */
export interface MetricPoint {
  readonly name: string;
  readonly value: number;
  readonly unit: string;
  readonly tags: Tags;
  readonly timestamp: Date;
  readonly type: MetricType;
}

export interface HistogramBucket {
  /** Inclusive upper bound; the last bucket is unbounded. */
  le: number | '+Inf';
  /** Cumulative count of values <= le */
  count: number;
}

export interface Quantiles {
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

/**
 * Finalized aggregate of one series over one window.
 *
 * `value` is the counter delta for counters, the last value for gauges
 * and the mean for histograms.
 */
export interface MetricSnapshot {
  key: string;
  name: string;
  unit: string;
  tags: Tags;
  type: MetricType;
  windowStart: Date;
  windowEnd: Date;
  count: number;
  sum: number;
  min: number;
  max: number;
  last: number;
  value: number;
  /** Set when the window was cut short by shutdown */
  partial: boolean;
  buckets?: HistogramBucket[];
  quantiles?: Quantiles;
}

export type SnapshotStatistic = 'value' | 'count' | 'sum' | 'min' | 'max' | 'last' | keyof Quantiles;

// Distributed Tracing Types

export enum SpanStatus {
  OK = 'ok',
  ERROR = 'error',
  UNSET = 'unset',
}

export interface Span {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  service?: string;
  startTime: Date;
  endTime?: Date;
  status: SpanStatus;
  attributes?: Record<string, unknown>;
}

export enum TraceStatus {
  COMPLETE = 'complete',
  INCOMPLETE = 'incomplete',
}

export interface Trace {
  traceId: string;
  status: TraceStatus;
  rootSpanId?: string;
  startTime: Date;
  endTime?: Date;
  duration?: number; // in milliseconds
  spanCount: number;
  errorCount: number;
  /** Spans dropped because the trace hit its span limit */
  droppedSpans: number;
  spans: Span[];
}

// Alerting Types

export enum AlertSeverity {
  OK = 'ok',
  WARNING = 'warning',
  CRITICAL = 'critical',
}

/** Position of each severity on the ok -> warning -> critical lattice */
export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  [AlertSeverity.OK]: 0,
  [AlertSeverity.WARNING]: 1,
  [AlertSeverity.CRITICAL]: 2,
};

export const SEVERITY_LATTICE: readonly AlertSeverity[] = [
  AlertSeverity.OK,
  AlertSeverity.WARNING,
  AlertSeverity.CRITICAL,
];

export type Comparator = '>' | '>=' | '<' | '<=' | '==';

export interface MetricSelector {
  name: string;
  tags?: Record<string, string>;
}

export interface AlertRule {
  id: string;
  name?: string;
  metric: MetricSelector;
  statistic?: SnapshotStatistic;
  comparator: Comparator;
  threshold: number;
  severity: AlertSeverity.WARNING | AlertSeverity.CRITICAL;
  /** Consecutive windows below the current severity needed before a downgrade */
  hysteresisWindows?: number;
  /** Rules sharing a group drive one alert state. Defaults to the series key. */
  group?: string;
}

export interface AlertState {
  group: string;
  severity: AlertSeverity;
  lastTransitionAt?: Date;
  consecutiveBelow: number;
  unknown: boolean;
  unknownRules: string[];
}

export interface AlertEvent {
  group: string;
  from: AlertSeverity;
  to: AlertSeverity;
  timestamp: Date;
  /** Rules breached at the time of the transition */
  rules: string[];
  /** Observed statistic per rule id */
  values: Record<string, number>;
  message: string;
}

// Logs

export interface LogEntry {
  message: string;
  level: LogLevel;
  timestamp: Date;
  service?: string;
  correlationId?: string;
  fields: Record<string, unknown>;
}

// Health

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
  UNKNOWN = 'unknown',
}

export interface HealthCheck {
  component: string;
  status: HealthStatus.HEALTHY | HealthStatus.DEGRADED | HealthStatus.UNHEALTHY;
  lastChecked: Date;
  /** Component names, deduplicated */
  dependencies: string[];
  message?: string;
}

export interface ComponentHealth {
  component: string;
  reported?: HealthStatus;
  effective: HealthStatus;
  lastChecked?: Date;
  dependencies: string[];
  missingDependencies: string[];
  message?: string;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: Date;
  components: Record<string, ComponentHealth>;
  summary: Record<HealthStatus, number>;
}

// Ingestion buffer payloads

export type Signal =
  | { kind: SignalKind.METRIC; point: MetricPoint }
  | { kind: SignalKind.SPAN; span: Span }
  | { kind: SignalKind.LOG; entry: LogEntry }
  | { kind: SignalKind.ALERT; event: AlertEvent }
  | { kind: SignalKind.HEALTH; check: HealthCheck };

export type SignalOf<K extends SignalKind> = Extract<Signal, { kind: K }>;

// Export records

export type ExportRecord =
  | { kind: 'metric'; snapshot: MetricSnapshot }
  | { kind: 'trace'; trace: Trace }
  | { kind: 'alert'; event: AlertEvent }
  | { kind: 'log'; entry: LogEntry }
  | { kind: 'health'; check: HealthCheck };

export interface ExportBatch {
  id: string;
  sink: string;
  createdAt: Date;
  records: ExportRecord[];
}
