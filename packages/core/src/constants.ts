// Default tuning for the signal pipeline

export const DEFAULT_WINDOW_INTERVAL_MS = 10_000;
export const DEFAULT_BUFFER_CAPACITY = 10_000;
export const DEFAULT_TRACE_TIMEOUT_MS = 30_000;
export const DEFAULT_ALERT_HYSTERESIS_WINDOWS = 3;
export const DEFAULT_SERIES_IDLE_WINDOWS = 6;
export const DEFAULT_MAX_SPANS_PER_TRACE = 1000;
export const DEFAULT_CLOSED_TRACE_MEMORY = 10_000;

// Export retry (exponential backoff)
export const DEFAULT_RETRY_BASE_MS = 200;
export const DEFAULT_RETRY_CAP_MS = 5000;
export const DEFAULT_RETRY_MAX_ATTEMPTS = 5;

export const DEFAULT_EXPORT_BATCH_SIZE = 500;
export const DEFAULT_EXPORT_QUEUE_CAPACITY = 10_000;
export const DEFAULT_SINK_PUSH_TIMEOUT_MS = 10_000;

export const DEFAULT_DRAIN_INTERVAL_MS = 100;
export const DEFAULT_SWEEP_INTERVAL_MS = 1000;
export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;
export const DEFAULT_HEALTH_STALE_AFTER_MS = 60_000;

// Trace Sampling
export const DEFAULT_TRACE_SAMPLE_RATE = 1.0; // 100% by default (no sampling)

// Upper bounds in the unit the histogram is recorded in (typically ms)
export const DEFAULT_HISTOGRAM_BUCKETS: readonly number[] = [
  5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000,
];

// Counter derived from ingested log entries
export const LOG_ENTRIES_METRIC = 'log_entries';
