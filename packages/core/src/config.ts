import { z } from 'zod';
import {
  DEFAULT_ALERT_HYSTERESIS_WINDOWS,
  DEFAULT_BUFFER_CAPACITY,
  DEFAULT_CLOSED_TRACE_MEMORY,
  DEFAULT_DRAIN_INTERVAL_MS,
  DEFAULT_EXPORT_BATCH_SIZE,
  DEFAULT_EXPORT_QUEUE_CAPACITY,
  DEFAULT_HEALTH_STALE_AFTER_MS,
  DEFAULT_HISTOGRAM_BUCKETS,
  DEFAULT_MAX_SPANS_PER_TRACE,
  DEFAULT_RETRY_BASE_MS,
  DEFAULT_RETRY_CAP_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_SERIES_IDLE_WINDOWS,
  DEFAULT_SHUTDOWN_GRACE_MS,
  DEFAULT_SINK_PUSH_TIMEOUT_MS,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_TRACE_SAMPLE_RATE,
  DEFAULT_TRACE_TIMEOUT_MS,
  DEFAULT_WINDOW_INTERVAL_MS,
} from './constants';
import { ConfigError } from './errors';
import { formatIssues } from './validation';

export type BackpressurePolicy = 'reject' | 'drop-oldest';

const positiveInt = z.coerce.number().int().positive();
const sampleRate = z.coerce.number().min(0).max(1);

const sinkSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('console') }),
  z.object({ type: z.literal('file'), path: z.string().min(1) }),
  z.object({
    type: z.literal('http'),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional(),
  }),
]);

export type SinkConfig = z.infer<typeof sinkSchema>;

export const configSchema = z
  .object({
    serviceName: z.string().min(1).default('beacon'),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    windowIntervalMs: positiveInt.default(DEFAULT_WINDOW_INTERVAL_MS),
    bufferCapacity: positiveInt.default(DEFAULT_BUFFER_CAPACITY),
    backpressurePolicy: z.enum(['reject', 'drop-oldest']).default('reject'),
    traceTimeoutMs: positiveInt.default(DEFAULT_TRACE_TIMEOUT_MS),
    alertHysteresisWindows: positiveInt.default(DEFAULT_ALERT_HYSTERESIS_WINDOWS),
    retryBackoff: z
      .object({
        baseMs: positiveInt.default(DEFAULT_RETRY_BASE_MS),
        capMs: positiveInt.default(DEFAULT_RETRY_CAP_MS),
        maxAttempts: positiveInt.default(DEFAULT_RETRY_MAX_ATTEMPTS),
      })
      .default({}),
    exportBatchSize: positiveInt.default(DEFAULT_EXPORT_BATCH_SIZE),
    exportQueueCapacity: positiveInt.default(DEFAULT_EXPORT_QUEUE_CAPACITY),
    sinkPushTimeoutMs: positiveInt.default(DEFAULT_SINK_PUSH_TIMEOUT_MS),
    drainIntervalMs: positiveInt.default(DEFAULT_DRAIN_INTERVAL_MS),
    sweepIntervalMs: positiveInt.default(DEFAULT_SWEEP_INTERVAL_MS),
    seriesIdleWindows: positiveInt.default(DEFAULT_SERIES_IDLE_WINDOWS),
    maxSpansPerTrace: positiveInt.default(DEFAULT_MAX_SPANS_PER_TRACE),
    closedTraceMemory: positiveInt.default(DEFAULT_CLOSED_TRACE_MEMORY),
    traceSampleRate: sampleRate.default(DEFAULT_TRACE_SAMPLE_RATE),
    traceSampleRates: z
      .object({
        services: z.record(z.string().min(1), sampleRate).default({}),
        operations: z.record(z.string().min(1), sampleRate).default({}),
      })
      .default({}),
    histogramBuckets: z
      .array(z.number().finite())
      .min(1)
      .default([...DEFAULT_HISTOGRAM_BUCKETS])
      .refine((buckets) => buckets.every((b, i) => i === 0 || b > buckets[i - 1]), {
        message: 'Histogram buckets must be strictly increasing',
      }),
    healthStaleAfterMs: positiveInt.default(DEFAULT_HEALTH_STALE_AFTER_MS),
    shutdownGraceMs: positiveInt.default(DEFAULT_SHUTDOWN_GRACE_MS),
    sinks: z.array(sinkSchema).default([{ type: 'console' }]),
    deadLetterPath: z.string().min(1).optional(),
    alertRulesPath: z.string().min(1).optional(),
    alertWebhookUrl: z.string().url().optional(),
    apiPort: positiveInt.default(3000),
    apiKey: z.string().min(1).optional(),
  })
  .refine((config) => config.retryBackoff.capMs >= config.retryBackoff.baseMs, {
    message: 'retryBackoff.capMs must be >= retryBackoff.baseMs',
    path: ['retryBackoff', 'capMs'],
  });

export type BeaconConfig = z.infer<typeof configSchema>;
export type BeaconConfigInput = z.input<typeof configSchema>;

type Env = Record<string, string | undefined>;

export interface EnvConfigInput {
  [key: string]: unknown;
  retryBackoff?: Record<string, unknown>;
  traceSampleRates?: Record<string, unknown>;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Parse `name=rate` pairs such as `checkout=0.1,GET /health=0`. The last
 * `=` separates the rate, so names may contain one.
 */
function parseRates(value: string): Record<string, string> {
  const rates: Record<string, string> = {};
  for (const entry of splitList(value)) {
    const separator = entry.lastIndexOf('=');
    if (separator > 0) {
      rates[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
    } else {
      rates[entry] = '';
    }
  }
  return rates;
}

/**
 * Parse `BEACON_SINKS`, a comma-separated list such as
 * `console,file:/var/log/beacon.jsonl,http:https://collector.example/ingest`
 */
function parseSinks(value: string): unknown[] {
  return splitList(value).map((entry) => {
    const separator = entry.indexOf(':');
    const type = separator === -1 ? entry : entry.slice(0, separator);
    const target = separator === -1 ? undefined : entry.slice(separator + 1);
    if (type === 'file') {
      return { type, path: target };
    }
    if (type === 'http') {
      return { type, url: target };
    }
    return { type };
  });
}

/**
 * Translate `BEACON_*` environment variables into config input.
 * Unset variables are left out so schema defaults apply.
 */
export function configFromEnv(env: Env): EnvConfigInput {
  const input: EnvConfigInput = {};
  const retryBackoff: Record<string, unknown> = {};

  const simple: Array<[string, string]> = [
    ['BEACON_SERVICE_NAME', 'serviceName'],
    ['LOG_LEVEL', 'logLevel'],
    ['BEACON_WINDOW_INTERVAL_MS', 'windowIntervalMs'],
    ['BEACON_BUFFER_CAPACITY', 'bufferCapacity'],
    ['BEACON_BACKPRESSURE_POLICY', 'backpressurePolicy'],
    ['BEACON_TRACE_TIMEOUT_MS', 'traceTimeoutMs'],
    ['BEACON_ALERT_HYSTERESIS_WINDOWS', 'alertHysteresisWindows'],
    ['BEACON_EXPORT_BATCH_SIZE', 'exportBatchSize'],
    ['BEACON_EXPORT_QUEUE_CAPACITY', 'exportQueueCapacity'],
    ['BEACON_SINK_PUSH_TIMEOUT_MS', 'sinkPushTimeoutMs'],
    ['BEACON_DRAIN_INTERVAL_MS', 'drainIntervalMs'],
    ['BEACON_SWEEP_INTERVAL_MS', 'sweepIntervalMs'],
    ['BEACON_SERIES_IDLE_WINDOWS', 'seriesIdleWindows'],
    ['BEACON_MAX_SPANS_PER_TRACE', 'maxSpansPerTrace'],
    ['BEACON_CLOSED_TRACE_MEMORY', 'closedTraceMemory'],
    ['BEACON_TRACE_SAMPLE_RATE', 'traceSampleRate'],
    ['BEACON_HEALTH_STALE_AFTER_MS', 'healthStaleAfterMs'],
    ['BEACON_SHUTDOWN_GRACE_MS', 'shutdownGraceMs'],
    ['BEACON_DEAD_LETTER_PATH', 'deadLetterPath'],
    ['BEACON_ALERT_RULES_PATH', 'alertRulesPath'],
    ['BEACON_ALERT_WEBHOOK_URL', 'alertWebhookUrl'],
    ['BEACON_API_PORT', 'apiPort'],
    ['BEACON_API_KEY', 'apiKey'],
  ];

  for (const [variable, key] of simple) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      input[key] = value;
    }
  }

  const retry: Array<[string, string]> = [
    ['BEACON_RETRY_BASE_MS', 'baseMs'],
    ['BEACON_RETRY_CAP_MS', 'capMs'],
    ['BEACON_RETRY_MAX_ATTEMPTS', 'maxAttempts'],
  ];
  for (const [variable, key] of retry) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      retryBackoff[key] = value;
    }
  }
  if (Object.keys(retryBackoff).length > 0) {
    input.retryBackoff = retryBackoff;
  }

  if (env.BEACON_HISTOGRAM_BUCKETS) {
    input.histogramBuckets = splitList(env.BEACON_HISTOGRAM_BUCKETS).map(Number);
  }
  const sampleRates: Record<string, unknown> = {};
  if (env.BEACON_TRACE_SAMPLE_RATES_SERVICES) {
    sampleRates.services = parseRates(env.BEACON_TRACE_SAMPLE_RATES_SERVICES);
  }
  if (env.BEACON_TRACE_SAMPLE_RATES_OPERATIONS) {
    sampleRates.operations = parseRates(env.BEACON_TRACE_SAMPLE_RATES_OPERATIONS);
  }
  if (Object.keys(sampleRates).length > 0) {
    input.traceSampleRates = sampleRates;
  }

  if (env.BEACON_SINKS) {
    input.sinks = parseSinks(env.BEACON_SINKS);
  }

  return input;
}

/**
 * Build the runtime configuration from the environment plus explicit
 * overrides (overrides win). Throws `ConfigError` listing every issue.
 */
export function loadConfig(env: Env = process.env, overrides: BeaconConfigInput = {}): BeaconConfig {
  const fromEnv = configFromEnv(env);
  const merged = {
    ...fromEnv,
    ...overrides,
    retryBackoff: { ...fromEnv.retryBackoff, ...overrides.retryBackoff },
    traceSampleRates: { ...fromEnv.traceSampleRates, ...overrides.traceSampleRates },
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}
