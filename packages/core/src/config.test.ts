import { describe, it, expect } from 'vitest';
import { configFromEnv, loadConfig } from './config';
import { ConfigError } from './errors';
import { DEFAULT_HISTOGRAM_BUCKETS } from './constants';

describe('loadConfig', () => {
  it('should apply defaults with an empty environment', () => {
    const config = loadConfig({});

    expect(config.windowIntervalMs).toBe(10000);
    expect(config.bufferCapacity).toBe(10000);
    expect(config.backpressurePolicy).toBe('reject');
    expect(config.traceTimeoutMs).toBe(30000);
    expect(config.alertHysteresisWindows).toBe(3);
    expect(config.retryBackoff).toEqual({ baseMs: 200, capMs: 5000, maxAttempts: 5 });
    expect(config.histogramBuckets).toEqual([...DEFAULT_HISTOGRAM_BUCKETS]);
    expect(config.sinks).toEqual([{ type: 'console' }]);
  });

  it('should read and coerce environment variables', () => {
    const config = loadConfig({
      BEACON_WINDOW_INTERVAL_MS: '5000',
      BEACON_BACKPRESSURE_POLICY: 'drop-oldest',
      BEACON_RETRY_MAX_ATTEMPTS: '2',
      BEACON_HISTOGRAM_BUCKETS: '1, 2, 4',
      BEACON_SINKS: 'console,file:/tmp/out.jsonl,http:http://localhost:4318/ingest',
    });

    expect(config.windowIntervalMs).toBe(5000);
    expect(config.backpressurePolicy).toBe('drop-oldest');
    expect(config.retryBackoff).toEqual({ baseMs: 200, capMs: 5000, maxAttempts: 2 });
    expect(config.histogramBuckets).toEqual([1, 2, 4]);
    expect(config.sinks).toEqual([
      { type: 'console' },
      { type: 'file', path: '/tmp/out.jsonl' },
      { type: 'http', url: 'http://localhost:4318/ingest' },
    ]);
  });

  it('should read per-service and per-operation trace sample rates', () => {
    const config = loadConfig({
      BEACON_TRACE_SAMPLE_RATE: '0.2',
      BEACON_TRACE_SAMPLE_RATES_SERVICES: 'checkout=0.5, auth=1',
      BEACON_TRACE_SAMPLE_RATES_OPERATIONS: 'GET /health=0',
    });

    expect(config.traceSampleRate).toBe(0.2);
    expect(config.traceSampleRates).toEqual({
      services: { checkout: 0.5, auth: 1 },
      operations: { 'GET /health': 0 },
    });
  });

  it('should default trace sample rate overrides to empty maps', () => {
    expect(loadConfig({}).traceSampleRates).toEqual({ services: {}, operations: {} });
  });

  it('should reject a sample rate override outside [0, 1]', () => {
    expect(() => loadConfig({ BEACON_TRACE_SAMPLE_RATES_SERVICES: 'checkout=1.5' })).toThrow(ConfigError);
  });

  it('should let overrides win over the environment', () => {
    const config = loadConfig(
      { BEACON_BUFFER_CAPACITY: '50', BEACON_RETRY_BASE_MS: '100' },
      { bufferCapacity: 5, retryBackoff: { capMs: 400 } }
    );

    expect(config.bufferCapacity).toBe(5);
    expect(config.retryBackoff).toEqual({ baseMs: 100, capMs: 400, maxAttempts: 5 });
  });

  it('should throw a ConfigError listing every issue', () => {
    expect(() =>
      loadConfig({ BEACON_BACKPRESSURE_POLICY: 'block', BEACON_BUFFER_CAPACITY: '-1' })
    ).toThrow(ConfigError);

    try {
      loadConfig({ BEACON_BACKPRESSURE_POLICY: 'block', BEACON_BUFFER_CAPACITY: '-1' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(2);
        expect(error.code).toBe('CONFIG_INVALID');
      }
    }
  });

  it('should reject a retry cap below the base delay', () => {
    expect(() => loadConfig({}, { retryBackoff: { baseMs: 1000, capMs: 500 } })).toThrow(
      'retryBackoff.capMs: retryBackoff.capMs must be >= retryBackoff.baseMs'
    );
  });

  it('should reject unordered histogram buckets', () => {
    expect(() => loadConfig({ BEACON_HISTOGRAM_BUCKETS: '10,5' })).toThrow(ConfigError);
  });
});

describe('configFromEnv', () => {
  it('should leave out unset and empty variables', () => {
    expect(configFromEnv({ BEACON_API_KEY: '', BEACON_API_PORT: '8080' })).toEqual({ apiPort: '8080' });
  });
});
