// Distributed Tracing Utilities

/**
 * Per-service and per-operation overrides of the default trace sample rate
 */
export interface TraceSampleRates {
  services?: Record<string, number>;
  operations?: Record<string, number>;
}

/**
 * Map a trace ID onto [0, 1) with FNV-1a so every collector makes the same
 * sampling decision for the same trace.
 */
export function traceSampleScore(traceId: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < traceId.length; i++) {
    hash ^= traceId.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash / 0x100000000;
}

export function shouldSampleTrace(traceId: string, sampleRate: number): boolean {
  if (sampleRate >= 1) {
    return true;
  }
  if (sampleRate <= 0) {
    return false;
  }
  return traceSampleScore(traceId) < sampleRate;
}

/**
 * Pick the sample rate for a trace from its root span. The most specific
 * override wins: operation, then service, then the default.
 */
export function resolveSampleRate(
  defaultRate: number,
  rates: TraceSampleRates,
  root: { service?: string; name?: string } = {}
): number {
  const operationRate = root.name === undefined ? undefined : rates.operations?.[root.name];
  if (operationRate !== undefined) {
    return operationRate;
  }
  const serviceRate = root.service === undefined ? undefined : rates.services?.[root.service];
  if (serviceRate !== undefined) {
    return serviceRate;
  }
  return defaultRate;
}
