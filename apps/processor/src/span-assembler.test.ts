import { describe, it, expect, beforeEach } from 'vitest';
import { SpanAssembler, assembleTrace } from './span-assembler';
import { IngestErrorCode, SpanStatus, TraceStatus, type Span, type Trace } from '@beacon/core';
import type { Clock } from './clock';

const BASE_TIME = Date.parse('2024-01-01T00:00:00Z');

class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

function span(spanId: string, options: Partial<Span> & { start?: number; end?: number } = {}): Span {
  const { start = 0, end, ...rest } = options;
  return {
    traceId: 'trace-1',
    spanId,
    name: `op-${spanId}`,
    startTime: new Date(BASE_TIME + start),
    endTime: end === undefined ? undefined : new Date(BASE_TIME + end),
    status: SpanStatus.OK,
    ...rest,
  };
}

describe('SpanAssembler', () => {
  let clock: ManualClock;
  let flushed: Trace[];
  let assembler: SpanAssembler;

  beforeEach(() => {
    clock = new ManualClock(BASE_TIME);
    flushed = [];
    assembler = new SpanAssembler({
      traceTimeoutMs: 30000,
      clock,
      onTrace: (trace) => flushed.push(trace),
    });
  });

  it('should flush a trace once when its root ends before the timeout and refuse a child at +35s', () => {
    clock.advance(1000);
    expect(assembler.ingest(span('root', { start: 0, end: 1000 })).ok).toBe(true);

    clock.advance(29000);
    expect(assembler.sweep()).toEqual([]);

    clock.advance(5000);
    const late = assembler.ingest(span('child', { parentSpanId: 'root', start: 500, end: 35000 }));

    expect(flushed.map((trace) => trace.status)).toEqual([TraceStatus.COMPLETE]);
    expect(late.ok).toBe(false);
    if (!late.ok) {
      expect(late.error.code).toBe(IngestErrorCode.TRACE_CLOSED);
    }
    expect(assembler.stats().lateSpans).toBe(1);
  });

  it('should complete a trace when its root span ends', () => {
    assembler.ingest(span('child', { parentSpanId: 'root', start: 100, end: 400 }));
    expect(flushed).toHaveLength(0);

    assembler.ingest(span('root', { start: 0, end: 1000 }));

    expect(flushed).toHaveLength(1);
    expect(flushed[0].status).toBe(TraceStatus.COMPLETE);
    expect(flushed[0].rootSpanId).toBe('root');
    expect(flushed[0].spanCount).toBe(2);
    expect(flushed[0].duration).toBe(1000);
    expect(flushed[0].spans.map((s) => s.spanId)).toEqual(['root', 'child']);
    expect(assembler.isOpen('trace-1')).toBe(false);
  });

  it('should keep a trace open while the root span has no end time', () => {
    assembler.ingest(span('root', { start: 0 }));

    expect(flushed).toHaveLength(0);
    expect(assembler.isOpen('trace-1')).toBe(true);
  });

  it('should flush a trace as incomplete once the timeout elapses', () => {
    assembler.ingest(span('child', { parentSpanId: 'root', start: 0, end: 200 }));

    clock.advance(29999);
    expect(assembler.sweep()).toHaveLength(0);

    clock.advance(1);
    const swept = assembler.sweep();

    expect(swept).toHaveLength(1);
    expect(flushed).toHaveLength(1);
    expect(flushed[0].status).toBe(TraceStatus.INCOMPLETE);
    expect(flushed[0].rootSpanId).toBeUndefined();
    expect(assembler.stats().timedOut).toBe(1);
  });

  it('should refuse a span that arrives after its trace was flushed', () => {
    assembler.ingest(span('child', { parentSpanId: 'root', start: 0, end: 200 }));
    clock.advance(30000);
    assembler.sweep();

    clock.advance(5000);
    const result = assembler.ingest(span('late', { parentSpanId: 'root', start: 300, end: 400 }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(IngestErrorCode.TRACE_CLOSED);
    }
    expect(flushed).toHaveLength(1);
    expect(assembler.isOpen('trace-1')).toBe(false);
    expect(assembler.stats().lateSpans).toBe(1);
  });

  it('should flush each trace exactly once', () => {
    assembler.ingest(span('root', { start: 0, end: 1000 }));
    clock.advance(60000);
    assembler.sweep();
    assembler.flushAll();

    expect(flushed).toHaveLength(1);
  });

  it('should drop spans beyond the per-trace limit', () => {
    const limited = new SpanAssembler({
      traceTimeoutMs: 30000,
      maxSpansPerTrace: 2,
      clock,
      onTrace: (trace) => flushed.push(trace),
    });

    limited.ingest(span('a', { parentSpanId: 'root' }));
    limited.ingest(span('b', { parentSpanId: 'root' }));
    limited.ingest(span('c', { parentSpanId: 'root' }));
    limited.flushAll();

    expect(flushed[0].spanCount).toBe(2);
    expect(flushed[0].droppedSpans).toBe(1);
    expect(limited.stats().droppedSpans).toBe(1);
  });

  it('should discard unsampled traces but keep those with errors', () => {
    const sampled = new SpanAssembler({
      traceTimeoutMs: 30000,
      sampleRate: 0,
      clock,
      onTrace: (trace) => flushed.push(trace),
    });

    sampled.ingest(span('root', { traceId: 'quiet', end: 10 }));
    sampled.ingest(span('root', { traceId: 'failing', end: 10, status: SpanStatus.ERROR }));

    expect(flushed.map((t) => t.traceId)).toEqual(['failing']);
    expect(flushed[0].errorCount).toBe(1);
    expect(sampled.stats().discarded).toBe(1);
    expect(sampled.stats().completed).toBe(2);
  });

  it('should sample by operation, then service, then the default rate', () => {
    const sampled = new SpanAssembler({
      traceTimeoutMs: 30000,
      sampleRate: 0,
      sampleRates: {
        services: { checkout: 1 },
        operations: { 'GET /health': 0, 'GET /export': 1 },
      },
      clock,
      onTrace: (trace) => flushed.push(trace),
    });

    sampled.ingest(span('root', { traceId: 'cart', service: 'checkout', name: 'POST /cart', end: 10 }));
    sampled.ingest(span('root', { traceId: 'health', service: 'checkout', name: 'GET /health', end: 10 }));
    sampled.ingest(span('root', { traceId: 'query', service: 'search', name: 'GET /q', end: 10 }));
    sampled.ingest(span('root', { traceId: 'export', service: 'search', name: 'GET /export', end: 10 }));

    expect(flushed.map((t) => t.traceId)).toEqual(['cart', 'export']);
    expect(sampled.stats().discarded).toBe(2);
  });

  it('should flush open traces as incomplete on shutdown', () => {
    assembler.ingest(span('root', { traceId: 'a' }));
    assembler.ingest(span('root', { traceId: 'b' }));

    const traces = assembler.flushAll();

    expect(traces.map((t) => t.status)).toEqual([TraceStatus.INCOMPLETE, TraceStatus.INCOMPLETE]);
    expect(assembler.stats().activeTraces).toBe(0);
  });
});

describe('assembleTrace', () => {
  it('should leave end time and duration unset when no span has ended', () => {
    const trace = assembleTrace('t', [span('root', { start: 50 })], TraceStatus.INCOMPLETE);

    expect(trace.startTime.getTime()).toBe(BASE_TIME + 50);
    expect(trace.endTime).toBeUndefined();
    expect(trace.duration).toBeUndefined();
  });
});
