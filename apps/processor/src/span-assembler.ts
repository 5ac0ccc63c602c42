import { LRUCache } from 'lru-cache';
import {
  DEFAULT_CLOSED_TRACE_MEMORY,
  DEFAULT_MAX_SPANS_PER_TRACE,
  DEFAULT_TRACE_SAMPLE_RATE,
  IngestError,
  SpanStatus,
  TraceStatus,
  err,
  ok,
  resolveSampleRate,
  shouldSampleTrace,
  type Result,
  type Span,
  type Trace,
  type TraceSampleRates,
} from '@beacon/core';
import { systemClock, type Clock } from './clock';
import { componentLogger, type Logger } from './logger';

interface TraceState {
  traceId: string;
  spans: Map<string, Span>;
  /** Clock time the first span of the trace arrived */
  firstSeenAt: number;
  droppedSpans: number;
}

export interface SpanAssemblerConfig {
  traceTimeoutMs: number;
  maxSpansPerTrace?: number;
  /** How many closed trace ids to remember for late-span detection */
  closedTraceMemory?: number;
  sampleRate?: number;
  /** Overrides of `sampleRate` keyed by the root span's service or name */
  sampleRates?: TraceSampleRates;
  clock?: Clock;
  logger?: Logger;
  /** Receives each trace exactly once, when it completes or times out */
  onTrace: (trace: Trace) => void;
}

export interface SpanAssemblerStats {
  activeTraces: number;
  completed: number;
  timedOut: number;
  discarded: number;
  lateSpans: number;
  droppedSpans: number;
}

export function assembleTrace(
  traceId: string,
  spans: readonly Span[],
  status: TraceStatus,
  droppedSpans: number = 0
): Trace {
  const ordered = [...spans].sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
  const root = ordered.find((span) => !span.parentSpanId);
  const startTime = new Date(Math.min(...ordered.map((span) => span.startTime.getTime())));
  const endTimes = ordered.flatMap((span) => (span.endTime ? [span.endTime.getTime()] : []));
  const endTime = endTimes.length > 0 ? new Date(Math.max(...endTimes)) : undefined;

  return {
    traceId,
    status,
    rootSpanId: root?.spanId,
    startTime,
    endTime,
    duration: endTime ? endTime.getTime() - startTime.getTime() : undefined,
    spanCount: ordered.length,
    errorCount: ordered.filter((span) => span.status === SpanStatus.ERROR).length,
    droppedSpans,
    spans: ordered,
  };
}

/**
 * Correlates spans into traces by trace id.
 *
 * A trace closes when its root span ends, or after `traceTimeoutMs` without
 * that happening (flushed as incomplete). Either way it closes once: the id
 * goes into a bounded LRU and later spans for it are refused.
 */
export class SpanAssembler {
  private traces: Map<string, TraceState> = new Map();
  private readonly closed: LRUCache<string, TraceStatus>;
  private readonly timeoutMs: number;
  private readonly maxSpans: number;
  private readonly sampleRate: number;
  private readonly sampleRates: TraceSampleRates;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onTrace: (trace: Trace) => void;
  private counters = { completed: 0, timedOut: 0, discarded: 0, lateSpans: 0, droppedSpans: 0 };

  constructor(config: SpanAssemblerConfig) {
    this.timeoutMs = config.traceTimeoutMs;
    this.maxSpans = config.maxSpansPerTrace ?? DEFAULT_MAX_SPANS_PER_TRACE;
    this.sampleRate = config.sampleRate ?? DEFAULT_TRACE_SAMPLE_RATE;
    this.sampleRates = config.sampleRates ?? {};
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? componentLogger('span-assembler');
    this.onTrace = config.onTrace;
    this.closed = new LRUCache({ max: config.closedTraceMemory ?? DEFAULT_CLOSED_TRACE_MEMORY });
  }

  ingest(span: Span): Result<void, IngestError> {
    if (this.closed.has(span.traceId)) {
      this.counters.lateSpans++;
      this.logger.warn(
        { traceId: span.traceId, spanId: span.spanId, closedAs: this.closed.get(span.traceId) },
        'Dropping span for a trace that was already flushed'
      );
      return err(IngestError.traceClosed(span.traceId, span.spanId));
    }

    let state = this.traces.get(span.traceId);
    if (!state) {
      state = {
        traceId: span.traceId,
        spans: new Map(),
        firstSeenAt: this.clock.now(),
        droppedSpans: 0,
      };
      this.traces.set(span.traceId, state);
    }

    if (!state.spans.has(span.spanId) && state.spans.size >= this.maxSpans) {
      state.droppedSpans++;
      this.counters.droppedSpans++;
      if (state.droppedSpans === 1) {
        this.logger.warn({ traceId: span.traceId, maxSpans: this.maxSpans }, 'Trace span limit reached');
      }
      return ok(undefined);
    }

    state.spans.set(span.spanId, span);

    if (!span.parentSpanId && span.endTime) {
      this.close(state, TraceStatus.COMPLETE);
    }

    return ok(undefined);
  }

  /**
   * Force-flush traces whose first span arrived at least `traceTimeoutMs` ago.
   */
  sweep(now: number = this.clock.now()): Trace[] {
    const flushed: Trace[] = [];
    for (const state of [...this.traces.values()]) {
      if (now - state.firstSeenAt >= this.timeoutMs) {
        flushed.push(this.close(state, TraceStatus.INCOMPLETE));
      }
    }
    if (flushed.length > 0) {
      this.logger.debug({ count: flushed.length }, 'Flushed timed out traces');
    }
    return flushed;
  }

  /**
   * Flush every open trace as incomplete. Used on shutdown.
   */
  flushAll(): Trace[] {
    return [...this.traces.values()].map((state) => this.close(state, TraceStatus.INCOMPLETE));
  }

  isOpen(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  stats(): SpanAssemblerStats {
    return { ...this.counters, activeTraces: this.traces.size };
  }

  private close(state: TraceState, status: TraceStatus): Trace {
    this.traces.delete(state.traceId);
    this.closed.set(state.traceId, status);

    const trace = assembleTrace(state.traceId, [...state.spans.values()], status, state.droppedSpans);

    if (status === TraceStatus.COMPLETE) {
      this.counters.completed++;
    } else {
      this.counters.timedOut++;
    }

    // A rootless trace is sampled by its earliest span
    const root = trace.spans.find((span) => span.spanId === trace.rootSpanId) ?? trace.spans[0];
    const rate = resolveSampleRate(this.sampleRate, this.sampleRates, root);
    if (trace.errorCount === 0 && !shouldSampleTrace(trace.traceId, rate)) {
      this.counters.discarded++;
      return trace;
    }

    this.onTrace(trace);
    return trace;
  }
}
