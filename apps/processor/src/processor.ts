import {
  EventBus,
  LOG_ENTRIES_METRIC,
  MetricType,
  SignalKind,
  errorMessage,
  normalizeTags,
  type AlertEvent,
  type AlertRule,
  type BeaconConfig,
  type ExportRecord,
  type HealthReport,
  type MetricSnapshot,
  type Trace,
} from '@beacon/core';
import { IngestionBuffer, type BufferStats } from './ingestion-buffer';
import { Collector, type CollectorStats } from './collector';
import { MetricAggregator, type AggregatorStats } from './aggregator';
import { SpanAssembler, type SpanAssemblerStats } from './span-assembler';
import { AlertEvaluator, type AlertEvaluatorStats } from './alert-evaluator';
import { ExportDispatcher, type ExportSink, type LaneStats } from './export-dispatcher';
import { HealthRegistry } from './health-registry';
import { FileDeadLetterLog, LoggerDeadLetterLog, type DeadLetterLog } from './dead-letter';
import { LogNotifier, WebhookNotifier, type AlertNotifier } from './notifiers';
import { createSink } from './sinks';
import { systemClock, type Clock, type Sleep } from './clock';
import { componentLogger, type Logger } from './logger';

export interface ProcessorDependencies {
  /** Defaults to the sinks named in config */
  sinks?: ExportSink[];
  /** Defaults to a log notifier, plus a webhook notifier when configured */
  notifiers?: AlertNotifier[];
  deadLetter?: DeadLetterLog;
  rules?: AlertRule[];
  clock?: Clock;
  sleep?: Sleep;
  bus?: EventBus;
  logger?: Logger;
}

export interface ProcessorStats {
  running: boolean;
  buffer: BufferStats;
  collector: CollectorStats;
  aggregator: AggregatorStats;
  traces: SpanAssemblerStats;
  alerts: AlertEvaluatorStats;
  export: { sinks: Record<string, LaneStats>; droppedAfterStop: number };
  pipeline: {
    windowPasses: number;
    skippedWindowPasses: number;
    notifyFailures: number;
  };
}

/**
 * Owns the pipeline: ingestion buffer, aggregator, span assembler, alert
 * evaluator, health registry and export dispatcher, plus the timers that
 * move signals between them.
 */
export class Processor {
  readonly bus: EventBus;
  readonly buffer: IngestionBuffer;
  readonly collector: Collector;
  readonly aggregator: MetricAggregator;
  readonly assembler: SpanAssembler;
  readonly evaluator: AlertEvaluator;
  readonly health: HealthRegistry;
  readonly dispatcher: ExportDispatcher;

  private readonly config: BeaconConfig;
  private readonly notifiers: AlertNotifier[];
  private readonly clock: Clock;
  private readonly logger: Logger;
  private timers: Array<ReturnType<typeof setInterval>> = [];
  private windowTimer?: ReturnType<typeof setTimeout>;
  private windowPass?: Promise<void>;
  private lastEvaluatedBoundary?: number;
  private running = false;
  private stopping?: Promise<void>;
  private counters = { windowPasses: 0, skippedWindowPasses: 0, notifyFailures: 0 };

  constructor(config: BeaconConfig, deps: ProcessorDependencies = {}) {
    this.config = config;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? componentLogger('processor');
    this.bus = deps.bus ?? new EventBus();

    this.buffer = new IngestionBuffer({
      capacity: config.bufferCapacity,
      policy: config.backpressurePolicy,
      logger: this.logger.child({ component: 'ingestion-buffer' }),
    });
    this.collector = new Collector({
      buffer: this.buffer,
      clock: this.clock,
      bus: this.bus,
      logger: this.logger.child({ component: 'collector' }),
    });
    this.aggregator = new MetricAggregator({
      windowIntervalMs: config.windowIntervalMs,
      histogramBuckets: config.histogramBuckets,
      seriesIdleWindows: config.seriesIdleWindows,
      logger: this.logger.child({ component: 'aggregator' }),
    });
    this.assembler = new SpanAssembler({
      traceTimeoutMs: config.traceTimeoutMs,
      maxSpansPerTrace: config.maxSpansPerTrace,
      closedTraceMemory: config.closedTraceMemory,
      sampleRate: config.traceSampleRate,
      sampleRates: config.traceSampleRates,
      clock: this.clock,
      logger: this.logger.child({ component: 'span-assembler' }),
      onTrace: (trace) => this.handleTrace(trace),
    });
    this.evaluator = new AlertEvaluator({
      rules: deps.rules ?? [],
      hysteresisWindows: config.alertHysteresisWindows,
      logger: this.logger.child({ component: 'alert-evaluator' }),
    });
    this.health = new HealthRegistry({ staleAfterMs: config.healthStaleAfterMs });
    this.dispatcher = new ExportDispatcher({
      sinks: deps.sinks ?? config.sinks.map(createSink),
      deadLetter:
        deps.deadLetter ??
        (config.deadLetterPath ? new FileDeadLetterLog(config.deadLetterPath) : new LoggerDeadLetterLog()),
      batchSize: config.exportBatchSize,
      queueCapacity: config.exportQueueCapacity,
      retry: config.retryBackoff,
      pushTimeoutMs: config.sinkPushTimeoutMs,
      sleep: deps.sleep,
      bus: this.bus,
      logger: this.logger.child({ component: 'export-dispatcher' }),
    });

    this.notifiers = deps.notifiers ?? [
      new LogNotifier(this.logger.child({ component: 'alerts' })),
      ...(config.alertWebhookUrl ? [new WebhookNotifier(config.alertWebhookUrl)] : []),
    ];
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;

    this.timers.push(setInterval(() => this.drain(), this.config.drainIntervalMs));
    this.timers.push(setInterval(() => this.sweep(), this.config.sweepIntervalMs));
    this.scheduleWindowTick();

    this.logger.info(
      {
        windowIntervalMs: this.config.windowIntervalMs,
        sinks: Object.keys(this.dispatcher.stats().sinks),
        rules: this.evaluator.stats().rules,
      },
      'Processor started'
    );
  }

  /**
   * Move everything buffered to its consumer. Runs on the drain timer;
   * callable directly to process synchronously.
   */
  drain(): void {
    const records: ExportRecord[] = [];
    const alerts: AlertEvent[] = [];

    for (const { point } of this.buffer.drain(SignalKind.METRIC)) {
      const result = this.aggregator.ingest(point);
      if (!result.ok) {
        this.collector.countRejection(SignalKind.METRIC, result.error);
      }
    }

    for (const { span } of this.buffer.drain(SignalKind.SPAN)) {
      const result = this.assembler.ingest(span);
      if (!result.ok) {
        this.collector.countRejection(SignalKind.SPAN, result.error);
      }
    }

    for (const { entry } of this.buffer.drain(SignalKind.LOG)) {
      records.push({ kind: 'log', entry });
      this.countLogEntry(entry.level, entry.service);
    }

    for (const { check } of this.buffer.drain(SignalKind.HEALTH)) {
      this.health.record(check);
      records.push({ kind: 'health', check });
    }

    for (const { event } of this.buffer.drain(SignalKind.ALERT)) {
      alerts.push(event);
    }

    this.dispatcher.submit(records);
    this.publishAlerts(alerts).catch((error: unknown) => {
      this.logger.error({ error: errorMessage(error) }, 'Failed to publish alert events');
    });
  }

  /**
   * Close finished windows and evaluate alert rules once per window. A tick
   * that arrives while the previous pass is still notifying is skipped.
   */
  runWindowPass(now: number = this.clock.now()): Promise<void> {
    if (this.windowPass) {
      this.counters.skippedWindowPasses++;
      this.logger.warn('Previous window pass still running, skipping tick');
      return this.windowPass;
    }

    this.windowPass = this.windowPassAt(now).finally(() => {
      this.windowPass = undefined;
    });
    return this.windowPass;
  }

  sweep(now: number = this.clock.now()): Trace[] {
    return this.assembler.sweep(now);
  }

  /**
   * Stop timers, flush partial windows and incomplete traces, then give the
   * dispatcher `shutdownGraceMs` to deliver. Safe to call more than once.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  /**
   * Health report judged at the processor clock's current time
   */
  healthReport(): HealthReport {
    return this.health.report(new Date(this.clock.now()));
  }

  isRunning(): boolean {
    return this.running;
  }

  stats(): ProcessorStats {
    return {
      running: this.running,
      buffer: this.buffer.stats(),
      collector: this.collector.stats(),
      aggregator: this.aggregator.stats(),
      traces: this.assembler.stats(),
      alerts: this.evaluator.stats(),
      export: this.dispatcher.stats(),
      pipeline: { ...this.counters },
    };
  }

  private async windowPassAt(now: number): Promise<void> {
    this.drain();

    const snapshots = this.aggregator.closeWindow(now);
    this.publishSnapshots(snapshots);

    const boundary = Math.floor(now / this.config.windowIntervalMs) * this.config.windowIntervalMs;
    if (this.lastEvaluatedBoundary !== undefined && boundary <= this.lastEvaluatedBoundary) {
      return;
    }
    this.lastEvaluatedBoundary = boundary;
    this.counters.windowPasses++;

    const events = this.evaluator.evaluate(this.aggregator.latest(), new Date(now));
    await this.publishAlerts(events);
  }

  private scheduleWindowTick(): void {
    const windowMs = this.config.windowIntervalMs;
    const now = this.clock.now();
    const delay = windowMs - (now % windowMs);

    this.windowTimer = setTimeout(() => {
      this.runWindowPass().catch((error: unknown) => {
        this.logger.error({ error: errorMessage(error) }, 'Window pass failed');
      });
      if (this.running) {
        this.scheduleWindowTick();
      }
    }, delay);
  }

  private publishSnapshots(snapshots: readonly MetricSnapshot[]): void {
    for (const snapshot of snapshots) {
      this.bus.emitSnapshotFinalized(snapshot);
    }
    this.dispatcher.submit(snapshots.map((snapshot): ExportRecord => ({ kind: 'metric', snapshot })));
  }

  private handleTrace(trace: Trace): void {
    this.bus.emitTraceFlushed(trace);
    this.dispatcher.submit([{ kind: 'trace', trace }]);
  }

  private async publishAlerts(events: readonly AlertEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }
    for (const event of events) {
      this.bus.emitAlertTransition(event);
    }
    this.dispatcher.submit(events.map((event): ExportRecord => ({ kind: 'alert', event })));

    await Promise.all(
      events.flatMap((event) => this.notifiers.map((notifier) => this.notify(notifier, event)))
    );
  }

  private async notify(notifier: AlertNotifier, event: AlertEvent): Promise<void> {
    try {
      const result = await notifier.notify(event);
      if (!result.ok) {
        this.counters.notifyFailures++;
        this.logger.warn(
          { notifier: notifier.name, group: event.group, error: result.error.message },
          'Alert notification failed'
        );
      }
    } catch (error) {
      this.counters.notifyFailures++;
      this.logger.error(
        { notifier: notifier.name, group: event.group, error: errorMessage(error) },
        'Alert notifier threw'
      );
    }
  }

  private countLogEntry(level: string, service?: string): void {
    const tags = normalizeTags(service ? { level, service } : { level });
    const result = this.aggregator.ingest({
      name: LOG_ENTRIES_METRIC,
      value: 1,
      unit: 'entries',
      tags,
      timestamp: new Date(this.clock.now()),
      type: MetricType.COUNTER,
    });
    if (!result.ok) {
      this.logger.debug({ error: result.error.message }, 'Log entry counter point rejected');
    }
  }

  private async shutdown(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    clearTimeout(this.windowTimer);

    if (this.windowPass) {
      await this.windowPass;
    }

    try {
      this.drain();
      this.publishSnapshots(this.aggregator.flushAll(this.clock.now()));
      const traces = this.assembler.flushAll();
      this.logger.info(
        { wasRunning, incompleteTraces: traces.length, graceMs: this.config.shutdownGraceMs },
        'Flushing pipeline before shutdown'
      );
    } finally {
      await this.dispatcher.stop(this.config.shutdownGraceMs);
      this.logger.info('Processor stopped');
    }
  }
}
