import { randomUUID } from 'crypto';
import {
  DEFAULT_EXPORT_BATCH_SIZE,
  DEFAULT_EXPORT_QUEUE_CAPACITY,
  DEFAULT_RETRY_BASE_MS,
  DEFAULT_RETRY_CAP_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_SINK_PUSH_TIMEOUT_MS,
  SinkError,
  err,
  errorMessage,
  type EventBus,
  type ExportBatch,
  type ExportRecord,
  type Result,
} from '@beacon/core';
import { RingBuffer } from './ring-buffer';
import { LoggerDeadLetterLog, type DeadLetterLog } from './dead-letter';
import { sleep as defaultSleep, type Sleep } from './clock';
import { componentLogger, type Logger } from './logger';

/**
 * Export destination. `push` resolves with `SinkError.unavailable` for
 * transient failures (retried) and `SinkError.rejected` for permanent ones.
 */
export interface ExportSink {
  readonly name: string;
  push(batch: ExportBatch): Promise<Result<void, SinkError>>;
  close?(): Promise<void>;
}

export interface RetryBackoff {
  baseMs: number;
  capMs: number;
  maxAttempts: number;
}

export interface ExportDispatcherConfig {
  sinks: readonly ExportSink[];
  deadLetter?: DeadLetterLog;
  batchSize?: number;
  queueCapacity?: number;
  retry?: Partial<RetryBackoff>;
  pushTimeoutMs?: number;
  sleep?: Sleep;
  bus?: EventBus;
  logger?: Logger;
}

export interface LaneStats {
  queued: number;
  submitted: number;
  delivered: number;
  batches: number;
  retries: number;
  deadLettered: number;
  dropped: number;
}

/**
 * Delay before retry number `attempt` (1-based): `min(cap, base * 2^(attempt-1))`
 */
export function backoffDelay(attempt: number, retry: RetryBackoff): number {
  return Math.min(retry.capMs, retry.baseMs * 2 ** (attempt - 1));
}

interface LaneOptions {
  batchSize: number;
  queueCapacity: number;
  retry: RetryBackoff;
  pushTimeoutMs: number;
  sleep: Sleep;
  deadLetter: DeadLetterLog;
  bus?: EventBus;
  logger: Logger;
}

/**
 * Queue and delivery loop for one sink. A slow or failing sink only ever
 * backs up its own lane.
 */
class SinkLane {
  private readonly queue: RingBuffer<ExportRecord>;
  private running?: Promise<void>;
  private aborted = false;
  private counters = { submitted: 0, delivered: 0, batches: 0, retries: 0, deadLettered: 0, dropped: 0 };

  constructor(
    readonly sink: ExportSink,
    private readonly options: LaneOptions
  ) {
    this.queue = new RingBuffer(options.queueCapacity);
  }

  submit(records: readonly ExportRecord[]): void {
    let dropped = 0;
    for (const record of records) {
      if (this.queue.push(record) !== undefined) {
        dropped++;
      }
    }
    this.counters.submitted += records.length;
    if (dropped > 0) {
      this.counters.dropped += dropped;
      this.options.logger.warn({ sink: this.sink.name, dropped }, 'Export queue full, dropped oldest records');
    }
    this.schedule();
  }

  /** Resolves once the lane has nothing queued or in flight */
  async idle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  /**
   * Stop delivering. Queued records are dropped; a batch in flight finishes
   * its current push but is not retried.
   */
  abort(): number {
    this.aborted = true;
    const remaining = this.queue.drain().length;
    this.counters.dropped += remaining;
    return remaining;
  }

  stats(): LaneStats {
    return { ...this.counters, queued: this.queue.size };
  }

  private schedule(): void {
    if (this.running || this.aborted || this.queue.size === 0) {
      return;
    }
    this.running = this.run().finally(() => {
      this.running = undefined;
      this.schedule();
    });
  }

  private async run(): Promise<void> {
    while (!this.aborted && this.queue.size > 0) {
      const batch: ExportBatch = {
        id: randomUUID(),
        sink: this.sink.name,
        createdAt: new Date(),
        records: this.queue.drain(this.options.batchSize),
      };
      this.counters.batches++;
      await this.deliver(batch);
    }
  }

  private async deliver(batch: ExportBatch): Promise<void> {
    const { retry, logger } = this.options;

    for (let attempt = 1; ; attempt++) {
      const result = await this.pushWithTimeout(batch);
      if (result.ok) {
        this.counters.delivered += batch.records.length;
        return;
      }

      const error = result.error;
      if (!error.retryable || attempt >= retry.maxAttempts) {
        await this.deadLetterBatch(batch, error, attempt);
        return;
      }

      const delay = backoffDelay(attempt, retry);
      this.counters.retries++;
      logger.warn(
        { sink: this.sink.name, batchId: batch.id, attempt, delayMs: delay, error: error.message },
        'Sink push failed, retrying'
      );
      await this.options.sleep(delay);

      if (this.aborted) {
        this.counters.dropped += batch.records.length;
        logger.warn(
          { sink: this.sink.name, batchId: batch.id, records: batch.records.length },
          'Dropping batch in retry at shutdown'
        );
        return;
      }
    }
  }

  private async pushWithTimeout(batch: ExportBatch): Promise<Result<void, SinkError>> {
    const { pushTimeoutMs } = this.options;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<Result<void, SinkError>>((resolve) => {
      timer = setTimeout(
        () => resolve(err(SinkError.unavailable(`Sink ${this.sink.name} timed out after ${pushTimeoutMs}ms`))),
        pushTimeoutMs
      );
    });
    const push = Promise.resolve()
      .then(() => this.sink.push(batch))
      .catch((error: unknown) => err(SinkError.unavailable(errorMessage(error))));

    try {
      return await Promise.race([push, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async deadLetterBatch(batch: ExportBatch, error: SinkError, attempts: number): Promise<void> {
    this.counters.deadLettered++;
    const { logger, bus } = this.options;

    try {
      await this.options.deadLetter.write({
        batch,
        code: error.code,
        reason: error.message,
        attempts,
        deadLetteredAt: new Date(),
      });
    } catch (writeError) {
      logger.error(
        { sink: this.sink.name, batchId: batch.id, records: batch.records.length, error: errorMessage(writeError) },
        'Failed to write dead-letter entry; batch lost'
      );
    }

    bus?.emitBatchDeadLettered({
      batchId: batch.id,
      sink: this.sink.name,
      reason: error.message,
      attempts,
      records: batch.records.length,
    });
  }
}

/**
 * Fans finalized records out to every sink. `submit` never waits on a sink:
 * each sink has its own bounded queue, batching and retry loop.
 */
export class ExportDispatcher {
  private readonly lanes: SinkLane[];
  private readonly logger: Logger;
  private accepting = true;
  private droppedAfterStop = 0;

  constructor(config: ExportDispatcherConfig) {
    this.logger = config.logger ?? componentLogger('export-dispatcher');
    const options: LaneOptions = {
      batchSize: config.batchSize ?? DEFAULT_EXPORT_BATCH_SIZE,
      queueCapacity: config.queueCapacity ?? DEFAULT_EXPORT_QUEUE_CAPACITY,
      retry: {
        baseMs: config.retry?.baseMs ?? DEFAULT_RETRY_BASE_MS,
        capMs: config.retry?.capMs ?? DEFAULT_RETRY_CAP_MS,
        maxAttempts: config.retry?.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS,
      },
      pushTimeoutMs: config.pushTimeoutMs ?? DEFAULT_SINK_PUSH_TIMEOUT_MS,
      sleep: config.sleep ?? defaultSleep,
      deadLetter: config.deadLetter ?? new LoggerDeadLetterLog(this.logger),
      bus: config.bus,
      logger: this.logger,
    };
    this.lanes = config.sinks.map((sink) => new SinkLane(sink, options));
  }

  submit(records: readonly ExportRecord[]): void {
    if (records.length === 0) {
      return;
    }
    if (!this.accepting) {
      this.droppedAfterStop += records.length;
      this.logger.warn({ records: records.length }, 'Dispatcher stopped, dropping records');
      return;
    }
    for (const lane of this.lanes) {
      lane.submit(records);
    }
  }

  /**
   * Wait until every lane has delivered or dead-lettered what it holds.
   */
  async flush(): Promise<void> {
    await Promise.all(this.lanes.map((lane) => lane.idle()));
  }

  /**
   * Stop intake and drain best-effort for up to `graceMs`. Whatever is still
   * queued afterwards is dropped and logged. Sinks are closed last.
   */
  async stop(graceMs: number): Promise<void> {
    this.accepting = false;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), graceMs);
    });
    const drained = this.flush().then(() => false);
    const timedOut = await Promise.race([drained, expired]);
    clearTimeout(timer);

    if (timedOut) {
      for (const lane of this.lanes) {
        const dropped = lane.abort();
        if (dropped > 0) {
          this.logger.warn(
            { sink: lane.sink.name, dropped, graceMs },
            'Shutdown grace period elapsed, dropping queued records'
          );
        }
      }
    }

    for (const lane of this.lanes) {
      if (!lane.sink.close) {
        continue;
      }
      try {
        await lane.sink.close();
      } catch (error) {
        this.logger.error({ sink: lane.sink.name, error: errorMessage(error) }, 'Failed to close sink');
      }
    }
  }

  stats(): { sinks: Record<string, LaneStats>; droppedAfterStop: number } {
    const sinks: Record<string, LaneStats> = {};
    for (const lane of this.lanes) {
      sinks[lane.sink.name] = lane.stats();
    }
    return { sinks, droppedAfterStop: this.droppedAfterStop };
  }
}
