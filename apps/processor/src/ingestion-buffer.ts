import {
  IngestError,
  SIGNAL_KINDS,
  SignalKind,
  ok,
  err,
  type BackpressurePolicy,
  type Result,
  type Signal,
  type SignalOf,
} from '@beacon/core';
import { RingBuffer } from './ring-buffer';
import { componentLogger, type Logger } from './logger';

export interface IngestionBufferConfig {
  capacity: number;
  policy: BackpressurePolicy;
  logger?: Logger;
}

export interface KindStats {
  accepted: number;
  rejected: number;
  dropped: number;
  drained: number;
  depth: number;
}

export type BufferStats = Record<SignalKind, KindStats>;

type Lanes = { [K in SignalKind]: RingBuffer<SignalOf<K>> };

/**
 * Bounded FIFO per signal kind between producers and the processor's
 * consumers. `record` and `drain` run to completion on the event loop, so
 * concurrent producers never interleave inside a lane.
 */
export class IngestionBuffer {
  private readonly lanes: Lanes;
  private readonly counters: Record<SignalKind, Omit<KindStats, 'depth'>>;
  private readonly policy: BackpressurePolicy;
  private readonly logger: Logger;
  readonly capacity: number;

  constructor(config: IngestionBufferConfig) {
    this.capacity = config.capacity;
    this.policy = config.policy;
    this.logger = config.logger ?? componentLogger('ingestion-buffer');
    this.lanes = {
      [SignalKind.METRIC]: new RingBuffer(config.capacity),
      [SignalKind.SPAN]: new RingBuffer(config.capacity),
      [SignalKind.LOG]: new RingBuffer(config.capacity),
      [SignalKind.ALERT]: new RingBuffer(config.capacity),
      [SignalKind.HEALTH]: new RingBuffer(config.capacity),
    };
    this.counters = {
      [SignalKind.METRIC]: { accepted: 0, rejected: 0, dropped: 0, drained: 0 },
      [SignalKind.SPAN]: { accepted: 0, rejected: 0, dropped: 0, drained: 0 },
      [SignalKind.LOG]: { accepted: 0, rejected: 0, dropped: 0, drained: 0 },
      [SignalKind.ALERT]: { accepted: 0, rejected: 0, dropped: 0, drained: 0 },
      [SignalKind.HEALTH]: { accepted: 0, rejected: 0, dropped: 0, drained: 0 },
    };
  }

  record(signal: Signal): Result<void, IngestError> {
    const lane: RingBuffer<Signal> = this.lanes[signal.kind];
    const counters = this.counters[signal.kind];

    if (lane.isFull()) {
      if (this.policy === 'reject') {
        counters.rejected++;
        return err(IngestError.capacityExceeded(signal.kind, this.capacity));
      }
      counters.dropped++;
      if (counters.dropped === 1 || counters.dropped % 1000 === 0) {
        this.logger.warn({ kind: signal.kind, dropped: counters.dropped }, 'Buffer full, dropping oldest signals');
      }
    }

    lane.push(signal);
    counters.accepted++;
    return ok(undefined);
  }

  /**
   * Remove up to `max` signals of one kind in arrival order.
   */
  drain<K extends SignalKind>(kind: K, max?: number): SignalOf<K>[] {
    const lane: RingBuffer<SignalOf<K>> = this.lanes[kind];
    const items = lane.drain(max);
    this.counters[kind].drained += items.length;
    return items;
  }

  depth(kind: SignalKind): number {
    return this.lanes[kind].size;
  }

  totalDepth(): number {
    return SIGNAL_KINDS.reduce((total, kind) => total + this.lanes[kind].size, 0);
  }

  stats(): BufferStats {
    const of = (kind: SignalKind): KindStats => ({ ...this.counters[kind], depth: this.lanes[kind].size });
    return {
      [SignalKind.METRIC]: of(SignalKind.METRIC),
      [SignalKind.SPAN]: of(SignalKind.SPAN),
      [SignalKind.LOG]: of(SignalKind.LOG),
      [SignalKind.ALERT]: of(SignalKind.ALERT),
      [SignalKind.HEALTH]: of(SignalKind.HEALTH),
    };
  }
}
