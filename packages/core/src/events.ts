import { EventEmitter } from 'events';
import type { AlertEvent, MetricSnapshot, SignalKind, Trace } from './types';

export interface SnapshotFinalizedEvent {
  snapshot: MetricSnapshot;
}

export interface TraceFlushedEvent {
  trace: Trace;
}

export interface AlertTransitionEvent {
  event: AlertEvent;
}

export interface SignalRejectedEvent {
  kind: SignalKind;
  code: string;
  message: string;
}

export interface BatchDeadLetteredEvent {
  batchId: string;
  sink: string;
  reason: string;
  attempts: number;
  records: number;
}

export class EventBus extends EventEmitter {
  emitSnapshotFinalized(snapshot: MetricSnapshot): void {
    this.emit('snapshot.finalized', { snapshot } satisfies SnapshotFinalizedEvent);
  }

  onSnapshotFinalized(handler: (event: SnapshotFinalizedEvent) => void): void {
    this.on('snapshot.finalized', handler);
  }

  emitTraceFlushed(trace: Trace): void {
    this.emit('trace.flushed', { trace } satisfies TraceFlushedEvent);
  }

  onTraceFlushed(handler: (event: TraceFlushedEvent) => void): void {
    this.on('trace.flushed', handler);
  }

  emitAlertTransition(event: AlertEvent): void {
    this.emit('alert.transition', { event } satisfies AlertTransitionEvent);
  }

  onAlertTransition(handler: (event: AlertTransitionEvent) => void): void {
    this.on('alert.transition', handler);
  }

  emitSignalRejected(event: SignalRejectedEvent): void {
    this.emit('signal.rejected', event);
  }

  onSignalRejected(handler: (event: SignalRejectedEvent) => void): void {
    this.on('signal.rejected', handler);
  }

  emitBatchDeadLettered(event: BatchDeadLetteredEvent): void {
    this.emit('batch.dead_lettered', event);
  }

  onBatchDeadLettered(handler: (event: BatchDeadLetteredEvent) => void): void {
    this.on('batch.dead_lettered', handler);
  }
}
