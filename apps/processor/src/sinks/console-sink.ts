import { ok, type ExportBatch, type Result, type SinkError } from '@beacon/core';
import type { ExportSink } from '../export-dispatcher';
import { toJsonLines } from './json-lines';

export type LineWriter = (chunk: string) => void;

/**
 * Writes records to stdout as JSON lines. Never fails.
 */
export class ConsoleSink implements ExportSink {
  readonly name: string;
  private readonly write: LineWriter;

  constructor(options: { name?: string; write?: LineWriter } = {}) {
    this.name = options.name ?? 'console';
    this.write = options.write ?? ((chunk) => process.stdout.write(chunk));
  }

  async push(batch: ExportBatch): Promise<Result<void, SinkError>> {
    this.write(toJsonLines(batch));
    return ok(undefined);
  }
}
