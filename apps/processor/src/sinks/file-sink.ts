import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { SinkError, err, errorMessage, ok, type ExportBatch, type Result } from '@beacon/core';
import type { ExportSink } from '../export-dispatcher';
import { toJsonLines } from './json-lines';

/**
 * Appends records to a JSONL file. Filesystem errors are treated as
 * transient so the dispatcher retries them.
 */
export class FileSink implements ExportSink {
  readonly name: string;
  private ready?: Promise<string | undefined>;

  constructor(
    private readonly path: string,
    name?: string
  ) {
    this.name = name ?? `file:${path}`;
  }

  async push(batch: ExportBatch): Promise<Result<void, SinkError>> {
    try {
      this.ready ??= mkdir(dirname(this.path), { recursive: true });
      await this.ready;
      await appendFile(this.path, toJsonLines(batch), 'utf8');
      return ok(undefined);
    } catch (error) {
      this.ready = undefined;
      return err(SinkError.unavailable(`Cannot write ${this.path}: ${errorMessage(error)}`, { path: this.path }));
    }
  }
}
