import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { ExportBatch } from '@beacon/core';
import { componentLogger, type Logger } from './logger';

export interface DeadLetterEntry {
  batch: ExportBatch;
  code: string;
  reason: string;
  attempts: number;
  deadLetteredAt: Date;
}

/**
 * Destination for batches the dispatcher gave up on
 */
export interface DeadLetterLog {
  write(entry: DeadLetterEntry): Promise<void>;
}

/**
 * Appends one JSON line per dead-lettered batch.
 */
export class FileDeadLetterLog implements DeadLetterLog {
  private ready?: Promise<string | undefined>;

  constructor(private readonly path: string) {}

  async write(entry: DeadLetterEntry): Promise<void> {
    this.ready ??= mkdir(dirname(this.path), { recursive: true });
    await this.ready;
    await appendFile(this.path, `${JSON.stringify(entry)}\n`, 'utf8');
  }
}

/**
 * Used when no dead-letter path is configured: the batch is summarized in
 * the process log and its records are not kept.
 */
export class LoggerDeadLetterLog implements DeadLetterLog {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? componentLogger('dead-letter');
  }

  async write(entry: DeadLetterEntry): Promise<void> {
    this.logger.error(
      {
        batchId: entry.batch.id,
        sink: entry.batch.sink,
        records: entry.batch.records.length,
        code: entry.code,
        attempts: entry.attempts,
      },
      `Dead-lettered batch: ${entry.reason}`
    );
  }
}

/**
 * Keeps entries in memory, for embedding and tests.
 */
export class MemoryDeadLetterLog implements DeadLetterLog {
  readonly entries: DeadLetterEntry[] = [];

  async write(entry: DeadLetterEntry): Promise<void> {
    this.entries.push(entry);
  }
}
