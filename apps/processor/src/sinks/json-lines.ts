import type { ExportBatch } from '@beacon/core';

/**
 * One JSON document per record, tagged with the batch it travelled in.
 * Dates serialize as ISO-8601 strings.
 */
export function toJsonLines(batch: ExportBatch): string {
  return batch.records
    .map((record) => JSON.stringify({ batchId: batch.id, ...record }))
    .map((line) => `${line}\n`)
    .join('');
}
