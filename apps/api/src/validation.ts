import { z } from 'zod';
import { formatIssues, type Result, err, ok } from '@beacon/core';

export const MAX_BATCH_ITEMS = 1000;

// Batch envelope: { items: [...] }
export const batchEnvelopeSchema = z.object({
  items: z.array(z.unknown()).min(1).max(MAX_BATCH_ITEMS),
});

/**
 * Split a request body into the items to ingest. A body with an `items`
 * key is a batch; anything else is a single item.
 */
export function ingestItems(body: unknown): Result<unknown[], string[]> {
  if (typeof body !== 'object' || body === null || !('items' in body)) {
    return ok([body]);
  }
  const parsed = batchEnvelopeSchema.safeParse(body);
  return parsed.success ? ok(parsed.data.items) : err(formatIssues(parsed.error));
}
