import type { Context } from 'hono';
import { IngestErrorCode, type SignalKind } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { ingestItems } from '../validation';

export interface IngestItemError {
  index: number;
  code: IngestErrorCode;
  message: string;
}

/**
 * POST handler recording a single item or an `{ items: [...] }` batch of
 * one signal kind. Items are accepted or rejected individually.
 */
export function ingestHandler(processor: Processor, kind: SignalKind) {
  return async (c: Context) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Invalid JSON in request body' }, 400);
    }

    const items = ingestItems(body);
    if (!items.ok) {
      return c.json({ error: 'Validation failed', details: items.error }, 400);
    }

    let accepted = 0;
    const errors: IngestItemError[] = [];
    items.value.forEach((item, index) => {
      const result = processor.collector.record(kind, item);
      if (result.ok) {
        accepted++;
      } else {
        errors.push({ index, code: result.error.code, message: result.error.message });
      }
    });

    const throttled =
      accepted === 0 && errors.length > 0 && errors.every((e) => e.code === IngestErrorCode.CAPACITY_EXCEEDED);
    if (throttled) {
      c.header('Retry-After', '1');
    }

    return c.json(
      {
        accepted,
        rejected: errors.length,
        ...(errors.length > 0 && { errors }),
      },
      throttled ? 429 : 202
    );
  };
}
