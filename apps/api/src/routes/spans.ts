import { Hono } from 'hono';
import { SignalKind } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { ingestHandler } from './ingest';

export function spansRoutes(processor: Processor): Hono {
  const spans = new Hono();
  spans.post('/', ingestHandler(processor, SignalKind.SPAN));
  return spans;
}
