import { Hono } from 'hono';
import { SignalKind } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { ingestHandler } from './ingest';

export function logsRoutes(processor: Processor): Hono {
  const logs = new Hono();
  logs.post('/', ingestHandler(processor, SignalKind.LOG));
  return logs;
}
