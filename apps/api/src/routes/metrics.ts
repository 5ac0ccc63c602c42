import { Hono } from 'hono';
import { SignalKind } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { ingestHandler } from './ingest';

export function metricsRoutes(processor: Processor): Hono {
  const metrics = new Hono();

  metrics.post('/', ingestHandler(processor, SignalKind.METRIC));

  // Latest finalized snapshot per series, optionally filtered by metric name
  metrics.get('/', (c) => {
    const name = c.req.query('name');
    const snapshots = [...processor.aggregator.latest().values()].filter((s) => !name || s.name === name);
    return c.json({ snapshots });
  });

  return metrics;
}
