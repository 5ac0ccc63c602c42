import { Hono } from 'hono';
import { AlertSeverity, SignalKind } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { ingestHandler } from './ingest';

export function alertsRoutes(processor: Processor): Hono {
  const alerts = new Hono();

  // Alert events raised by external systems, forwarded like evaluator transitions
  alerts.post('/', ingestHandler(processor, SignalKind.ALERT));

  alerts.get('/', (c) => {
    const active = c.req.query('active') === 'true';
    const states = processor.evaluator
      .states()
      .filter((state) => !active || state.severity !== AlertSeverity.OK);
    return c.json({ alerts: states });
  });

  return alerts;
}
