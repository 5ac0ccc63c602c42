import { Hono } from 'hono';
import { HealthStatus, SignalKind } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { ingestHandler } from './ingest';

export function healthRoutes(processor: Processor): Hono {
  const health = new Hono();

  health.post('/health-checks', ingestHandler(processor, SignalKind.HEALTH));

  health.get('/health', (c) => {
    const report = processor.healthReport();
    return c.json(report, report.status === HealthStatus.UNHEALTHY ? 503 : 200);
  });

  return health;
}
