import { Hono } from 'hono';
import type { Processor } from '@beacon/processor';

export function statsRoutes(processor: Processor): Hono {
  const stats = new Hono();
  stats.get('/', (c) => c.json(processor.stats()));
  return stats;
}
