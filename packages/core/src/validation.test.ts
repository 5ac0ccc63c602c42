import { describe, it, expect } from 'vitest';
import {
  alertRulesSchema,
  formatIssues,
  healthCheckInputSchema,
  logInputSchema,
  metricInputSchema,
  parseWith,
  spanInputSchema,
} from './validation';
import { LogLevel, MetricType, SpanStatus } from './types';

describe('Validation Schemas', () => {
  describe('metricInputSchema', () => {
    it('should apply defaults for unit, tags and type', () => {
      const result = metricInputSchema.safeParse({ name: 'reqs', value: 1 });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.unit).toBe('');
        expect(result.data.tags).toEqual({});
        expect(result.data.type).toBe(MetricType.COUNTER);
        expect(result.data.timestamp).toBeUndefined();
      }
    });

    it('should convert ISO and epoch timestamps to dates', () => {
      const iso = metricInputSchema.parse({ name: 'reqs', value: 1, timestamp: '2024-01-01T00:00:00Z' });
      const epoch = metricInputSchema.parse({ name: 'reqs', value: 1, timestamp: 1704067200000 });

      expect(iso.timestamp?.getTime()).toBe(1704067200000);
      expect(epoch.timestamp?.getTime()).toBe(1704067200000);
    });

    it('should reject non-finite values and invalid names', () => {
      expect(metricInputSchema.safeParse({ name: 'reqs', value: Number.NaN }).success).toBe(false);
      expect(metricInputSchema.safeParse({ name: 'reqs', value: Infinity }).success).toBe(false);
      expect(metricInputSchema.safeParse({ name: 'bad name', value: 1 }).success).toBe(false);
      expect(metricInputSchema.safeParse({ name: '', value: 1 }).success).toBe(false);
    });

    it('should reject invalid tag keys', () => {
      const result = metricInputSchema.safeParse({ name: 'reqs', value: 1, tags: { 'bad-key': 'x' } });
      expect(result.success).toBe(false);
    });
  });

  describe('spanInputSchema', () => {
    const base = {
      traceId: 't1',
      spanId: 's1',
      name: 'GET /',
      startTime: '2024-01-01T00:00:00Z',
    };

    it('should normalize a null parent to undefined', () => {
      const span = spanInputSchema.parse({ ...base, parentSpanId: null });
      expect(span.parentSpanId).toBeUndefined();
      expect(span.status).toBe(SpanStatus.UNSET);
    });

    it('should reject a span that ends before it starts', () => {
      const result = spanInputSchema.safeParse({ ...base, endTime: '2023-12-31T23:59:59Z' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toEqual(['endTime: endTime precedes startTime']);
      }
    });

    it('should reject a span that is its own parent', () => {
      expect(spanInputSchema.safeParse({ ...base, parentSpanId: 's1' }).success).toBe(false);
    });
  });

  describe('logInputSchema', () => {
    it('should require a level', () => {
      expect(logInputSchema.safeParse({ message: 'hello' }).success).toBe(false);
    });

    it('should reject an invalid log level', () => {
      expect(logInputSchema.safeParse({ message: 'hello', level: 'loud' }).success).toBe(false);
    });

    it('should default fields to an empty object', () => {
      const entry = logInputSchema.parse({ message: 'hello', level: LogLevel.INFO });
      expect(entry.fields).toEqual({});
    });
  });

  describe('healthCheckInputSchema', () => {
    it('should deduplicate dependencies', () => {
      const check = healthCheckInputSchema.parse({
        component: 'api',
        status: 'healthy',
        dependencies: ['db', 'cache', 'db'],
      });
      expect(check.dependencies).toEqual(['db', 'cache']);
    });

    it('should reject a self dependency', () => {
      const result = healthCheckInputSchema.safeParse({ component: 'api', status: 'healthy', dependencies: ['api'] });
      expect(result.success).toBe(false);
    });

    it('should reject the unknown status from producers', () => {
      expect(healthCheckInputSchema.safeParse({ component: 'api', status: 'unknown' }).success).toBe(false);
    });
  });

  describe('alertRulesSchema', () => {
    it('should reject duplicate rule ids', () => {
      const rule = {
        id: 'r1',
        metric: { name: 'cpu' },
        comparator: '>',
        threshold: 90,
        severity: 'critical',
      };

      const result = alertRulesSchema.safeParse([rule, rule]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatIssues(result.error)).toEqual(['1.id: Duplicate rule id "r1"']);
      }
    });
  });

  describe('parseWith', () => {
    it('should return the parsed value on success', () => {
      const result = parseWith(logInputSchema, { message: 'started', level: 'info' });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.fields).toEqual({});
      }
    });

    it('should return formatted issues on failure', () => {
      const result = parseWith(logInputSchema, { message: '', level: 'info' });

      expect(result).toEqual({ ok: false, error: ['message: String must contain at least 1 character(s)'] });
    });
  });
});
