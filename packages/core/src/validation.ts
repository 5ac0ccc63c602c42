import { z } from 'zod';
import {
  AlertSeverity,
  HealthStatus,
  LogLevel,
  MetricType,
  SpanStatus,
} from './types';
import { err, ok, type Result } from './result';

export const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:.]*$/;
export const TAG_KEY_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

// Accepts ISO strings, epoch milliseconds or Date instances
export const timestampSchema = z
  .union([z.string().datetime({ offset: true }), z.date(), z.number().int().nonnegative()])
  .transform((val) => (val instanceof Date ? val : new Date(val)))
  .refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid timestamp' });

export const tagsSchema = z
  .record(z.string().regex(TAG_KEY_PATTERN, 'Invalid tag key'), z.string())
  .default({});

export const metricInputSchema = z.object({
  name: z.string().min(1).max(200).regex(METRIC_NAME_PATTERN, 'Invalid metric name'),
  value: z.number().finite(),
  unit: z.string().max(64).default(''),
  tags: tagsSchema,
  timestamp: timestampSchema.optional(),
  type: z.nativeEnum(MetricType).default(MetricType.COUNTER),
});

const optionalId = z
  .string()
  .min(1)
  .max(128)
  .nullish()
  .transform((val) => val ?? undefined);

export const spanInputSchema = z
  .object({
    traceId: z.string().min(1).max(128),
    spanId: z.string().min(1).max(128),
    parentSpanId: optionalId,
    name: z.string().min(1),
    service: z.string().min(1).optional(),
    startTime: timestampSchema,
    endTime: timestampSchema.nullish().transform((val) => val ?? undefined),
    status: z.nativeEnum(SpanStatus).default(SpanStatus.UNSET),
    attributes: z.record(z.string(), z.unknown()).optional(),
  })
  .refine((span) => span.parentSpanId !== span.spanId, {
    message: 'A span cannot be its own parent',
    path: ['parentSpanId'],
  })
  .refine((span) => !span.endTime || span.endTime.getTime() >= span.startTime.getTime(), {
    message: 'endTime precedes startTime',
    path: ['endTime'],
  });

export const logInputSchema = z.object({
  message: z.string().min(1),
  level: z.nativeEnum(LogLevel),
  timestamp: timestampSchema.optional(),
  service: z.string().min(1).optional(),
  correlationId: z.string().min(1).optional(),
  fields: z.record(z.string(), z.unknown()).default({}),
});

export const healthCheckInputSchema = z
  .object({
    component: z.string().min(1),
    status: z.enum([HealthStatus.HEALTHY, HealthStatus.DEGRADED, HealthStatus.UNHEALTHY]),
    lastChecked: timestampSchema.optional(),
    dependencies: z
      .array(z.string().min(1))
      .default([])
      .transform((deps) => [...new Set(deps)]),
    message: z.string().optional(),
  })
  .refine((check) => !check.dependencies.includes(check.component), {
    message: 'A component cannot depend on itself',
    path: ['dependencies'],
  });

export const alertEventInputSchema = z.object({
  group: z.string().min(1),
  from: z.nativeEnum(AlertSeverity),
  to: z.nativeEnum(AlertSeverity),
  timestamp: timestampSchema.optional(),
  rules: z.array(z.string()).default([]),
  values: z.record(z.string(), z.number()).default({}),
  message: z.string().min(1),
});

export const alertRuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  metric: z.object({
    name: z.string().min(1).regex(METRIC_NAME_PATTERN, 'Invalid metric name'),
    tags: z.record(z.string().regex(TAG_KEY_PATTERN, 'Invalid tag key'), z.string()).optional(),
  }),
  statistic: z
    .enum(['value', 'count', 'sum', 'min', 'max', 'last', 'p50', 'p90', 'p95', 'p99'])
    .optional(),
  comparator: z.enum(['>', '>=', '<', '<=', '==']),
  threshold: z.number().finite(),
  severity: z.enum([AlertSeverity.WARNING, AlertSeverity.CRITICAL]),
  hysteresisWindows: z.number().int().positive().optional(),
  group: z.string().min(1).optional(),
});

export const alertRulesSchema = z.array(alertRuleSchema).superRefine((rules, ctx) => {
  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate rule id "${rule.id}"`,
        path: [index, 'id'],
      });
    }
    seen.add(rule.id);
  });
});

export type MetricInput = z.input<typeof metricInputSchema>;
export type SpanInput = z.input<typeof spanInputSchema>;
export type LogInput = z.input<typeof logInputSchema>;
export type HealthCheckInput = z.input<typeof healthCheckInputSchema>;
export type AlertEventInput = z.input<typeof alertEventInputSchema>;

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Run a schema against untrusted input, returning the formatted issues on failure
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): Result<T, string[]> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(formatIssues(parsed.error));
}
