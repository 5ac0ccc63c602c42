import type { Tags } from './types';

function escapeTagValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Identity key of a time series: the metric name plus its tags sorted by key,
 * rendered in exposition style, e.g. `http_requests{method="GET",route="/"}`.
 *
 * Metric names and tag keys are restricted by validation, so only tag values
 * need escaping for the key to be unambiguous.
 */
export function seriesKey(name: string, tags: Tags = {}): string {
  const keys = Object.keys(tags).sort();
  if (keys.length === 0) {
    return name;
  }
  const rendered = keys.map((key) => `${key}="${escapeTagValue(tags[key])}"`).join(',');
  return `${name}{${rendered}}`;
}

/**
 * Copy of the tags with keys in sorted order, frozen.
 */
export function normalizeTags(tags: Record<string, string> = {}): Tags {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(tags).sort()) {
    sorted[key] = tags[key];
  }
  return Object.freeze(sorted);
}
