import { readFile } from 'fs/promises';
import { ConfigError, alertRulesSchema, errorMessage, parseWith, type AlertRule } from '@beacon/core';

/**
 * Parse alert rules from a JSON document (an array of rules)
 */
export function parseAlertRules(json: string): AlertRule[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ConfigError([`alert rules: ${errorMessage(error)}`]);
  }

  const parsed = parseWith(alertRulesSchema, raw);
  if (!parsed.ok) {
    throw new ConfigError(parsed.error.map((issue) => `alert rules: ${issue}`));
  }
  return parsed.value;
}

export async function loadAlertRules(path: string): Promise<AlertRule[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError([`alert rules: cannot read ${path}: ${errorMessage(error)}`]);
  }
  return parseAlertRules(contents);
}
