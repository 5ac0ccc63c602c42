import {
  AlertSeverity,
  DEFAULT_ALERT_HYSTERESIS_WINDOWS,
  SEVERITY_LATTICE,
  SEVERITY_RANK,
  UNKNOWN_METRIC,
  seriesKey,
  type AlertEvent,
  type AlertRule,
  type AlertState,
  type Comparator,
  type MetricSnapshot,
  type SnapshotStatistic,
} from '@beacon/core';
import { componentLogger, type Logger } from './logger';

export interface AlertEvaluatorConfig {
  rules: readonly AlertRule[];
  /** Used by rules that do not set their own `hysteresisWindows` */
  hysteresisWindows?: number;
  logger?: Logger;
}

export interface AlertEvaluatorStats {
  rules: number;
  groups: number;
  evaluations: number;
  transitions: number;
  unknownGroups: number;
}

interface GroupState extends AlertState {
  rules: AlertRule[];
  hysteresisWindows: number;
  /** Highest target seen during the current downgrade streak */
  pendingTarget: AlertSeverity;
}

type RuleOutcome =
  | { rule: AlertRule; known: true; value: number; breached: boolean }
  | { rule: AlertRule; known: false };

export function compare(value: number, comparator: Comparator, threshold: number): boolean {
  switch (comparator) {
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '==':
      return value === threshold;
  }
}

export function readStatistic(snapshot: MetricSnapshot, statistic: SnapshotStatistic): number | undefined {
  switch (statistic) {
    case 'p50':
    case 'p90':
    case 'p95':
    case 'p99':
      return snapshot.quantiles?.[statistic];
    default:
      return snapshot[statistic];
  }
}

export function ruleSeriesKey(rule: AlertRule): string {
  return seriesKey(rule.metric.name, rule.metric.tags);
}

function maxSeverity(a: AlertSeverity, b: AlertSeverity): AlertSeverity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

/**
 * Threshold rules over the latest metric snapshots, with one alert state per
 * rule group. Upgrades commit immediately; downgrades wait for the group's
 * hysteresis streak. A group with any unresolved series holds its state.
 */
export class AlertEvaluator {
  private groups: Map<string, GroupState> = new Map();
  private readonly logger: Logger;
  private counters = { evaluations: 0, transitions: 0 };

  constructor(config: AlertEvaluatorConfig) {
    this.logger = config.logger ?? componentLogger('alert-evaluator');
    const fallbackWindows = config.hysteresisWindows ?? DEFAULT_ALERT_HYSTERESIS_WINDOWS;

    for (const rule of config.rules) {
      const group = rule.group ?? ruleSeriesKey(rule);
      const windows = rule.hysteresisWindows ?? fallbackWindows;
      const existing = this.groups.get(group);
      if (existing) {
        existing.rules.push(rule);
        existing.hysteresisWindows = Math.max(existing.hysteresisWindows, windows);
        continue;
      }
      this.groups.set(group, {
        group,
        severity: AlertSeverity.OK,
        consecutiveBelow: 0,
        unknown: false,
        unknownRules: [],
        rules: [rule],
        hysteresisWindows: windows,
        pendingTarget: AlertSeverity.OK,
      });
    }
  }

  /**
   * Run one evaluation pass. `snapshots` maps series keys to their latest
   * finalized snapshot. Returns the transitions committed by this pass.
   */
  evaluate(snapshots: ReadonlyMap<string, MetricSnapshot>, now: Date): AlertEvent[] {
    this.counters.evaluations++;
    const events: AlertEvent[] = [];

    for (const state of this.groups.values()) {
      const outcomes = state.rules.map((rule) => this.evaluateRule(rule, snapshots));
      const unknownRules = outcomes.filter((o) => !o.known).map((o) => o.rule.id);

      if (unknownRules.length > 0) {
        if (unknownRules.join(',') !== state.unknownRules.join(',')) {
          this.logger.warn(
            { group: state.group, rules: unknownRules, code: UNKNOWN_METRIC },
            'Alert rule references a series with no snapshot; holding state'
          );
        }
        state.unknown = true;
        state.unknownRules = unknownRules;
        continue;
      }
      state.unknown = false;
      state.unknownRules = [];

      let target: AlertSeverity = AlertSeverity.OK;
      const breached: string[] = [];
      const values: Record<string, number> = {};
      for (const outcome of outcomes) {
        if (!outcome.known) {
          continue;
        }
        values[outcome.rule.id] = outcome.value;
        if (outcome.breached) {
          breached.push(outcome.rule.id);
          target = maxSeverity(target, outcome.rule.severity);
        }
      }

      const current = SEVERITY_RANK[state.severity];
      const desired = SEVERITY_RANK[target];

      if (desired > current) {
        events.push(...this.transition(state, target, now, breached, values));
        continue;
      }

      if (desired === current) {
        state.consecutiveBelow = 0;
        state.pendingTarget = AlertSeverity.OK;
        continue;
      }

      state.consecutiveBelow++;
      state.pendingTarget =
        state.consecutiveBelow === 1 ? target : maxSeverity(state.pendingTarget, target);
      if (state.consecutiveBelow >= state.hysteresisWindows) {
        events.push(...this.transition(state, state.pendingTarget, now, breached, values));
      }
    }

    return events;
  }

  state(group: string): AlertState | undefined {
    const state = this.groups.get(group);
    return state ? this.toPublic(state) : undefined;
  }

  states(): AlertState[] {
    return [...this.groups.values()].map((state) => this.toPublic(state));
  }

  stats(): AlertEvaluatorStats {
    const groups = [...this.groups.values()];
    return {
      ...this.counters,
      rules: groups.reduce((total, g) => total + g.rules.length, 0),
      groups: groups.length,
      unknownGroups: groups.filter((g) => g.unknown).length,
    };
  }

  private evaluateRule(rule: AlertRule, snapshots: ReadonlyMap<string, MetricSnapshot>): RuleOutcome {
    const snapshot = snapshots.get(ruleSeriesKey(rule));
    if (!snapshot) {
      return { rule, known: false };
    }
    const value = readStatistic(snapshot, rule.statistic ?? 'value');
    if (value === undefined) {
      return { rule, known: false };
    }
    return { rule, known: true, value, breached: compare(value, rule.comparator, rule.threshold) };
  }

  /**
   * Commit a new severity, emitting one event per lattice step crossed.
   */
  private transition(
    state: GroupState,
    target: AlertSeverity,
    now: Date,
    rules: string[],
    values: Record<string, number>
  ): AlertEvent[] {
    const from = SEVERITY_RANK[state.severity];
    const to = SEVERITY_RANK[target];
    const direction = to > from ? 1 : -1;
    const events: AlertEvent[] = [];

    for (let rank = from; rank !== to; rank += direction) {
      const stepFrom = SEVERITY_LATTICE[rank];
      const stepTo = SEVERITY_LATTICE[rank + direction];
      events.push({
        group: state.group,
        from: stepFrom,
        to: stepTo,
        timestamp: now,
        rules: [...rules],
        values: { ...values },
        message:
          direction > 0
            ? `${state.group} escalated from ${stepFrom} to ${stepTo}`
            : `${state.group} recovered from ${stepFrom} to ${stepTo}`,
      });
    }

    state.severity = target;
    state.lastTransitionAt = now;
    state.consecutiveBelow = 0;
    state.pendingTarget = AlertSeverity.OK;
    this.counters.transitions += events.length;

    this.logger.info(
      { group: state.group, from: SEVERITY_LATTICE[from], to: target, rules },
      'Alert state changed'
    );
    return events;
  }

  private toPublic(state: GroupState): AlertState {
    return {
      group: state.group,
      severity: state.severity,
      lastTransitionAt: state.lastTransitionAt,
      consecutiveBelow: state.consecutiveBelow,
      unknown: state.unknown,
      unknownRules: [...state.unknownRules],
    };
  }
}
