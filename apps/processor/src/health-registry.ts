import {
  DEFAULT_HEALTH_STALE_AFTER_MS,
  HealthStatus,
  type ComponentHealth,
  type HealthCheck,
  type HealthReport,
} from '@beacon/core';

const STATUS_RANK: Record<HealthStatus, number> = {
  [HealthStatus.HEALTHY]: 0,
  [HealthStatus.DEGRADED]: 1,
  [HealthStatus.UNKNOWN]: 2,
  [HealthStatus.UNHEALTHY]: 3,
};

function worst(a: HealthStatus, b: HealthStatus): HealthStatus {
  return STATUS_RANK[a] >= STATUS_RANK[b] ? a : b;
}

/**
 * Latest health check per component, rolled up through declared dependencies.
 */
export class HealthRegistry {
  private checks: Map<string, HealthCheck> = new Map();
  private readonly staleAfterMs: number;

  constructor(options: { staleAfterMs?: number } = {}) {
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_HEALTH_STALE_AFTER_MS;
  }

  /**
   * Store a check unless a newer one for the component is already held.
   */
  record(check: HealthCheck): void {
    const existing = this.checks.get(check.component);
    if (existing && existing.lastChecked.getTime() > check.lastChecked.getTime()) {
      return;
    }
    this.checks.set(check.component, check);
  }

  components(): string[] {
    return [...this.checks.keys()].sort();
  }

  report(now: Date = new Date()): HealthReport {
    const effective = new Map<string, HealthStatus>();
    for (const [name, check] of this.checks) {
      const stale = now.getTime() - check.lastChecked.getTime() > this.staleAfterMs;
      effective.set(name, stale ? HealthStatus.UNKNOWN : check.status);
    }

    // Statuses only ever worsen to degraded here, so this settles even
    // when dependencies form a cycle.
    let changed = true;
    while (changed) {
      changed = false;
      for (const [name, check] of this.checks) {
        const current = effective.get(name) ?? HealthStatus.UNKNOWN;
        const impaired = check.dependencies.some((dep) => {
          const status = effective.get(dep);
          return status === undefined || status !== HealthStatus.HEALTHY;
        });
        const next = impaired ? worst(current, HealthStatus.DEGRADED) : current;
        if (next !== current) {
          effective.set(name, next);
          changed = true;
        }
      }
    }

    const components: Record<string, ComponentHealth> = {};
    const summary: Record<HealthStatus, number> = {
      [HealthStatus.HEALTHY]: 0,
      [HealthStatus.DEGRADED]: 0,
      [HealthStatus.UNHEALTHY]: 0,
      [HealthStatus.UNKNOWN]: 0,
    };
    let status = HealthStatus.HEALTHY;

    for (const name of this.components()) {
      const check = this.checks.get(name);
      if (!check) {
        continue;
      }
      const componentStatus = effective.get(name) ?? HealthStatus.UNKNOWN;
      components[name] = {
        component: name,
        reported: check.status,
        effective: componentStatus,
        lastChecked: check.lastChecked,
        dependencies: [...check.dependencies],
        missingDependencies: check.dependencies.filter((dep) => !this.checks.has(dep)),
        message: check.message,
      };
      summary[componentStatus]++;
      status = worst(status, componentStatus);
    }

    return { status, timestamp: now, components, summary };
  }
}
