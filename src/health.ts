// src/health.ts

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  message?: string;
  details?: Record<string, unknown>;
}

export interface HealthReport {
  /** Worst status among all components */
  status: HealthStatus;
  timestamp: Date;
  nodeId: string;
  components: ComponentHealth[];
  uptimeMs: number;
}

/**
 * Implemented by the store, the heartbeat monitor and the router so a node
 * can report on all of them at once.
 */
export interface HealthCheckable {
  getHealth(): ComponentHealth | Promise<ComponentHealth>;
}

/**
 * Priority: unhealthy > degraded > healthy
 */
export function combineHealthStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.includes("unhealthy")) return "unhealthy";
  if (statuses.includes("degraded")) return "degraded";
  return "healthy";
}

export class HealthAggregator {
  private readonly startTime: number;
  private readonly components = new Map<string, HealthCheckable>();

  constructor(
    private readonly nodeId: string,
    private readonly now: () => number = Date.now,
  ) {
    this.startTime = now();
  }

  register(name: string, component: HealthCheckable): void {
    this.components.set(name, component);
  }

  unregister(name: string): void {
    this.components.delete(name);
  }

  /**
   * Runs every component check. A check that throws counts as unhealthy
   * for that component only.
   */
  async getHealth(): Promise<HealthReport> {
    const componentHealths: ComponentHealth[] = [];

    for (const [name, component] of this.components) {
      try {
        componentHealths.push(await Promise.resolve(component.getHealth()));
      } catch (err) {
        componentHealths.push({
          name,
          status: "unhealthy",
          message: `Health check failed: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
    }

    return {
      status: combineHealthStatus(componentHealths.map((c) => c.status)),
      timestamp: new Date(this.now()),
      nodeId: this.nodeId,
      components: componentHealths,
      uptimeMs: this.now() - this.startTime,
    };
  }

  async isReady(): Promise<boolean> {
    const report = await this.getHealth();
    return report.status !== "unhealthy";
  }
}
