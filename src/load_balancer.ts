// src/load_balancer.ts

import { EmptyTargetSetError } from "./errors";
import { InstanceView, normalizeServiceName } from "./instance";

export type LoadBalancerStrategy = "round-robin" | "random";

/**
 * Picks one instance out of the healthy candidates for a service.
 */
export interface LoadBalancer {
  /**
   * @throws EmptyTargetSetError when `instances` is empty
   */
  select<T extends InstanceView>(serviceName: string, instances: readonly T[]): T;
}

function byInstanceId(a: InstanceView, b: InstanceView): number {
  if (a.instanceId < b.instanceId) return -1;
  if (a.instanceId > b.instanceId) return 1;
  return 0;
}

/**
 * Round-robin with one counter per service. Candidates are ordered by
 * instance ID before indexing, so the cycle does not depend on the order
 * the registry returned them in. The counter is not tied to instance
 * identity: when membership changes the cycle shifts.
 *
 * Retries draw from the same counter as first attempts, so each failed
 * attempt also moves where the next request starts.
 */
export class RoundRobinLoadBalancer implements LoadBalancer {
  private readonly counters = new Map<string, number>();

  select<T extends InstanceView>(serviceName: string, instances: readonly T[]): T {
    const key = normalizeServiceName(serviceName);
    if (instances.length === 0) {
      throw new EmptyTargetSetError(key);
    }

    const sorted = [...instances].sort(byInstanceId);
    const counter = this.counters.get(key) ?? 0;
    this.counters.set(key, (counter + 1) % Number.MAX_SAFE_INTEGER);
    return sorted[counter % sorted.length];
  }

  reset(serviceName?: string): void {
    if (serviceName === undefined) {
      this.counters.clear();
    } else {
      this.counters.delete(normalizeServiceName(serviceName));
    }
  }
}

export class RandomLoadBalancer implements LoadBalancer {
  constructor(private readonly random: () => number = Math.random) {}

  select<T extends InstanceView>(serviceName: string, instances: readonly T[]): T {
    if (instances.length === 0) {
      throw new EmptyTargetSetError(normalizeServiceName(serviceName));
    }
    const index = Math.min(Math.floor(this.random() * instances.length), instances.length - 1);
    return instances[index];
  }
}

export function createLoadBalancer(strategy: LoadBalancerStrategy): LoadBalancer {
  switch (strategy) {
    case "round-robin":
      return new RoundRobinLoadBalancer();
    case "random":
      return new RandomLoadBalancer();
  }
}
