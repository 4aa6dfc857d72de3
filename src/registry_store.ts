// src/registry_store.ts

import { EventEmitter } from "events";
import { Clock, systemClock } from "./clock";
import { NotFoundError } from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import {
  InstanceAddress,
  InstanceRecord,
  normalizeServiceName,
} from "./instance";
import { createLogger, Logger } from "./logger";

export interface RegistryStoreConfig {
  /**
   * Age of the last renewal after which an instance stops being listed as
   * healthy and is flagged DOWN by the next sweep. Default: 30000
   */
  downAfterMs: number;
}

export const DEFAULT_REGISTRY_STORE_CONFIG: RegistryStoreConfig = {
  downAfterMs: 30000,
};

export interface ServiceSummary {
  serviceName: string;
  up: number;
  total: number;
}

/**
 * In-memory directory of service name -> instance records.
 *
 * Every operation is synchronous and runs to completion before any other
 * code on the event loop, so concurrent callers never interleave inside
 * the map. Records are frozen and replaced on every write; callers only
 * ever hold snapshots.
 *
 * Events (emitted after the map has been updated):
 * - 'registered' (record, isNew)
 * - 'renewed' (record)
 * - 'deregistered' (record)
 * - 'down' (record)
 * - 'evicted' (record)
 */
export class RegistryStore extends EventEmitter implements HealthCheckable {
  private readonly services = new Map<string, Map<string, InstanceRecord>>();
  private readonly config: RegistryStoreConfig;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    config: Partial<RegistryStoreConfig> = {},
    clock: Clock = systemClock,
    nodeId?: string,
  ) {
    super();
    this.config = { ...DEFAULT_REGISTRY_STORE_CONFIG, ...config };
    this.clock = clock;
    this.log = createLogger("RegistryStore", nodeId);
  }

  get downAfterMs(): number {
    return this.config.downAfterMs;
  }

  /**
   * Inserts or overwrites the record for (serviceName, instanceId) with
   * status UP. An overwrite keeps the original registeredAt.
   */
  register(
    serviceName: string,
    instanceId: string,
    address: InstanceAddress,
    metadata: Record<string, string> = {},
  ): InstanceRecord {
    const name = normalizeServiceName(serviceName);
    const now = this.clock.now();
    const instances = this.instancesFor(name);
    const existing = instances.get(instanceId);

    const record: InstanceRecord = {
      serviceName: name,
      instanceId,
      address: Object.freeze({ ...address, protocol: address.protocol ?? "http" }),
      status: "UP",
      lastRenewalAt: now,
      registeredAt: existing?.registeredAt ?? now,
      metadata: Object.freeze({ ...metadata }),
    };
    instances.set(instanceId, Object.freeze(record));

    this.log.debug(existing ? "Instance re-registered" : "Instance registered", {
      serviceName: name,
      instanceId,
    });
    this.emit("registered", record, existing === undefined);
    return record;
  }

  /**
   * Refreshes lastRenewalAt and brings a DOWN instance back UP.
   * @throws NotFoundError when the key is not registered
   */
  renew(serviceName: string, instanceId: string): InstanceRecord {
    const name = normalizeServiceName(serviceName);
    const instances = this.services.get(name);
    const existing = instances?.get(instanceId);
    if (!instances || !existing) {
      throw new NotFoundError(name, instanceId);
    }

    const record: InstanceRecord = {
      ...existing,
      status: "UP",
      lastRenewalAt: this.clock.now(),
    };
    instances.set(instanceId, Object.freeze(record));

    if (existing.status === "DOWN") {
      this.log.info("Instance back up after renewal", {
        serviceName: name,
        instanceId,
      });
    }
    this.emit("renewed", record);
    return record;
  }

  /**
   * Removes the record if present.
   * @returns whether a record was removed
   */
  deregister(serviceName: string, instanceId: string): boolean {
    const name = normalizeServiceName(serviceName);
    const instances = this.services.get(name);
    const existing = instances?.get(instanceId);
    if (!instances || !existing) {
      return false;
    }

    instances.delete(instanceId);
    if (instances.size === 0) {
      this.services.delete(name);
    }

    this.log.debug("Instance deregistered", { serviceName: name, instanceId });
    this.emit("deregistered", existing);
    return true;
  }

  /**
   * UP instances of a service whose last renewal is within downAfterMs, in
   * registration order. Unknown services yield an empty array.
   */
  listHealthy(serviceName: string): InstanceRecord[] {
    const instances = this.services.get(normalizeServiceName(serviceName));
    if (!instances) {
      return [];
    }

    const now = this.clock.now();
    const healthy: InstanceRecord[] = [];
    for (const record of instances.values()) {
      if (record.status === "UP" && now - record.lastRenewalAt <= this.config.downAfterMs) {
        healthy.push(record);
      }
    }
    return healthy;
  }

  /**
   * Removes every record not renewed for more than `thresholdMs` and flags
   * the survivors older than downAfterMs as DOWN.
   * @returns the number of evicted records
   */
  sweepExpired(now: number, thresholdMs: number): number {
    let evicted = 0;

    for (const [name, instances] of this.services) {
      for (const [instanceId, record] of instances) {
        const age = now - record.lastRenewalAt;

        if (age > thresholdMs) {
          instances.delete(instanceId);
          evicted++;
          this.log.info("Instance evicted", {
            serviceName: name,
            instanceId,
            sinceRenewalMs: age,
          });
          this.emit("evicted", record);
        } else if (age > this.config.downAfterMs && record.status === "UP") {
          const down: InstanceRecord = { ...record, status: "DOWN" };
          instances.set(instanceId, Object.freeze(down));
          this.log.warn("Instance missed renewal, marked DOWN", {
            serviceName: name,
            instanceId,
            sinceRenewalMs: age,
          });
          this.emit("down", down);
        }
      }

      if (instances.size === 0) {
        this.services.delete(name);
      }
    }

    return evicted;
  }

  get(serviceName: string, instanceId: string): InstanceRecord | undefined {
    return this.services.get(normalizeServiceName(serviceName))?.get(instanceId);
  }

  /**
   * Every record, DOWN ones included. Restricted to one service when a
   * name is given.
   */
  listAll(serviceName?: string): InstanceRecord[] {
    if (serviceName !== undefined) {
      const instances = this.services.get(normalizeServiceName(serviceName));
      return instances ? Array.from(instances.values()) : [];
    }

    const all: InstanceRecord[] = [];
    for (const instances of this.services.values()) {
      all.push(...instances.values());
    }
    return all;
  }

  listServices(): ServiceSummary[] {
    const healthyCount = (name: string) => this.listHealthy(name).length;
    return Array.from(this.services.entries(), ([serviceName, instances]) => ({
      serviceName,
      up: healthyCount(serviceName),
      total: instances.size,
    }));
  }

  size(): number {
    let count = 0;
    for (const instances of this.services.values()) {
      count += instances.size;
    }
    return count;
  }

  clear(): void {
    this.services.clear();
  }

  getHealth(): ComponentHealth {
    const total = this.size();
    const down = this.listAll().filter((r) => r.status === "DOWN").length;
    return {
      name: "RegistryStore",
      status: "healthy",
      message: `${total - down} of ${total} instances up`,
      details: {
        services: this.services.size,
        instances: total,
        down,
      },
    };
  }

  private instancesFor(name: string): Map<string, InstanceRecord> {
    let instances = this.services.get(name);
    if (!instances) {
      instances = new Map();
      this.services.set(name, instances);
    }
    return instances;
  }
}
