// src/instance.ts

export type InstanceStatus = "UP" | "DOWN";

export type InstanceProtocol = "http" | "https";

/**
 * Where a backend instance can be reached.
 */
export interface InstanceAddress {
  host: string;
  port: number;
  /** Default: "http" */
  protocol?: InstanceProtocol;
}

/**
 * The part of a record exposed by the query boundary, and all the router
 * and load balancers need.
 */
export interface InstanceView {
  readonly instanceId: string;
  readonly address: Readonly<InstanceAddress>;
  readonly status: InstanceStatus;
}

/**
 * One running backend process as the registry sees it. Records are
 * immutable: every write produces a new object.
 */
export interface InstanceRecord extends InstanceView {
  readonly serviceName: string;
  readonly lastRenewalAt: number;
  readonly registeredAt: number;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Service names are matched without regard to case.
 */
export function normalizeServiceName(serviceName: string): string {
  return serviceName.trim().toLowerCase();
}

/**
 * The identifier used when a registering process does not supply one.
 */
export function deriveInstanceId(address: InstanceAddress): string {
  return `${address.host}:${address.port}`;
}

export function instanceBaseUrl(address: InstanceAddress): string {
  return `${address.protocol ?? "http"}://${address.host}:${address.port}`;
}

export function toInstanceView(record: InstanceRecord): InstanceView {
  return {
    instanceId: record.instanceId,
    address: { ...record.address },
    status: record.status,
  };
}
