// src/query_api.ts

import { InstanceRecord, InstanceView } from "./instance";
import { RegistryStore, ServiceSummary } from "./registry_store";

/**
 * What the router needs from the registry. Implemented in-process by
 * QueryApi and across processes by RemoteQueryApi.
 */
export interface ServiceQuery {
  /**
   * Healthy instances of a service. An unknown or fully-down service
   * yields an empty array, never an error.
   */
  resolve(serviceName: string): Promise<InstanceView[]>;

  services(): Promise<ServiceSummary[]>;
}

export class QueryApi implements ServiceQuery {
  constructor(private readonly store: RegistryStore) {}

  async resolve(serviceName: string): Promise<InstanceRecord[]> {
    return this.store.listHealthy(serviceName);
  }

  async services(): Promise<ServiceSummary[]> {
    return this.store.listServices();
  }
}
