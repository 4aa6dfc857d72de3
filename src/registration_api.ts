// src/registration_api.ts

import { ValidationError } from "./errors";
import {
  deriveInstanceId,
  InstanceAddress,
  InstanceRecord,
} from "./instance";
import { RegistryStore } from "./registry_store";

export interface RegistrationRequest {
  serviceName: string;
  /** Derived from the address as host:port when omitted */
  instanceId?: string;
  address: InstanceAddress;
  metadata?: Record<string, string>;
}

/**
 * The boundary backend instances talk to. It validates input and hands
 * it to the store; it never recreates a record on a stale renewal.
 */
export class RegistrationApi {
  constructor(private readonly store: RegistryStore) {}

  register(request: RegistrationRequest): InstanceRecord {
    const serviceName = requireName(request.serviceName, "serviceName");
    validateAddress(request.address);
    const instanceId =
      request.instanceId === undefined
        ? deriveInstanceId(request.address)
        : requireName(request.instanceId, "instanceId");

    return this.store.register(serviceName, instanceId, request.address, request.metadata);
  }

  /**
   * @throws NotFoundError when the instance is unknown; the caller must
   * register again
   */
  renew(serviceName: string, instanceId: string): InstanceRecord {
    return this.store.renew(
      requireName(serviceName, "serviceName"),
      requireName(instanceId, "instanceId"),
    );
  }

  deregister(serviceName: string, instanceId: string): boolean {
    return this.store.deregister(
      requireName(serviceName, "serviceName"),
      requireName(instanceId, "instanceId"),
    );
  }
}

function requireName(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} must not be empty`, field);
  }
  return trimmed;
}

function validateAddress(address: InstanceAddress): void {
  if (address.host.trim().length === 0) {
    throw new ValidationError("address.host must not be empty", "address.host");
  }
  if (!Number.isInteger(address.port) || address.port < 1 || address.port > 65535) {
    throw new ValidationError(
      `address.port must be an integer between 1 and 65535, got ${address.port}`,
      "address.port",
    );
  }
}
