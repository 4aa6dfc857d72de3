// src/registry_client.ts

import { EventEmitter } from "events";
import { z } from "zod";
import { RegistryProtocolError } from "./errors";
import { DEFAULT_HEARTBEAT_INTERVAL_MS } from "./heartbeat";
import {
  deriveInstanceId,
  InstanceAddress,
  InstanceRecord,
  InstanceView,
} from "./instance";
import { createLogger, Logger, toError } from "./logger";
import { ServiceQuery } from "./query_api";
import {
  deregisterReplySchema,
  FailureReply,
  instanceReplySchema,
  RegistryRequest,
  resolveReplySchema,
  servicesReplySchema,
} from "./registry_protocol";
import { ServiceSummary } from "./registry_store";
import { Transport } from "./transport";

export const DEFAULT_REGISTRY_REQUEST_TIMEOUT_MS = 5000;

/**
 * Sends one registry request and validates the reply. Failure replies are
 * returned, malformed ones throw RegistryProtocolError.
 */
async function call<T extends z.ZodTypeAny>(
  transport: Transport,
  registryNodeId: string,
  message: RegistryRequest,
  schema: T,
  timeoutMs: number,
): Promise<z.infer<T>> {
  const reply = await transport.request(registryNodeId, message, timeoutMs);
  const parsed = schema.safeParse(reply);
  if (!parsed.success) {
    throw new RegistryProtocolError(`Malformed reply to ${message.type}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function rejected(type: string, reply: FailureReply): RegistryProtocolError {
  return new RegistryProtocolError(`${type} rejected: ${reply.message}`, reply.code);
}

export interface RegistryClientConfig {
  /** Node ID of the registry on the transport */
  registryNodeId: string;
  serviceName: string;
  /** Default: host:port of the address */
  instanceId?: string;
  address: InstanceAddress;
  metadata?: Record<string, string>;
  /** Renewal cadence; should match the registry's heartbeat interval. Default: 30000 */
  renewIntervalMs?: number;
  /** Default: 5000 */
  requestTimeoutMs?: number;
}

export type RenewOutcome = "renewed" | "re-registered";

/**
 * Embedded in a backend instance: registers it, renews on a timer and
 * deregisters on shutdown. A renewal answered with NOT_FOUND means the
 * registry evicted or never had this instance, so it registers again.
 *
 * Events:
 * - 'registered' (InstanceRecord)
 * - 'renewed' (InstanceRecord)
 * - 're_registered' (InstanceRecord)
 * - 'renew_failed' (Error)
 */
export class RegistryClient extends EventEmitter {
  readonly instanceId: string;
  private readonly transport: Transport;
  private readonly config: RegistryClientConfig;
  private readonly renewIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;
  private renewTimer?: NodeJS.Timeout;
  private renewing = false;

  constructor(transport: Transport, config: RegistryClientConfig) {
    super();
    this.transport = transport;
    this.config = config;
    this.instanceId = config.instanceId ?? deriveInstanceId(config.address);
    this.renewIntervalMs = config.renewIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REGISTRY_REQUEST_TIMEOUT_MS;
    this.log = createLogger("RegistryClient", transport.getNodeId()).child({
      serviceName: config.serviceName,
      instanceId: this.instanceId,
    });
  }

  isRunning(): boolean {
    return this.renewTimer !== undefined;
  }

  async register(): Promise<InstanceRecord> {
    const reply = await call(
      this.transport,
      this.config.registryNodeId,
      {
        type: "registry:register",
        serviceName: this.config.serviceName,
        instanceId: this.instanceId,
        address: this.config.address,
        metadata: this.config.metadata,
      },
      instanceReplySchema,
      this.requestTimeoutMs,
    );
    if (!reply.ok) {
      throw rejected("register", reply);
    }
    this.log.info("Registered with registry");
    this.emit("registered", reply.instance);
    return reply.instance;
  }

  /**
   * Renews once. A NOT_FOUND reply triggers a fresh registration.
   */
  async renew(): Promise<RenewOutcome> {
    const reply = await call(
      this.transport,
      this.config.registryNodeId,
      {
        type: "registry:renew",
        serviceName: this.config.serviceName,
        instanceId: this.instanceId,
      },
      instanceReplySchema,
      this.requestTimeoutMs,
    );

    if (reply.ok) {
      this.emit("renewed", reply.instance);
      return "renewed";
    }
    if (reply.code !== "NOT_FOUND") {
      throw rejected("renew", reply);
    }

    this.log.warn("Registry no longer knows this instance, registering again");
    const instance = await this.register();
    this.emit("re_registered", instance);
    return "re-registered";
  }

  /**
   * @returns whether the registry held a record to remove
   */
  async deregister(): Promise<boolean> {
    const reply = await call(
      this.transport,
      this.config.registryNodeId,
      {
        type: "registry:deregister",
        serviceName: this.config.serviceName,
        instanceId: this.instanceId,
      },
      deregisterReplySchema,
      this.requestTimeoutMs,
    );
    if (!reply.ok) {
      throw rejected("deregister", reply);
    }
    this.log.info("Deregistered from registry", { removed: reply.removed });
    return reply.removed;
  }

  /**
   * Registers, then renews every renewIntervalMs until stop().
   */
  async start(): Promise<void> {
    if (this.renewTimer) {
      this.log.warn("RegistryClient already running");
      return;
    }
    await this.register();
    this.renewTimer = setInterval(() => {
      void this.renewInBackground();
    }, this.renewIntervalMs);
  }

  /**
   * Stops renewing and deregisters. Deregistration is best-effort: a
   * failure is logged, the registry will evict the instance anyway.
   */
  async stop(): Promise<void> {
    if (!this.renewTimer) {
      return;
    }
    clearInterval(this.renewTimer);
    this.renewTimer = undefined;

    try {
      await this.deregister();
    } catch (err) {
      this.log.warn("Deregistration failed; the registry will evict this instance", {
        error: toError(err).message,
      });
    }
  }

  private async renewInBackground(): Promise<void> {
    // Skip a tick while the previous renewal is still waiting on the registry.
    if (this.renewing) {
      return;
    }
    this.renewing = true;
    try {
      await this.renew();
    } catch (err) {
      const error = toError(err);
      this.log.warn("Renewal failed, retrying next interval", { error: error.message });
      if (this.listenerCount("renew_failed") > 0) {
        this.emit("renew_failed", error);
      }
    } finally {
      this.renewing = false;
    }
  }
}

/**
 * ServiceQuery backed by a registry on another node.
 */
export class RemoteQueryApi implements ServiceQuery {
  constructor(
    private readonly transport: Transport,
    private readonly registryNodeId: string,
    private readonly requestTimeoutMs = DEFAULT_REGISTRY_REQUEST_TIMEOUT_MS,
  ) {}

  async resolve(serviceName: string): Promise<InstanceView[]> {
    const reply = await call(
      this.transport,
      this.registryNodeId,
      { type: "registry:resolve", serviceName },
      resolveReplySchema,
      this.requestTimeoutMs,
    );
    if (!reply.ok) {
      throw rejected("resolve", reply);
    }
    return reply.instances.filter((instance) => instance.status === "UP");
  }

  async services(): Promise<ServiceSummary[]> {
    const reply = await call(
      this.transport,
      this.registryNodeId,
      { type: "registry:services" },
      servicesReplySchema,
      this.requestTimeoutMs,
    );
    if (!reply.ok) {
      throw rejected("services", reply);
    }
    return reply.services;
  }
}

