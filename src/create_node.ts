// src/create_node.ts

import { Server } from "http";
import { Express } from "express";
import { v4 as uuidv4 } from "uuid";
import { Clock, systemClock } from "./clock";
import { DEFAULT_SETTINGS, Settings } from "./config";
import { Forwarder } from "./forwarder";
import { createGatewayApp, GatewayAppConfig } from "./gateway_app";
import { HealthAggregator } from "./health";
import { HeartbeatConfig, HeartbeatMonitor, resolveHeartbeatConfig } from "./heartbeat";
import { HttpForwarder } from "./http_forwarder";
import { InMemoryTransport } from "./in_memory_transport";
import { createLoadBalancer } from "./load_balancer";
import { createLogger } from "./logger";
import { QueryApi, ServiceQuery } from "./query_api";
import { RegistrationApi } from "./registration_api";
import { RegistryServer } from "./registry_server";
import { RegistryStore } from "./registry_store";
import { RouteTable } from "./route";
import { Router } from "./router";
import { Transport } from "./transport";
import { ZeroMQTransport } from "./zeromq_transport";

export interface LocalRegistryConfig {
  type?: "local";
  nodeId?: string;
  heartbeat?: Partial<HeartbeatConfig>;
  /** Default: the heartbeat interval */
  downAfterMs?: number;
  clock?: Clock;
}

export interface DistributedRegistryConfig extends Omit<LocalRegistryConfig, "type"> {
  type: "distributed";
  /** Port of the ZeroMQ socket serving the registry protocol */
  rpcPort: number;
  /** Default: 0.0.0.0 */
  bindAddress?: string;
}

/**
 * A running registry: the store, its eviction sweep and the protocol
 * server, wired to one transport.
 */
export interface RegistryNode {
  readonly nodeId: string;
  readonly store: RegistryStore;
  readonly monitor: HeartbeatMonitor;
  readonly registration: RegistrationApi;
  readonly query: QueryApi;
  readonly transport: Transport;
  readonly health: HealthAggregator;
  shutdown(): Promise<void>;
}

function assembleRegistry(
  nodeId: string,
  transport: Transport,
  config: Omit<LocalRegistryConfig, "type">,
): RegistryNode {
  const clock = config.clock ?? systemClock;
  const heartbeat = resolveHeartbeatConfig(config.heartbeat);
  const store = new RegistryStore(
    { downAfterMs: config.downAfterMs ?? heartbeat.intervalMs },
    clock,
    nodeId,
  );
  const monitor = new HeartbeatMonitor(store, heartbeat, clock, nodeId);
  const registration = new RegistrationApi(store);
  const query = new QueryApi(store);

  new RegistryServer(transport, registration, query).listen();
  monitor.start();

  const health = new HealthAggregator(nodeId, () => clock.now());
  health.register("store", store);
  health.register("heartbeat", monitor);

  return {
    nodeId,
    store,
    monitor,
    registration,
    query,
    transport,
    health,
    async shutdown() {
      monitor.stop();
      await transport.disconnect();
      store.clear();
    },
  };
}

/**
 * Creates a registry node.
 *
 * @example Local mode (in-process transport)
 * ```typescript
 * const registry = createRegistryNode({ heartbeat: { intervalMs: 10000 } });
 * ```
 *
 * @example Distributed mode (ZeroMQ, reachable by other processes)
 * ```typescript
 * const registry = await createRegistryNode({ type: "distributed", rpcPort: 7000 });
 * ```
 */
export function createRegistryNode(config?: LocalRegistryConfig): RegistryNode;
export function createRegistryNode(config: DistributedRegistryConfig): Promise<RegistryNode>;
export function createRegistryNode(
  config: LocalRegistryConfig | DistributedRegistryConfig = {},
): RegistryNode | Promise<RegistryNode> {
  const nodeId = config.nodeId ?? `registry-${uuidv4().slice(0, 8)}`;

  if (config.type !== "distributed") {
    const transport = new InMemoryTransport(nodeId);
    // Connecting in memory completes synchronously.
    void transport.connect();
    return assembleRegistry(nodeId, transport, config);
  }

  const transport = new ZeroMQTransport({
    nodeId,
    rpcPort: config.rpcPort,
    bindAddress: config.bindAddress,
  });
  return transport.connect().then(() => assembleRegistry(nodeId, transport, config));
}

export interface GatewayNodeConfig {
  nodeId?: string;
  /** Where instances are looked up: a local QueryApi or a RemoteQueryApi */
  query: ServiceQuery;
  /** Default: DEFAULT_SETTINGS */
  settings?: Settings;
  /** Default: HttpForwarder */
  forwarder?: Forwarder;
  /** Default: 0 (any free port) */
  port?: number;
  /** Default: 0.0.0.0 */
  host?: string;
  app?: Partial<GatewayAppConfig>;
  /** Extra components reported on the health endpoint */
  health?: HealthAggregator;
}

export interface GatewayNode {
  readonly nodeId: string;
  readonly router: Router;
  readonly app: Express;
  readonly server: Server;
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Builds the router from settings and starts the HTTP listener.
 */
export async function createGatewayNode(config: GatewayNodeConfig): Promise<GatewayNode> {
  const nodeId = config.nodeId ?? `gateway-${uuidv4().slice(0, 8)}`;
  const settings = config.settings ?? DEFAULT_SETTINGS;
  const log = createLogger("GatewayNode", nodeId);

  const router = new Router(
    new RouteTable(settings.routes),
    config.query,
    config.forwarder ?? new HttpForwarder(undefined, nodeId),
    {
      balancer: createLoadBalancer(settings.loadBalancer),
      config: settings.router,
      nodeId,
    },
  );

  const health = config.health ?? new HealthAggregator(nodeId);
  health.register("router", router);

  const app = createGatewayApp(router, health, config.app);
  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port ?? 0, config.host ?? "0.0.0.0", () => resolve(listening));
    listening.once("error", reject);
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.port ?? 0;
  log.info("Gateway listening", { port, routes: settings.routes.length });

  return {
    nodeId,
    router,
    app,
    server,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}
