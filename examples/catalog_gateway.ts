// examples/catalog_gateway.ts
//
// Demonstrates: registry, heartbeat expiry and the gateway in one process
// Prerequisites: None (uses in-memory transport for simplicity)
// Run: npx tsx examples/catalog_gateway.ts
//
// Two "catalog" backends register with the registry and keep renewing.
// Requests to /catalog/** go through the gateway and alternate between
// them. When one backend stops renewing it is flagged DOWN after one
// heartbeat interval and evicted after three; the gateway stops sending
// it traffic as soon as it is flagged.

import express from "express";
import { Server } from "http";
import axios from "axios";
import {
  createGatewayNode,
  createRegistryNode,
  HealthReport,
  InMemoryTransport,
  InstanceRecord,
  loadSettings,
  loggerConfig,
  MapConfigSource,
  RegistryClient,
} from "../src";

const HEARTBEAT_MS = 500;

interface Echo {
  backend: string;
  path: string;
}

function startBackend(name: string, port: number): Promise<Server> {
  const app = express();
  app.get("*", (req, res) => {
    res.json({ backend: name, path: req.originalUrl });
  });
  return new Promise((resolve) => {
    const server = app.listen(port, "127.0.0.1", () => resolve(server));
  });
}

async function main() {
  loggerConfig.configureFromEnv();

  console.log("=== Catalog Gateway Demo ===\n");

  const settings = await loadSettings(
    new MapConfigSource({
      "registry.heartbeatIntervalMs": String(HEARTBEAT_MS),
      "gateway.routes": JSON.stringify([
        { routeId: "catalog", pathPredicate: "/catalog/**", targetServiceName: "catalog" },
      ]),
    }),
  );

  const registry = createRegistryNode({
    nodeId: "registry",
    heartbeat: settings.heartbeat,
    downAfterMs: settings.downAfterMs,
  });
  registry.store.on("down", (record: InstanceRecord) => console.log(`  [registry] ${record.instanceId} is DOWN`));
  registry.store.on("evicted", (record: InstanceRecord) => console.log(`  [registry] ${record.instanceId} evicted`));

  // Each backend talks to the registry over its own transport.
  const backends = await Promise.all([startBackend("A", 8081), startBackend("B", 8082)]);
  const clients = ["A", "B"].map((name, i) => {
    const transport = new InMemoryTransport(`backend-${name}`);
    if (registry.transport instanceof InMemoryTransport) {
      registry.transport.setPeer(transport.getNodeId(), transport);
    }
    void transport.connect();
    return new RegistryClient(transport, {
      registryNodeId: "registry",
      serviceName: "catalog",
      address: { host: "127.0.0.1", port: 8081 + i },
      renewIntervalMs: HEARTBEAT_MS / 2,
    });
  });
  await Promise.all(clients.map((c) => c.start()));

  const gateway = await createGatewayNode({
    nodeId: "gateway",
    query: registry.query,
    settings,
    host: "127.0.0.1",
    port: 8080,
    health: registry.health,
  });

  console.log("--- Round-robin over two healthy instances ---");
  for (let i = 0; i < 4; i++) {
    const { data } = await axios.get<Echo>(`http://127.0.0.1:${gateway.port}/catalog/items`);
    console.log(`  GET /catalog/items -> backend ${data.backend} saw ${data.path}`);
  }

  console.log("\n--- Backend A stops renewing (simulated hang) ---");
  // Stop A's renewals, then put its record back as if it had hung
  // without deregistering.
  await clients[0].stop();
  registry.registration.register({ serviceName: "catalog", address: { host: "127.0.0.1", port: 8081 } });
  await sleep(HEARTBEAT_MS * 2.5);

  for (let i = 0; i < 2; i++) {
    const { data } = await axios.get<Echo>(`http://127.0.0.1:${gateway.port}/catalog/items`);
    console.log(`  GET /catalog/items -> backend ${data.backend}`);
  }

  await sleep(HEARTBEAT_MS * 2);

  const health = await axios.get<HealthReport>(`http://127.0.0.1:${gateway.port}/health`);
  console.log(`\n  /health -> ${health.data.status}`);

  console.log("\n--- Shutdown ---");
  await Promise.all(clients.map((c) => c.stop()));
  await gateway.close();
  await registry.shutdown();
  for (const backend of backends) {
    backend.close();
  }

  console.log("\n=== Demo Complete ===");
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

main().catch(console.error);
