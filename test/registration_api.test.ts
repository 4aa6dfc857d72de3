// test/registration_api.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import {
  ManualClock,
  NotFoundError,
  QueryApi,
  RegistrationApi,
  RegistryStore,
  ValidationError,
} from "../src";

describe("RegistrationApi", () => {
  let clock: ManualClock;
  let store: RegistryStore;
  let api: RegistrationApi;

  beforeEach(() => {
    clock = new ManualClock(0);
    store = new RegistryStore({ downAfterMs: 30000 }, clock);
    api = new RegistrationApi(store);
  });

  it("should derive the instance ID from the address when none is given", () => {
    const record = api.register({ serviceName: "catalog", address: { host: "host1", port: 8081 } });
    expect(record.instanceId).toBe("host1:8081");
  });

  it("should prefer an explicit instance ID", () => {
    const record = api.register({
      serviceName: "catalog",
      instanceId: "catalog-1",
      address: { host: "host1", port: 8081 },
    });
    expect(record.instanceId).toBe("catalog-1");
  });

  it("should keep metadata and protocol", () => {
    const record = api.register({
      serviceName: "catalog",
      address: { host: "host1", port: 8443, protocol: "https" },
      metadata: { version: "2" },
    });
    expect(record.address.protocol).toBe("https");
    expect(record.metadata).toEqual({ version: "2" });
  });

  it.each([
    { request: { serviceName: "  ", address: { host: "host1", port: 8081 } }, field: "serviceName" },
    { request: { serviceName: "catalog", address: { host: "", port: 8081 } }, field: "address.host" },
    { request: { serviceName: "catalog", address: { host: "host1", port: 0 } }, field: "address.port" },
    { request: { serviceName: "catalog", address: { host: "host1", port: 70000 } }, field: "address.port" },
    { request: { serviceName: "catalog", address: { host: "host1", port: 80.5 } }, field: "address.port" },
    {
      request: { serviceName: "catalog", instanceId: "", address: { host: "host1", port: 8081 } },
      field: "instanceId",
    },
  ])("should reject an invalid $field", ({ request, field }) => {
    try {
      api.register(request);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ code: "VALIDATION_FAILED", context: { field } });
    }
    expect(store.size()).toBe(0);
  });

  it("should surface NotFoundError on a stale renewal without recreating the record", () => {
    expect(() => api.renew("catalog", "host1:8081")).toThrow(NotFoundError);
    expect(store.size()).toBe(0);
  });

  it("should renew and deregister", () => {
    api.register({ serviceName: "catalog", address: { host: "host1", port: 8081 } });
    clock.advance(1000);
    expect(api.renew("catalog", "host1:8081").lastRenewalAt).toBe(1000);
    expect(api.deregister("catalog", "host1:8081")).toBe(true);
    expect(api.deregister("catalog", "host1:8081")).toBe(false);
  });
});

describe("QueryApi", () => {
  let clock: ManualClock;
  let store: RegistryStore;
  let query: QueryApi;

  beforeEach(() => {
    clock = new ManualClock(0);
    store = new RegistryStore({ downAfterMs: 30000 }, clock);
    query = new QueryApi(store);
  });

  it("should resolve an unknown service to an empty list", async () => {
    await expect(query.resolve("catalog")).resolves.toEqual([]);
  });

  it("should never return DOWN instances", async () => {
    store.register("catalog", "host1:8081", { host: "host1", port: 8081 });
    clock.advance(20000);
    store.register("catalog", "host1:8082", { host: "host1", port: 8082 });
    clock.advance(15000);
    store.sweepExpired(clock.now(), 90000);

    const instances = await query.resolve("catalog");
    expect(instances.map((i) => i.instanceId)).toEqual(["host1:8082"]);
  });

  it("should treat a service whose instances are all DOWN as empty", async () => {
    store.register("catalog", "host1:8081", { host: "host1", port: 8081 });
    clock.advance(40000);
    store.sweepExpired(clock.now(), 90000);

    await expect(query.resolve("catalog")).resolves.toEqual([]);
    await expect(query.services()).resolves.toEqual([
      { serviceName: "catalog", up: 0, total: 1 },
    ]);
  });
});
