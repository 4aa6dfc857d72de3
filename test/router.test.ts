// test/router.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import {
  DownstreamConnectError,
  DownstreamRequest,
  DownstreamResponse,
  DownstreamTimeoutError,
  EmptyTargetSetError,
  ForwardOptions,
  Forwarder,
  GatewayRequest,
  InstanceView,
  RequestCancelledError,
  RouteNotMatchedError,
  RouteTable,
  Router,
  RouterTransition,
  ServiceQuery,
  ServiceSummary,
} from "../src";

class FakeQuery implements ServiceQuery {
  readonly instances = new Map<string, InstanceView[]>();
  failure?: Error;

  async resolve(serviceName: string): Promise<InstanceView[]> {
    if (this.failure) {
      throw this.failure;
    }
    return this.instances.get(serviceName) ?? [];
  }

  async services(): Promise<ServiceSummary[]> {
    return [];
  }
}

type Behaviour = (instance: InstanceView) => DownstreamResponse | Error;

class FakeForwarder implements Forwarder {
  readonly calls: Array<{ instance: InstanceView; request: DownstreamRequest; options: ForwardOptions }> = [];
  behaviour: Behaviour = (instance) => ok(instance.instanceId);

  async forward(
    instance: InstanceView,
    request: DownstreamRequest,
    options: ForwardOptions,
  ): Promise<DownstreamResponse> {
    this.calls.push({ instance, request, options });
    const result = this.behaviour(instance);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

function ok(body: string, status = 200): DownstreamResponse {
  return { status, headers: { "content-type": "text/plain" }, body: Buffer.from(body) };
}

function instance(port: number, status: "UP" | "DOWN" = "UP"): InstanceView {
  return { instanceId: `host1:${port}`, address: { host: "host1", port }, status };
}

function get(url: string, headers: GatewayRequest["headers"] = {}): GatewayRequest {
  return { method: "GET", url, headers };
}

describe("Router", () => {
  let query: FakeQuery;
  let forwarder: FakeForwarder;
  let router: Router;
  const routes = new RouteTable([
    { routeId: "catalog", pathPredicate: "/catalog/**", targetServiceName: "catalog" },
  ]);

  beforeEach(() => {
    query = new FakeQuery();
    forwarder = new FakeForwarder();
    router = new Router(routes, query, forwarder, { config: { retryBudget: 1, forwardTimeoutMs: 2000 } });
  });

  it("should alternate requests between two instances", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);

    const first = await router.route(get("/catalog/items"));
    const second = await router.route(get("/catalog/items"));

    expect(first.state).toBe("RESPOND");
    expect(second.state).toBe("RESPOND");
    expect(forwarder.calls.map((c) => c.instance.instanceId)).toEqual(["host1:8081", "host1:8082"]);
    expect(forwarder.calls[0].request.path).toBe("/items");
  });

  it("should answer UNAVAILABLE when the service has no instances", async () => {
    const outcome = await router.route(get("/catalog/items"));

    expect(outcome.state).toBe("UNAVAILABLE");
    if (outcome.state === "UNAVAILABLE") {
      expect(outcome.error).toBeInstanceOf(EmptyTargetSetError);
      expect(outcome.attempts).toBe(0);
    }
    expect(forwarder.calls).toHaveLength(0);
  });

  it("should never select a DOWN instance", async () => {
    query.instances.set("catalog", [instance(8081, "DOWN")]);
    expect((await router.route(get("/catalog/items"))).state).toBe("UNAVAILABLE");
  });

  it("should answer UNAVAILABLE when the registry lookup fails", async () => {
    query.failure = new Error("registry unreachable");
    expect((await router.route(get("/catalog/items"))).state).toBe("UNAVAILABLE");
  });

  it("should answer NOT_FOUND when no route matches", async () => {
    const outcome = await router.route(get("/orders/1"));

    expect(outcome.state).toBe("NOT_FOUND");
    if (outcome.state === "NOT_FOUND") {
      expect(outcome.error).toBeInstanceOf(RouteNotMatchedError);
      expect(outcome.error.message).toBe("No route matches path: /orders/1");
    }
  });

  it("should retry a connect failure once on another instance", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = (target) =>
      target.instanceId === "host1:8081" ? new DownstreamConnectError(target.instanceId) : ok("from B");

    const outcome = await router.route(get("/catalog/items"));

    expect(outcome.state).toBe("RESPOND");
    if (outcome.state === "RESPOND") {
      expect(outcome.instance.instanceId).toBe("host1:8082");
      expect(outcome.attempts).toBe(2);
      expect(outcome.response.body.toString()).toBe("from B");
    }
  });

  it("should fail after retry budget + 1 attempts when every attempt fails", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082), instance(8083)]);
    forwarder.behaviour = (target) => new DownstreamConnectError(target.instanceId);

    const outcome = await router.route(get("/catalog/items"));

    expect(outcome.state).toBe("FAILED");
    if (outcome.state === "FAILED") {
      expect(outcome.attempts).toBe(2);
      expect(outcome.failedInstances).toEqual(["host1:8081", "host1:8083"]);
      expect(outcome.error).toBeInstanceOf(DownstreamConnectError);
    }
    expect(forwarder.calls).toHaveLength(2);
  });

  it("should retry timeouts too", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = (target) => new DownstreamTimeoutError(target.instanceId, 2000);

    const outcome = await router.route(get("/catalog/items"));
    expect(outcome).toMatchObject({ state: "FAILED", attempts: 2 });
  });

  it("should stop when no untried instance is left", async () => {
    router = new Router(routes, query, forwarder, { config: { retryBudget: 5 } });
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = (target) => new DownstreamConnectError(target.instanceId);

    const outcome = await router.route(get("/catalog/items"));
    expect(outcome).toMatchObject({ state: "FAILED", attempts: 2 });
  });

  it("should not retry with a zero budget", async () => {
    router = new Router(routes, query, forwarder, { config: { retryBudget: 0 } });
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = (target) => new DownstreamConnectError(target.instanceId);

    expect(await router.route(get("/catalog/items"))).toMatchObject({ state: "FAILED", attempts: 1 });
  });

  it("should relay a 5xx response instead of retrying", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = () => ok("oops", 500);

    const outcome = await router.route(get("/catalog/items"));
    expect(outcome).toMatchObject({ state: "RESPOND", attempts: 1, response: { status: 500 } });
  });

  it("should not retry an unexpected error", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = () => new Error("bug");

    const outcome = await router.route(get("/catalog/items"));
    expect(outcome).toMatchObject({ state: "FAILED", attempts: 1 });
  });

  it("should end CANCELLED when the caller goes away", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = (target) => new RequestCancelledError(target.instanceId);

    const outcome = await router.route(get("/catalog/items"));
    expect(outcome).toMatchObject({ state: "CANCELLED", attempts: 1 });
    expect(forwarder.calls).toHaveLength(1);
  });

  it("should pass the timeout and the caller's signal to the forwarder", async () => {
    query.instances.set("catalog", [instance(8081)]);
    const controller = new AbortController();

    await router.route(get("/catalog/items"), controller.signal);
    expect(forwarder.calls[0].options).toEqual({ timeoutMs: 2000, signal: controller.signal });
  });

  it("should rewrite headers for the downstream request", async () => {
    query.instances.set("catalog", [instance(8081)]);

    await router.route({
      method: "POST",
      url: "/catalog/items?x=1",
      headers: {
        host: "gw.local",
        connection: "keep-alive, x-secret",
        "x-secret": "1",
        "content-length": "3",
        accept: "application/json",
        "x-forwarded-for": "10.0.0.1",
        "x-request-id": "req-1",
      },
      body: Buffer.from("abc"),
      remoteAddress: "10.0.0.2",
      protocol: "https",
    });

    const { request } = forwarder.calls[0];
    expect(request.method).toBe("POST");
    expect(request.path).toBe("/items?x=1");
    expect(request.body?.toString()).toBe("abc");
    expect(request.headers).toEqual({
      accept: "application/json",
      "x-forwarded-for": "10.0.0.1, 10.0.0.2",
      "x-request-id": "req-1",
      "x-forwarded-host": "gw.local",
      "x-forwarded-proto": "https",
      "x-forwarded-prefix": "/catalog",
    });
  });

  it("should emit every state transition", async () => {
    query.instances.set("catalog", [instance(8081), instance(8082)]);
    forwarder.behaviour = (target) =>
      target.instanceId === "host1:8081" ? new DownstreamConnectError(target.instanceId) : ok("B");
    const transitions: RouterTransition[] = [];
    router.on("transition", (t: RouterTransition) => transitions.push(t));

    await router.route(get("/catalog/items", { "x-request-id": "req-7" }));

    expect(transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      "MATCH->RESOLVE",
      "RESOLVE->SELECT",
      "SELECT->FORWARD",
      "FORWARD->RETRY",
      "RETRY->SELECT",
      "SELECT->FORWARD",
      "FORWARD->RESPOND",
    ]);
    expect(transitions.every((t) => t.requestId === "req-7")).toBe(true);
  });

  it("should count outcomes in its health report", async () => {
    query.instances.set("catalog", [instance(8081)]);
    await router.route(get("/catalog/items"));
    await router.route(get("/nowhere"));

    expect(router.getHealth()).toEqual({
      name: "Router",
      status: "healthy",
      message: "1 routes",
      details: { routes: 1, RESPOND: 1, NOT_FOUND: 1, UNAVAILABLE: 0, FAILED: 0, CANCELLED: 0 },
    });
  });

  it("should report degraded without routes", () => {
    const empty = new Router(new RouteTable([]), query, forwarder);
    expect(empty.getHealth().status).toBe("degraded");
  });
});
