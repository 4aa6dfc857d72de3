// test/http_forwarder.test.ts

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
  DownstreamConnectError,
  DownstreamTimeoutError,
  HttpForwarder,
  InstanceView,
  RequestCancelledError,
} from "../src";
import { Backend, closedPort, startBackend, startDrippingBackend } from "./helpers";

function at(port: number): InstanceView {
  return { instanceId: `127.0.0.1:${port}`, address: { host: "127.0.0.1", port }, status: "UP" };
}

describe("HttpForwarder", () => {
  const forwarder = new HttpForwarder();
  let backend: Backend;
  let slow: Backend;
  let failing: Backend;
  let dripping: Backend;

  beforeAll(async () => {
    backend = await startBackend("a");
    slow = await startBackend("slow", { delayMs: 500 });
    failing = await startBackend("failing", { status: 503 });
    dripping = await startDrippingBackend("dripping", 10, 100);
  });

  afterAll(async () => {
    await backend.close();
    await slow.close();
    await failing.close();
    await dripping.close();
  });

  it("should forward method, path, headers and body", async () => {
    const response = await forwarder.forward(
      at(backend.port),
      {
        method: "POST",
        path: "/items?page=2",
        headers: { "content-type": "text/plain", "x-request-id": "req-1" },
        body: Buffer.from("hello"),
      },
      { timeoutMs: 2000 },
    );

    expect(response.status).toBe(200);
    expect(response.headers["x-backend"]).toBe("a");
    const echoed = JSON.parse(response.body.toString());
    expect(echoed).toMatchObject({
      method: "POST",
      url: "/items?page=2",
      body: "hello",
      headers: { "x-request-id": "req-1" },
    });
  });

  it("should resolve with an error status rather than throw", async () => {
    const response = await forwarder.forward(
      at(failing.port),
      { method: "GET", path: "/", headers: {} },
      { timeoutMs: 2000 },
    );
    expect(response.status).toBe(503);
  });

  it("should report an unreachable instance as DownstreamConnectError", async () => {
    const port = await closedPort();
    await expect(
      forwarder.forward(at(port), { method: "GET", path: "/", headers: {} }, { timeoutMs: 2000 }),
    ).rejects.toBeInstanceOf(DownstreamConnectError);
  });

  it("should report a slow instance as DownstreamTimeoutError", async () => {
    await expect(
      forwarder.forward(at(slow.port), { method: "GET", path: "/", headers: {} }, { timeoutMs: 50 }),
    ).rejects.toBeInstanceOf(DownstreamTimeoutError);
  });

  it("should time out an instance that keeps the body trickling", async () => {
    const started = Date.now();
    await expect(
      forwarder.forward(at(dripping.port), { method: "GET", path: "/", headers: {} }, { timeoutMs: 300 }),
    ).rejects.toBeInstanceOf(DownstreamTimeoutError);
    expect(Date.now() - started).toBeLessThan(900);
  });

  it("should cancel when the signal fires mid-request", async () => {
    const controller = new AbortController();
    const pending = forwarder.forward(
      at(slow.port),
      { method: "GET", path: "/", headers: {} },
      { timeoutMs: 2000, signal: controller.signal },
    );
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
  });

  it("should not send anything when the signal already fired", async () => {
    const controller = new AbortController();
    controller.abort();
    const before = backend.hits.length;

    await expect(
      forwarder.forward(
        at(backend.port),
        { method: "GET", path: "/", headers: {} },
        { timeoutMs: 2000, signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(backend.hits.length).toBe(before);
  });
});
