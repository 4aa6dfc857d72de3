// test/heartbeat.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  DEFAULT_HEARTBEAT_CONFIG,
  HeartbeatMonitor,
  ManualClock,
  RegistryStore,
  resolveHeartbeatConfig,
  SweepResult,
} from "../src";

describe("resolveHeartbeatConfig", () => {
  it("should default to a 30s interval and a 90s eviction threshold", () => {
    expect(resolveHeartbeatConfig()).toEqual(DEFAULT_HEARTBEAT_CONFIG);
    expect(DEFAULT_HEARTBEAT_CONFIG).toEqual({
      enabled: true,
      intervalMs: 30000,
      evictionThresholdMs: 90000,
    });
  });

  it("should derive the eviction threshold from a custom interval", () => {
    expect(resolveHeartbeatConfig({ intervalMs: 1000 }).evictionThresholdMs).toBe(3000);
  });

  it("should keep an explicit eviction threshold", () => {
    expect(
      resolveHeartbeatConfig({ intervalMs: 1000, evictionThresholdMs: 10000 }).evictionThresholdMs,
    ).toBe(10000);
  });
});

describe("HeartbeatMonitor", () => {
  let clock: ManualClock;
  let store: RegistryStore;
  let monitor: HeartbeatMonitor;

  /** Moves the registry clock and the timers together. */
  const elapse = (ms: number) => {
    clock.advance(ms);
    vi.advanceTimersByTime(ms);
  };

  beforeEach(() => {
    vi.useFakeTimers();
    clock = new ManualClock(0);
    store = new RegistryStore({ downAfterMs: 30000 }, clock);
    monitor = new HeartbeatMonitor(store, { intervalMs: 30000 }, clock);
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  it("should not sweep before the first interval elapses", () => {
    const sweep = vi.fn();
    monitor.on("sweep", sweep);
    monitor.start();

    elapse(29999);
    expect(sweep).not.toHaveBeenCalled();
    elapse(1);
    expect(sweep).toHaveBeenCalledTimes(1);
  });

  it("should flag a silent instance DOWN after one interval and evict it after the threshold", () => {
    store.register("catalog", "host1:8081", { host: "host1", port: 8081 });
    monitor.start();

    elapse(30000);
    expect(store.listHealthy("catalog")).toHaveLength(1);

    elapse(1);
    expect(store.listHealthy("catalog")).toEqual([]);
    expect(store.size()).toBe(1);

    elapse(29999);
    expect(store.get("catalog", "host1:8081")?.status).toBe("DOWN");

    elapse(30000);
    expect(store.size()).toBe(1);

    elapse(30000);
    expect(store.size()).toBe(0);
  });

  it("should keep an instance that renews every interval", () => {
    store.register("catalog", "host1:8081", { host: "host1", port: 8081 });
    monitor.start();

    for (let i = 0; i < 5; i++) {
      elapse(29000);
      store.renew("catalog", "host1:8081");
      elapse(1000);
    }
    expect(store.listHealthy("catalog")).toHaveLength(1);
  });

  it("should report the number evicted by a sweep", () => {
    const results: SweepResult[] = [];
    monitor.on("sweep", (result: SweepResult) => results.push(result));
    store.register("catalog", "host1:8081", { host: "host1", port: 8081 });
    store.register("catalog", "host1:8082", { host: "host1", port: 8082 });
    monitor.start();

    for (let i = 0; i < 4; i++) {
      elapse(30000);
    }
    expect(results.map((r) => r.evicted)).toEqual([0, 0, 0, 2]);
    expect(monitor.getHealth().details).toMatchObject({ totalEvicted: 2 });
  });

  it("should survive a failing sweep and try again on the next tick", () => {
    const failures: Error[] = [];
    monitor.on("sweep_failed", (err: Error) => failures.push(err));
    const sweep = vi
      .spyOn(store, "sweepExpired")
      .mockImplementationOnce(() => {
        throw new Error("boom");
      });
    monitor.start();

    elapse(30000);
    expect(failures.map((e) => e.message)).toEqual(["boom"]);
    expect(monitor.getHealth()).toMatchObject({
      status: "degraded",
      message: "Last sweep failed: boom",
    });

    elapse(30000);
    expect(sweep).toHaveBeenCalledTimes(2);
    expect(monitor.getHealth().status).toBe("healthy");
  });

  it("should not let a throwing sweep_failed listener escape", () => {
    monitor.on("sweep_failed", () => {
      throw new Error("listener");
    });
    vi.spyOn(store, "sweepExpired").mockImplementation(() => {
      throw new Error("boom");
    });

    expect(monitor.tick()).toBeNull();
  });

  it("should do nothing when disabled", () => {
    const disabled = new HeartbeatMonitor(store, { enabled: false }, clock);
    disabled.start();
    expect(disabled.isRunning()).toBe(false);
  });

  it("should start and stop", () => {
    monitor.start();
    expect(monitor.isRunning()).toBe(true);
    monitor.start();
    expect(vi.getTimerCount()).toBe(1);

    monitor.stop();
    expect(monitor.isRunning()).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should expose its configuration", () => {
    const custom = new HeartbeatMonitor(store, { intervalMs: 5000 }, clock);
    expect(custom.intervalMs).toBe(5000);
    expect(custom.evictionThresholdMs).toBe(15000);
  });
});
