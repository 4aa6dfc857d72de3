// src/heartbeat.ts

import { EventEmitter } from "events";
import { Clock, systemClock } from "./clock";
import { ComponentHealth, HealthCheckable } from "./health";
import { createLogger, Logger, toError } from "./logger";
import { RegistryStore } from "./registry_store";

/**
 * Configuration for the eviction sweep.
 */
export interface HeartbeatConfig {
  /** Enable/disable the sweep. Default: true */
  enabled: boolean;

  /** How often the sweep runs, and the renewal cadence instances are told to keep (ms). Default: 30000 */
  intervalMs: number;

  /** Age of the last renewal after which an instance is removed (ms). Default: 3 x intervalMs */
  evictionThresholdMs: number;
}

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30000;

/**
 * Default heartbeat configuration.
 */
export const DEFAULT_HEARTBEAT_CONFIG: HeartbeatConfig = {
  enabled: true,
  intervalMs: DEFAULT_HEARTBEAT_INTERVAL_MS,
  evictionThresholdMs: 3 * DEFAULT_HEARTBEAT_INTERVAL_MS,
};

/**
 * Fills in defaults. An eviction threshold left unset follows the interval
 * rather than the default interval.
 */
export function resolveHeartbeatConfig(config: Partial<HeartbeatConfig> = {}): HeartbeatConfig {
  const intervalMs = config.intervalMs ?? DEFAULT_HEARTBEAT_CONFIG.intervalMs;
  return {
    enabled: config.enabled ?? DEFAULT_HEARTBEAT_CONFIG.enabled,
    intervalMs,
    evictionThresholdMs: config.evictionThresholdMs ?? 3 * intervalMs,
  };
}

export interface SweepResult {
  evicted: number;
  durationMs: number;
}

/**
 * HeartbeatMonitor periodically expires instances that stopped renewing.
 *
 * The store flags an instance DOWN once it misses one renewal interval and
 * the monitor removes it entirely once it exceeds the eviction threshold.
 * A failing sweep is logged and the next tick tries again.
 *
 * Events:
 * - 'sweep': (SweepResult) after every successful sweep
 * - 'sweep_failed': (Error) when a sweep throws
 *
 * @example
 * ```typescript
 * const monitor = new HeartbeatMonitor(store, { intervalMs: 10000 });
 * monitor.on('sweep', ({ evicted }) => console.log(`evicted ${evicted}`));
 * monitor.start();
 * ```
 */
export class HeartbeatMonitor extends EventEmitter implements HealthCheckable {
  private readonly store: RegistryStore;
  private readonly config: HeartbeatConfig;
  private readonly clock: Clock;
  private readonly log: Logger;

  private sweepTimer?: NodeJS.Timeout;
  private _isRunning = false;
  private lastSweepAt?: number;
  private lastError?: Error;
  private consecutiveFailures = 0;
  private totalEvicted = 0;

  constructor(
    store: RegistryStore,
    config: Partial<HeartbeatConfig> = {},
    clock: Clock = systemClock,
    nodeId?: string,
  ) {
    super();
    this.store = store;
    this.config = resolveHeartbeatConfig(config);
    this.clock = clock;
    this.log = createLogger("HeartbeatMonitor", nodeId);

    if (this.config.evictionThresholdMs < store.downAfterMs) {
      this.log.warn("Eviction threshold is shorter than the DOWN threshold; instances will be removed before being flagged", {
        evictionThresholdMs: this.config.evictionThresholdMs,
        downAfterMs: store.downAfterMs,
      });
    }
  }

  isRunning(): boolean {
    return this._isRunning;
  }

  get intervalMs(): number {
    return this.config.intervalMs;
  }

  get evictionThresholdMs(): number {
    return this.config.evictionThresholdMs;
  }

  start(): void {
    if (!this.config.enabled) {
      this.log.info("Heartbeat sweep disabled by configuration");
      return;
    }

    if (this._isRunning) {
      this.log.warn("HeartbeatMonitor already running");
      return;
    }

    this._isRunning = true;
    this.log.info("Starting heartbeat monitor", {
      intervalMs: this.config.intervalMs,
      evictionThresholdMs: this.config.evictionThresholdMs,
    });

    this.sweepTimer = setInterval(() => {
      this.tick();
    }, this.config.intervalMs);
    // The sweep alone must not keep a process alive.
    this.sweepTimer.unref?.();
  }

  stop(): void {
    if (!this._isRunning) {
      return;
    }

    this.log.info("Stopping heartbeat monitor");
    this._isRunning = false;

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /**
   * Runs one sweep now. Never throws.
   * @returns the sweep result, or null when the sweep failed
   */
  tick(): SweepResult | null {
    const startedAt = this.clock.now();

    try {
      const evicted = this.store.sweepExpired(startedAt, this.config.evictionThresholdMs);
      const result: SweepResult = {
        evicted,
        durationMs: this.clock.now() - startedAt,
      };

      this.lastSweepAt = startedAt;
      this.consecutiveFailures = 0;
      this.lastError = undefined;
      this.totalEvicted += evicted;

      if (evicted > 0) {
        this.log.info("Sweep evicted expired instances", { evicted });
      } else {
        this.log.debug("Sweep found nothing to evict");
      }
      this.emit("sweep", result);
      return result;
    } catch (err) {
      const error = toError(err);
      this.lastError = error;
      this.consecutiveFailures++;
      this.log.error("Sweep failed, retrying on next tick", error, {
        consecutiveFailures: this.consecutiveFailures,
      });
      this.emitFailure(error);
      return null;
    }
  }

  getHealth(): ComponentHealth {
    const details = {
      running: this._isRunning,
      lastSweepAt: this.lastSweepAt,
      totalEvicted: this.totalEvicted,
      consecutiveFailures: this.consecutiveFailures,
    };

    if (this.lastError) {
      return {
        name: "HeartbeatMonitor",
        status: "degraded",
        message: `Last sweep failed: ${this.lastError.message}`,
        details,
      };
    }

    return {
      name: "HeartbeatMonitor",
      status: "healthy",
      message: this._isRunning ? "Sweeping" : "Not running",
      details,
    };
  }

  private emitFailure(error: Error): void {
    // A throwing 'sweep_failed' listener must not escape the timer callback.
    try {
      this.emit("sweep_failed", error);
    } catch (listenerErr) {
      this.log.error("sweep_failed listener threw", toError(listenerErr));
    }
  }
}
