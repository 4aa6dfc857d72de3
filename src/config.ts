// src/config.ts

import { readFile } from "fs/promises";
import { z } from "zod";
import { DEFAULT_HEARTBEAT_CONFIG, HeartbeatConfig } from "./heartbeat";
import { LoadBalancerStrategy } from "./load_balancer";
import { ConfigError } from "./errors";
import { createLogger, toError } from "./logger";
import { RouteDefinition, RouteTable } from "./route";
import { DEFAULT_ROUTER_CONFIG, RouterConfig } from "./router";

/**
 * External key-value provider consulted once at startup.
 */
export interface ConfigSource {
  readonly name: string;
  /**
   * @returns the raw value, or undefined when the key is not set
   */
  get(key: string): Promise<string | undefined>;
}

export class MapConfigSource implements ConfigSource {
  readonly name = "map";
  private readonly values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }
}

/**
 * Reads `gateway.retryBudget` from `GATEWAY_RETRYBUDGET` (with the prefix
 * prepended when one is given, e.g. `SWITCHYARD_GATEWAY_RETRYBUDGET`).
 */
export class EnvConfigSource implements ConfigSource {
  readonly name = "env";

  constructor(
    private readonly prefix = "",
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  static keyToVariable(key: string, prefix = ""): string {
    const variable = key.replace(/[.\-]/g, "_").toUpperCase();
    return prefix ? `${prefix.toUpperCase()}_${variable}` : variable;
  }

  async get(key: string): Promise<string | undefined> {
    return this.env[EnvConfigSource.keyToVariable(key, this.prefix)];
  }
}

/**
 * A JSON file of nested objects; `gateway.routes` looks up
 * `{ "gateway": { "routes": ... } }`. Non-string values are handed out as
 * JSON text. The file is read on first lookup.
 */
export class JsonFileConfigSource implements ConfigSource {
  readonly name: string;
  private loaded?: Promise<unknown>;

  constructor(private readonly path: string) {
    this.name = `file:${path}`;
  }

  async get(key: string): Promise<string | undefined> {
    this.loaded ??= readFile(this.path, "utf8").then((text): unknown => JSON.parse(text));
    let node: unknown = await this.loaded;

    for (const part of key.split(".")) {
      if (typeof node !== "object" || node === null || !(part in node)) {
        return undefined;
      }
      node = Object.getOwnPropertyDescriptor(node, part)?.value;
    }

    if (node === undefined || node === null) {
      return undefined;
    }
    return typeof node === "string" ? node : JSON.stringify(node);
  }
}

export const CONFIG_KEYS = {
  heartbeatIntervalMs: "registry.heartbeatIntervalMs",
  downAfterMs: "registry.downAfterMs",
  evictionThresholdMs: "registry.evictionThresholdMs",
  retryBudget: "gateway.retryBudget",
  forwardTimeoutMs: "gateway.forwardTimeoutMs",
  loadBalancer: "gateway.loadBalancer",
  routes: "gateway.routes",
} as const;

const positiveInt = z.coerce.number().int().positive();

const routeDefinitionSchema = z.object({
  routeId: z.string().min(1),
  pathPredicate: z.string().min(1),
  targetServiceName: z.string().min(1),
  stripPrefix: z.boolean().optional(),
});

const routesSchema = z
  .string()
  .transform((text, ctx): unknown => {
    try {
      return JSON.parse(text);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not valid JSON (${toError(err).message})` });
      return z.NEVER;
    }
  })
  .pipe(
    z.array(routeDefinitionSchema).superRefine((routes, ctx) => {
      try {
        new RouteTable(routes);
      } catch (err) {
        if (!(err instanceof ConfigError)) {
          throw err;
        }
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
      }
    }),
  );

export interface Settings {
  heartbeat: HeartbeatConfig;
  downAfterMs: number;
  router: RouterConfig;
  loadBalancer: LoadBalancerStrategy;
  routes: RouteDefinition[];
}

export const DEFAULT_SETTINGS: Settings = {
  heartbeat: DEFAULT_HEARTBEAT_CONFIG,
  downAfterMs: DEFAULT_HEARTBEAT_CONFIG.intervalMs,
  router: DEFAULT_ROUTER_CONFIG,
  loadBalancer: "round-robin",
  routes: [],
};

/**
 * Loads startup settings. Any key that cannot be read or does not parse
 * falls back to its default with a warning, so an unreachable source never
 * stops the process from starting.
 *
 * DOWN and eviction thresholds that are not set follow the heartbeat
 * interval (1x and 3x).
 */
export async function loadSettings(source: ConfigSource): Promise<Settings> {
  const log = createLogger("Config").child({ source: source.name });

  async function read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, string>): Promise<T | undefined> {
    let raw: string | undefined;
    try {
      raw = await source.get(key);
    } catch (err) {
      log.warn("Config source unavailable, using default", { key, error: toError(err).message });
      return undefined;
    }
    if (raw === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
      log.warn("Ignoring invalid config value", { key, error: reason });
      return undefined;
    }
    return parsed.data;
  }

  const intervalMs =
    (await read(CONFIG_KEYS.heartbeatIntervalMs, z.string().pipe(positiveInt))) ??
    DEFAULT_SETTINGS.heartbeat.intervalMs;
  const downAfterMs = (await read(CONFIG_KEYS.downAfterMs, z.string().pipe(positiveInt))) ?? intervalMs;
  const evictionThresholdMs =
    (await read(CONFIG_KEYS.evictionThresholdMs, z.string().pipe(positiveInt))) ?? 3 * intervalMs;
  const retryBudget =
    (await read(CONFIG_KEYS.retryBudget, z.string().pipe(z.coerce.number().int().min(0)))) ??
    DEFAULT_SETTINGS.router.retryBudget;
  const forwardTimeoutMs =
    (await read(CONFIG_KEYS.forwardTimeoutMs, z.string().pipe(positiveInt))) ??
    DEFAULT_SETTINGS.router.forwardTimeoutMs;
  const loadBalancer =
    (await read(CONFIG_KEYS.loadBalancer, z.enum(["round-robin", "random"]))) ??
    DEFAULT_SETTINGS.loadBalancer;
  const routes = (await read(CONFIG_KEYS.routes, routesSchema)) ?? DEFAULT_SETTINGS.routes;

  if (routes.length === 0) {
    log.warn("No routes configured; every gateway request will be answered 404");
  }

  return {
    heartbeat: { enabled: true, intervalMs, evictionThresholdMs },
    downAfterMs,
    router: { retryBudget, forwardTimeoutMs },
    loadBalancer,
    routes,
  };
}
