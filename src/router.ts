// src/router.ts

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import {
  DownstreamError,
  EmptyTargetSetError,
  RequestCancelledError,
  RouteNotMatchedError,
} from "./errors";
import {
  appendHeader,
  DownstreamResponse,
  Forwarder,
  GatewayRequest,
  Headers,
  stripHopByHopHeaders,
} from "./forwarder";
import { ComponentHealth, HealthCheckable } from "./health";
import { InstanceView } from "./instance";
import { LoadBalancer, RoundRobinLoadBalancer } from "./load_balancer";
import { createLogger, Logger, toError } from "./logger";
import { ServiceQuery } from "./query_api";
import { Route, RouteMatch, RouteTable } from "./route";

export interface RouterConfig {
  /** Extra attempts after a failed forward, each on a different instance. Default: 1 */
  retryBudget: number;
  /** Bound on a single downstream call (ms). Default: 10000 */
  forwardTimeoutMs: number;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  retryBudget: 1,
  forwardTimeoutMs: 10000,
};

export type RouterState =
  | "MATCH"
  | "RESOLVE"
  | "SELECT"
  | "FORWARD"
  | "RETRY"
  | "RESPOND"
  | "NOT_FOUND"
  | "UNAVAILABLE"
  | "FAILED"
  | "CANCELLED";

export interface RespondOutcome {
  state: "RESPOND";
  route: Route;
  instance: InstanceView;
  response: DownstreamResponse;
  attempts: number;
}

export interface NotFoundOutcome {
  state: "NOT_FOUND";
  error: RouteNotMatchedError;
  attempts: 0;
}

export interface UnavailableOutcome {
  state: "UNAVAILABLE";
  route: Route;
  error: EmptyTargetSetError;
  attempts: 0;
}

export interface FailedOutcome {
  state: "FAILED";
  route: Route;
  /** The error of the last attempt */
  error: Error;
  attempts: number;
  failedInstances: string[];
}

export interface CancelledOutcome {
  state: "CANCELLED";
  route: Route;
  error: RequestCancelledError;
  attempts: number;
}

export type RouteOutcome =
  | RespondOutcome
  | NotFoundOutcome
  | UnavailableOutcome
  | FailedOutcome
  | CancelledOutcome;

export interface RouterTransition {
  requestId: string;
  from: RouterState;
  to: RouterState;
  instanceId?: string;
}

/**
 * Gateway request lifecycle: MATCH a route, RESOLVE its service, SELECT
 * an instance, FORWARD to it and RESPOND with whatever came back. A
 * connect failure or timeout in FORWARD goes through RETRY back to SELECT
 * with the failed instance excluded, until the retry budget runs out.
 *
 * Events:
 * - 'transition' (RouterTransition) on every state change
 */
export class Router extends EventEmitter implements HealthCheckable {
  private readonly routes: RouteTable;
  private readonly query: ServiceQuery;
  private readonly forwarder: Forwarder;
  private readonly balancer: LoadBalancer;
  private readonly config: RouterConfig;
  private readonly log: Logger;
  private readonly counts: Record<RouteOutcome["state"], number> = {
    RESPOND: 0,
    NOT_FOUND: 0,
    UNAVAILABLE: 0,
    FAILED: 0,
    CANCELLED: 0,
  };

  constructor(
    routes: RouteTable,
    query: ServiceQuery,
    forwarder: Forwarder,
    options: { balancer?: LoadBalancer; config?: Partial<RouterConfig>; nodeId?: string } = {},
  ) {
    super();
    this.routes = routes;
    this.query = query;
    this.forwarder = forwarder;
    this.balancer = options.balancer ?? new RoundRobinLoadBalancer();
    this.config = { ...DEFAULT_ROUTER_CONFIG, ...options.config };
    this.log = createLogger("Router", options.nodeId);
  }

  async route(request: GatewayRequest, signal?: AbortSignal): Promise<RouteOutcome> {
    const requestId = headerString(request.headers["x-request-id"]) ?? uuidv4();
    const log = this.log.child({ requestId });
    const outcome = await this.run(request, requestId, log, signal);
    this.counts[outcome.state]++;
    return outcome;
  }

  getHealth(): ComponentHealth {
    return {
      name: "Router",
      status: this.routes.size > 0 ? "healthy" : "degraded",
      message: this.routes.size > 0 ? `${this.routes.size} routes` : "No routes configured",
      details: { routes: this.routes.size, ...this.counts },
    };
  }

  private async run(
    request: GatewayRequest,
    requestId: string,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<RouteOutcome> {
    const transition = (from: RouterState, to: RouterState, instanceId?: string) => {
      this.emit("transition", { requestId, from, to, instanceId });
    };

    // MATCH
    const match = this.routes.match(request.url);
    if (!match) {
      transition("MATCH", "NOT_FOUND");
      log.debug("No route matched", { path: request.url });
      return { state: "NOT_FOUND", error: new RouteNotMatchedError(request.url), attempts: 0 };
    }
    const { route } = match;
    transition("MATCH", "RESOLVE");

    // RESOLVE
    let candidates: InstanceView[];
    try {
      candidates = (await this.query.resolve(route.targetServiceName)).filter(
        (instance) => instance.status === "UP",
      );
    } catch (err) {
      log.warn("Service lookup failed", {
        serviceName: route.targetServiceName,
        error: toError(err).message,
      });
      candidates = [];
    }
    if (candidates.length === 0) {
      transition("RESOLVE", "UNAVAILABLE");
      log.info("No healthy instance", { serviceName: route.targetServiceName });
      return {
        state: "UNAVAILABLE",
        route,
        error: new EmptyTargetSetError(route.targetServiceName),
        attempts: 0,
      };
    }
    transition("RESOLVE", "SELECT");

    const downstream = {
      method: request.method,
      path: match.forwardPath,
      headers: this.downstreamHeaders(request, match, requestId),
      body: request.body,
    };

    const failed: string[] = [];
    let attempts = 0;
    let lastError: Error = new EmptyTargetSetError(route.targetServiceName);

    for (;;) {
      // SELECT
      const remaining = candidates.filter((c) => !failed.includes(c.instanceId));
      if (remaining.length === 0) {
        transition("SELECT", "FAILED");
        break;
      }
      const instance = this.balancer.select(route.targetServiceName, remaining);
      transition("SELECT", "FORWARD", instance.instanceId);

      // FORWARD
      attempts++;
      try {
        const response = await this.forwarder.forward(instance, downstream, {
          timeoutMs: this.config.forwardTimeoutMs,
          signal,
        });
        transition("FORWARD", "RESPOND", instance.instanceId);
        log.debug("Forwarded", {
          routeId: route.routeId,
          instanceId: instance.instanceId,
          status: response.status,
          attempts,
        });
        return { state: "RESPOND", route, instance, response, attempts };
      } catch (err) {
        if (err instanceof RequestCancelledError) {
          transition("FORWARD", "CANCELLED", instance.instanceId);
          log.debug("Caller went away, downstream call cancelled", {
            instanceId: instance.instanceId,
          });
          return { state: "CANCELLED", route, error: err, attempts };
        }

        lastError = toError(err);
        failed.push(instance.instanceId);

        if (!(err instanceof DownstreamError)) {
          log.error("Forwarding failed unexpectedly", lastError, {
            instanceId: instance.instanceId,
          });
          transition("FORWARD", "FAILED", instance.instanceId);
          break;
        }

        log.warn("Forward attempt failed", {
          instanceId: instance.instanceId,
          code: err.code,
          attempts,
        });

        // RETRY
        if (attempts > this.config.retryBudget) {
          transition("FORWARD", "FAILED", instance.instanceId);
          break;
        }
        transition("FORWARD", "RETRY", instance.instanceId);
        transition("RETRY", "SELECT");
      }
    }

    log.warn("Giving up on request", {
      routeId: route.routeId,
      attempts,
      error: lastError.message,
    });
    return { state: "FAILED", route, error: lastError, attempts, failedInstances: failed };
  }

  private downstreamHeaders(request: GatewayRequest, match: RouteMatch, requestId: string): Headers {
    const headers = stripHopByHopHeaders(request.headers, ["host", "content-length"]);
    const host = headerString(request.headers.host);

    headers["x-request-id"] = requestId;
    if (request.remoteAddress) {
      headers["x-forwarded-for"] = appendHeader(headers["x-forwarded-for"], request.remoteAddress);
    }
    if (host) {
      headers["x-forwarded-host"] = host;
    }
    headers["x-forwarded-proto"] = request.protocol ?? "http";
    if (match.strippedPrefix) {
      headers["x-forwarded-prefix"] = match.strippedPrefix;
    }
    return headers;
  }
}

function headerString(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
