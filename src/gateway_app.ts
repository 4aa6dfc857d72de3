// src/gateway_app.ts

import express, { Express, NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { SwitchyardError } from "./errors";
import { GatewayRequest, Headers, stripHopByHopHeaders } from "./forwarder";
import { HealthAggregator } from "./health";
import { createLogger, toError } from "./logger";
import { RouteOutcome, Router } from "./router";

export interface GatewayAppConfig {
  /** Default: "/health" */
  healthCheckPath: string;
  /** Largest request body buffered for forwarding. Default: "10mb" */
  bodyLimit: string;
}

export const DEFAULT_GATEWAY_APP_CONFIG: GatewayAppConfig = {
  healthCheckPath: "/health",
  bodyLimit: "10mb",
};

const OUTCOME_STATUS: Record<Exclude<RouteOutcome["state"], "RESPOND" | "CANCELLED">, number> = {
  NOT_FOUND: 404,
  UNAVAILABLE: 503,
  FAILED: 502,
};

function toGatewayRequest(req: Request, requestId: string): GatewayRequest {
  const headers: Headers = { ...req.headers, "x-request-id": requestId };
  return {
    method: req.method,
    url: req.originalUrl,
    headers,
    body: Buffer.isBuffer(req.body) ? req.body : undefined,
    remoteAddress: req.socket.remoteAddress,
    protocol: req.protocol,
  };
}

function errorBody(outcome: Exclude<RouteOutcome, { state: "RESPOND" }>): { error: string; message: string } {
  const { error } = outcome;
  return {
    error: error instanceof SwitchyardError ? error.code : "GATEWAY_ERROR",
    message: error.message,
  };
}

/**
 * Builds the express application that receives gateway traffic. Every
 * request other than the health check goes through the router; the
 * outcome decides the status code.
 */
export function createGatewayApp(
  router: Router,
  health: HealthAggregator,
  config: Partial<GatewayAppConfig> = {},
): Express {
  const { healthCheckPath, bodyLimit } = { ...DEFAULT_GATEWAY_APP_CONFIG, ...config };
  const log = createLogger("GatewayApp");
  const app = express();

  app.disable("x-powered-by");
  app.disable("etag");

  app.get(healthCheckPath, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await health.getHealth();
      res.status(report.status === "unhealthy" ? 503 : 200).json(report);
    } catch (err) {
      next(err);
    }
  });

  app.use(express.raw({ type: () => true, limit: bodyLimit }));

  app.use(async (req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get("x-request-id") ?? uuidv4();
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const outcome = await router.route(toGatewayRequest(req, requestId), controller.signal);
      res.setHeader("x-request-id", requestId);

      switch (outcome.state) {
        case "RESPOND": {
          const { response } = outcome;
          const headers = stripHopByHopHeaders(response.headers);
          for (const [name, value] of Object.entries(headers)) {
            if (value !== undefined) {
              res.setHeader(name, value);
            }
          }
          res.status(response.status).end(response.body);
          return;
        }
        case "CANCELLED":
          // Nobody is listening any more.
          res.destroy();
          return;
        default:
          res.status(OUTCOME_STATUS[outcome.state]).json(errorBody(outcome));
      }
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toError(err);
    log.error("Gateway request failed", error, { path: req.originalUrl });
    if (res.headersSent) {
      res.destroy();
      return;
    }
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    res.status(status).json({ error: "GATEWAY_ERROR", message: error.message });
  });

  return app;
}
