// test/helpers.ts

import { Server } from "http";
import express from "express";

export interface Backend {
  name: string;
  port: number;
  hits: string[];
  close(): Promise<void>;
}

export interface BackendOptions {
  /** Delay before answering (ms) */
  delayMs?: number;
  status?: number;
}

async function listen(app: express.Express): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", () => resolve(server));
    server.once("error", reject);
  });
}

function portOf(server: Server): number {
  const address = server.address();
  if (typeof address !== "object" || address === null) {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

/**
 * A loopback HTTP backend that answers every request with a JSON
 * description of what it received.
 */
export async function startBackend(name: string, options: BackendOptions = {}): Promise<Backend> {
  const hits: string[] = [];
  const app = express();
  app.use(express.text({ type: () => true }));
  app.all("*", (req, res) => {
    hits.push(`${req.method} ${req.originalUrl}`);
    const reply = () => {
      res
        .status(options.status ?? 200)
        .set("x-backend", name)
        .json({
          backend: name,
          method: req.method,
          url: req.originalUrl,
          headers: req.headers,
          body: typeof req.body === "string" ? req.body : "",
        });
    };
    if (options.delayMs) {
      setTimeout(reply, options.delayMs);
    } else {
      reply();
    }
  });

  const server = await listen(app);
  return { name, port: portOf(server), hits, close: () => closeServer(server) };
}

/**
 * A port nothing is listening on.
 */
export async function closedPort(): Promise<number> {
  const server = await listen(express());
  const port = portOf(server);
  await closeServer(server);
  return port;
}

/**
 * A backend that sends its headers at once, then the body one byte per
 * interval.
 */
export async function startDrippingBackend(
  name: string,
  bytes: number,
  intervalMs: number,
): Promise<Backend> {
  const hits: string[] = [];
  const app = express();
  app.all("*", (req, res) => {
    hits.push(`${req.method} ${req.originalUrl}`);
    res.writeHead(200, { "content-type": "text/plain", "x-backend": name });
    let sent = 0;
    const drip = setInterval(() => {
      res.write("x");
      sent++;
      if (sent >= bytes) {
        clearInterval(drip);
        res.end();
      }
    }, intervalMs);
    res.on("close", () => clearInterval(drip));
  });

  const server = await listen(app);
  return { name, port: portOf(server), hits, close: () => closeServer(server) };
}
