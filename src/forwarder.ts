// src/forwarder.ts

import { InstanceView } from "./instance";

export type HeaderValue = string | string[];
export type Headers = Record<string, HeaderValue | undefined>;

/**
 * An inbound request as the router sees it, independent of the HTTP
 * framework that received it.
 */
export interface GatewayRequest {
  method: string;
  /** Path plus query string */
  url: string;
  headers: Headers;
  body?: Buffer;
  /** Address of the caller, for x-forwarded-for */
  remoteAddress?: string;
  /** Scheme the caller used. Default: "http" */
  protocol?: string;
}

/**
 * What goes to the selected backend instance.
 */
export interface DownstreamRequest {
  method: string;
  /** Path plus query string, already rewritten by the route */
  path: string;
  headers: Headers;
  body?: Buffer;
}

export interface DownstreamResponse {
  status: number;
  headers: Headers;
  body: Buffer;
}

export interface ForwardOptions {
  timeoutMs: number;
  /** Fires when the original caller went away */
  signal?: AbortSignal;
}

/**
 * Sends one request to one instance.
 *
 * Implementations report failures through the downstream error types:
 * DownstreamConnectError when the instance could not be reached,
 * DownstreamTimeoutError when it did not answer within timeoutMs, and
 * RequestCancelledError when the signal fired. Any HTTP response,
 * whatever its status, resolves.
 */
export interface Forwarder {
  forward(
    instance: InstanceView,
    request: DownstreamRequest,
    options: ForwardOptions,
  ): Promise<DownstreamResponse>;
}

/**
 * Headers that describe a single connection and must not cross a proxy.
 */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

/**
 * Copies headers without hop-by-hop ones, including any the Connection
 * header names. Names are lower-cased.
 */
export function stripHopByHopHeaders(headers: Headers, extra: readonly string[] = []): Headers {
  const drop = new Set([...HOP_BY_HOP_HEADERS, ...extra.map((h) => h.toLowerCase())]);

  const connection = headers.connection ?? headers.Connection;
  const listed = Array.isArray(connection) ? connection.join(",") : connection;
  if (listed) {
    for (const name of listed.split(",")) {
      const trimmed = name.trim().toLowerCase();
      if (trimmed) {
        drop.add(trimmed);
      }
    }
  }

  const result: Headers = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (value !== undefined && !drop.has(lower)) {
      result[lower] = value;
    }
  }
  return result;
}

/**
 * Appends a value to a possibly comma-separated header.
 */
export function appendHeader(existing: HeaderValue | undefined, value: string): string {
  if (existing === undefined) {
    return value;
  }
  const joined = Array.isArray(existing) ? existing.join(", ") : existing;
  return joined.length > 0 ? `${joined}, ${value}` : value;
}
