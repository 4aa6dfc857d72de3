// src/route.ts

import { ConfigError } from "./errors";
import { normalizeServiceName } from "./instance";

/**
 * A route as it appears in configuration.
 */
export interface RouteDefinition {
  routeId: string;
  /**
   * Path prefix, compared segment by segment. A `*` segment matches any
   * single segment, and a trailing `/**` is accepted for readability, so
   * `/catalog` and `/catalog/**` are the same predicate.
   */
  pathPredicate: string;
  targetServiceName: string;
  /** Remove the matched prefix before forwarding. Default: true */
  stripPrefix?: boolean;
}

export interface Route {
  readonly routeId: string;
  readonly pathPredicate: string;
  readonly targetServiceName: string;
  readonly stripPrefix: boolean;
}

export interface RouteMatch {
  route: Route;
  /** Path plus query string to send downstream */
  forwardPath: string;
  /** The part of the path removed by stripPrefix, if any */
  strippedPrefix?: string;
}

interface CompiledRoute {
  route: Route;
  pattern: RegExp;
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function compilePredicate(routeId: string, predicate: string): RegExp {
  if (!predicate.startsWith("/")) {
    throw new ConfigError(`routes.${routeId}.pathPredicate`, `must start with "/" (got "${predicate}")`);
  }

  const withoutTail = predicate.endsWith("/**") ? predicate.slice(0, -3) : predicate;
  const segments = withoutTail.split("/").filter((segment) => segment.length > 0);

  const head = segments
    .map((segment) => {
      if (segment === "**") {
        throw new ConfigError(`routes.${routeId}.pathPredicate`, `"**" is only allowed as the last segment`);
      }
      if (segment === "*") {
        return "/[^/]+";
      }
      if (segment.includes("*")) {
        throw new ConfigError(`routes.${routeId}.pathPredicate`, `"*" must stand for a whole segment (got "${segment}")`);
      }
      return `/${escapeRegExp(segment)}`;
    })
    .join("");

  // Group 1 is the matched prefix, group 2 what lies below it.
  return new RegExp(`^(${head})(/.*)?$`);
}

/**
 * The immutable route table. Routes are tried in declaration order and
 * the first match wins.
 */
export class RouteTable {
  private readonly compiled: readonly CompiledRoute[];

  constructor(definitions: readonly RouteDefinition[]) {
    const seen = new Set<string>();
    this.compiled = definitions.map((definition) => {
      const routeId = definition.routeId.trim();
      if (routeId.length === 0) {
        throw new ConfigError("routes", "routeId must not be empty");
      }
      if (seen.has(routeId)) {
        throw new ConfigError("routes", `duplicate routeId "${routeId}"`);
      }
      seen.add(routeId);

      const targetServiceName = normalizeServiceName(definition.targetServiceName);
      if (targetServiceName.length === 0) {
        throw new ConfigError(`routes.${routeId}.targetServiceName`, "must not be empty");
      }

      const route: Route = Object.freeze({
        routeId,
        pathPredicate: definition.pathPredicate,
        targetServiceName,
        stripPrefix: definition.stripPrefix ?? true,
      });
      return { route, pattern: compilePredicate(routeId, definition.pathPredicate) };
    });
  }

  get routes(): Route[] {
    return this.compiled.map((c) => c.route);
  }

  get size(): number {
    return this.compiled.length;
  }

  /**
   * @param url request path, optionally followed by a query string
   */
  match(url: string): RouteMatch | null {
    const queryStart = url.indexOf("?");
    const rawPath = queryStart === -1 ? url : url.slice(0, queryStart);
    const query = queryStart === -1 ? "" : url.slice(queryStart);
    const path = rawPath.length === 0 ? "/" : rawPath;

    for (const { route, pattern } of this.compiled) {
      const match = pattern.exec(path);
      if (!match) {
        continue;
      }

      const prefix = match[1] ?? "";
      if (!route.stripPrefix || prefix.length === 0) {
        return { route, forwardPath: path + query };
      }
      const rest = match[2] ?? "";
      return {
        route,
        forwardPath: (rest.length === 0 ? "/" : rest) + query,
        strippedPrefix: prefix,
      };
    }
    return null;
  }
}
