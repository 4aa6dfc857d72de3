// src/errors.ts

/**
 * Base error class for all switchyard errors.
 */
export class SwitchyardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "SwitchyardError";
  }
}

/**
 * Thrown when a renewal targets an instance the registry does not hold.
 * The caller is expected to register again from scratch.
 */
export class NotFoundError extends SwitchyardError {
  constructor(serviceName: string, instanceId: string) {
    super(
      `Instance not registered: ${instanceId} of service ${serviceName}`,
      "NOT_FOUND",
      { serviceName, instanceId },
    );
    this.name = "NotFoundError";
  }
}

/**
 * Thrown by a load balancer asked to pick from zero instances.
 */
export class EmptyTargetSetError extends SwitchyardError {
  constructor(serviceName: string) {
    super(
      `No healthy instance available for service: ${serviceName}`,
      "EMPTY_TARGET_SET",
      { serviceName },
    );
    this.name = "EmptyTargetSetError";
  }
}

export class RouteNotMatchedError extends SwitchyardError {
  constructor(path: string) {
    super(`No route matches path: ${path}`, "ROUTE_NOT_MATCHED", { path });
    this.name = "RouteNotMatchedError";
  }
}

/**
 * Base for failures while talking to a backend instance. These are the
 * errors the router retries on.
 */
export abstract class DownstreamError extends SwitchyardError {
  readonly originalCause?: Error;

  protected constructor(
    message: string,
    code: string,
    instanceId: string,
    cause?: Error,
    context: Record<string, unknown> = {},
  ) {
    super(message, code, { instanceId, cause: cause?.message, ...context });
    this.originalCause = cause;
  }
}

export class DownstreamTimeoutError extends DownstreamError {
  constructor(instanceId: string, timeoutMs: number, cause?: Error) {
    super(
      `Downstream ${instanceId} did not respond within ${timeoutMs}ms`,
      "DOWNSTREAM_TIMEOUT",
      instanceId,
      cause,
      { timeoutMs },
    );
    this.name = "DownstreamTimeoutError";
  }
}

export class DownstreamConnectError extends DownstreamError {
  constructor(instanceId: string, cause?: Error) {
    super(
      `Could not reach downstream ${instanceId}${cause ? `: ${cause.message}` : ""}`,
      "DOWNSTREAM_CONNECT",
      instanceId,
      cause,
    );
    this.name = "DownstreamConnectError";
  }
}

/**
 * Thrown when the original caller went away before the downstream replied.
 */
export class RequestCancelledError extends SwitchyardError {
  constructor(instanceId?: string) {
    super(
      `Request cancelled by caller${instanceId ? ` while forwarding to ${instanceId}` : ""}`,
      "REQUEST_CANCELLED",
      { instanceId },
    );
    this.name = "RequestCancelledError";
  }
}

export class ValidationError extends SwitchyardError {
  constructor(message: string, field?: string) {
    super(message, "VALIDATION_FAILED", { field });
    this.name = "ValidationError";
  }
}

export class ConfigError extends SwitchyardError {
  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`, "CONFIG_INVALID", {
      key,
      reason,
    });
    this.name = "ConfigError";
  }
}

/**
 * Thrown by registry clients when the registry answers with something
 * that is not a valid reply.
 */
export class RegistryProtocolError extends SwitchyardError {
  constructor(message: string, replyCode?: string) {
    super(message, "REGISTRY_PROTOCOL", { replyCode });
    this.name = "RegistryProtocolError";
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends SwitchyardError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, "TIMEOUT", {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
  }
}

/**
 * Error thrown when a transport operation fails.
 */
export class TransportError extends SwitchyardError {
  readonly originalCause?: Error;

  constructor(message: string, nodeId?: string, cause?: Error) {
    super(message, "TRANSPORT_ERROR", { nodeId, cause: cause?.message });
    this.name = "TransportError";
    this.originalCause = cause;
  }
}

export class PeerNotFoundError extends SwitchyardError {
  constructor(nodeId: string) {
    super(
      `No address found for node ${nodeId}. Call updatePeers() first.`,
      "PEER_NOT_FOUND",
      { nodeId },
    );
    this.name = "PeerNotFoundError";
  }
}
