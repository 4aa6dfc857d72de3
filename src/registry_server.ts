// src/registry_server.ts

import { NotFoundError, ValidationError } from "./errors";
import { toInstanceView } from "./instance";
import { createLogger, Logger, toError } from "./logger";
import { QueryApi } from "./query_api";
import { RegistrationApi } from "./registration_api";
import { failure, RegistryRequest, registryRequestSchema } from "./registry_protocol";
import { Transport } from "./transport";

/**
 * Serves the registry protocol on a transport. Every request gets a reply
 * object; nothing is thrown back across the wire, so clients can tell a
 * stale renewal (NOT_FOUND) apart from a transport failure.
 */
export class RegistryServer {
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly registration: RegistrationApi,
    private readonly query: QueryApi,
  ) {
    this.log = createLogger("RegistryServer", transport.getNodeId());
  }

  /**
   * Installs the request handler on the transport.
   */
  listen(): void {
    this.transport.onRequest((message) => this.handle(message));
    this.log.info("Serving registry protocol");
  }

  async handle(message: unknown): Promise<unknown> {
    const parsed = registryRequestSchema.safeParse(message);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join(".") || "message"}: ${issue.message}` : "malformed";
      this.log.warn("Rejected malformed registry request", { detail });
      return failure("INVALID_REQUEST", detail);
    }

    try {
      return await this.dispatch(parsed.data);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return failure("NOT_FOUND", err.message);
      }
      if (err instanceof ValidationError) {
        return failure("INVALID_REQUEST", err.message);
      }
      const error = toError(err);
      this.log.error("Registry request failed", error, { type: parsed.data.type });
      return failure("INTERNAL", error.message);
    }
  }

  private async dispatch(request: RegistryRequest): Promise<unknown> {
    switch (request.type) {
      case "registry:register":
        return {
          ok: true,
          instance: this.registration.register({
            serviceName: request.serviceName,
            instanceId: request.instanceId,
            address: request.address,
            metadata: request.metadata,
          }),
        };
      case "registry:renew":
        return {
          ok: true,
          instance: this.registration.renew(request.serviceName, request.instanceId),
        };
      case "registry:deregister":
        return {
          ok: true,
          removed: this.registration.deregister(request.serviceName, request.instanceId),
        };
      case "registry:resolve": {
        const instances = await this.query.resolve(request.serviceName);
        return { ok: true, instances: instances.map(toInstanceView) };
      }
      case "registry:services":
        return { ok: true, services: await this.query.services() };
    }
  }
}
