// src/http_forwarder.ts

import axios, { AxiosInstance, AxiosResponse } from "axios";
import {
  DownstreamConnectError,
  DownstreamTimeoutError,
  RequestCancelledError,
} from "./errors";
import {
  DownstreamRequest,
  DownstreamResponse,
  ForwardOptions,
  Forwarder,
  Headers,
} from "./forwarder";
import { instanceBaseUrl, InstanceView } from "./instance";
import { createLogger, Logger } from "./logger";

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ECONNABORTED"]);

function outgoingHeaders(headers: Headers): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[name] = value;
    }
  }
  return result;
}

function incomingHeaders(response: AxiosResponse): Headers {
  const result: Headers = {};
  for (const [name, value] of Object.entries(response.headers)) {
    if (typeof value === "string") {
      result[name.toLowerCase()] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      result[name.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      result[name.toLowerCase()] = value.map(String);
    }
  }
  return result;
}

/**
 * Forwards over HTTP with axios. Redirects are not followed and bodies
 * are neither decoded nor decompressed: the caller gets exactly what the
 * instance sent.
 */
export class HttpForwarder implements Forwarder {
  private readonly client: AxiosInstance;
  private readonly log: Logger;

  constructor(client?: AxiosInstance, nodeId?: string) {
    this.client =
      client ??
      axios.create({
        maxRedirects: 0,
        decompress: false,
        proxy: false,
        responseType: "arraybuffer",
        validateStatus: () => true,
        transitional: { clarifyTimeoutError: true },
      });
    this.log = createLogger("HttpForwarder", nodeId);
  }

  async forward(
    instance: InstanceView,
    request: DownstreamRequest,
    options: ForwardOptions,
  ): Promise<DownstreamResponse> {
    if (options.signal?.aborted) {
      throw new RequestCancelledError(instance.instanceId);
    }

    const url = instanceBaseUrl(instance.address) + request.path;

    // axios's own timeout only bounds socket idleness; this bounds the call.
    const deadline = new AbortController();
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      deadline.abort();
    }, options.timeoutMs);
    const onCallerAbort = () => deadline.abort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await this.client.request<ArrayBuffer>({
        method: request.method,
        url,
        headers: outgoingHeaders(request.headers),
        data: request.body && request.body.length > 0 ? request.body : undefined,
        timeout: options.timeoutMs,
        signal: deadline.signal,
        responseType: "arraybuffer",
      });

      return {
        status: response.status,
        headers: incomingHeaders(response),
        body: Buffer.from(response.data),
      };
    } catch (err) {
      throw this.classify(err, instance, options, expired);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private classify(
    err: unknown,
    instance: InstanceView,
    options: ForwardOptions,
    expired: boolean,
  ): Error {
    if (options.signal?.aborted) {
      return new RequestCancelledError(instance.instanceId);
    }
    if (expired) {
      return new DownstreamTimeoutError(
        instance.instanceId,
        options.timeoutMs,
        err instanceof Error ? err : undefined,
      );
    }
    if (axios.isCancel(err)) {
      return new RequestCancelledError(instance.instanceId);
    }

    if (axios.isAxiosError(err)) {
      if (err.code !== undefined && TIMEOUT_CODES.has(err.code)) {
        return new DownstreamTimeoutError(instance.instanceId, options.timeoutMs, err);
      }
      this.log.debug("Downstream request failed", {
        instanceId: instance.instanceId,
        code: err.code,
      });
      return new DownstreamConnectError(instance.instanceId, err);
    }

    return err instanceof Error ? err : new Error(String(err));
  }
}
