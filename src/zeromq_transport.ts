// src/zeromq_transport.ts

import * as zmq from "zeromq";
import { v4 as uuidv4 } from "uuid";
import { PeerNotFoundError, TimeoutError, TransportError } from "./errors";
import { Logger, createLogger, toError } from "./logger";
import { RequestHandler, Transport } from "./transport";

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Frame exchanged on the ROUTER/DEALER pair. A reply carries either a
 * payload or the message of the error the remote handler threw.
 */
interface RpcEnvelope {
  correlationId: string;
  payload?: unknown;
  error?: string;
}

export interface ZeroMQTransportConfig {
  nodeId: string;
  /** Port for the ROUTER socket serving incoming requests */
  rpcPort: number;
  /** Default: 0.0.0.0 */
  bindAddress?: string;
}

function parseEnvelope(raw: string): RpcEnvelope | null {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== "object" || data === null || !("correlationId" in data)) {
    return null;
  }
  const { correlationId } = data;
  if (typeof correlationId !== "string") {
    return null;
  }
  const error = "error" in data && typeof data.error === "string" ? data.error : undefined;
  const payload = "payload" in data ? data.payload : undefined;
  return { correlationId, payload, error };
}

/**
 * Transport over ZeroMQ: a ROUTER socket answers requests, one DEALER
 * socket per peer sends them. Peer addresses look like tcp://host:port.
 */
export class ZeroMQTransport implements Transport {
  private readonly nodeId: string;
  private readonly rpcAddress: string;
  private readonly log: Logger;

  private rpcSocket?: zmq.Router;
  private readonly dealerSockets = new Map<string, zmq.Dealer>();
  private readonly pendingRequests = new Map<string, PendingRequest>();
  private readonly peerAddresses = new Map<string, string>();

  private requestHandler?: RequestHandler;

  constructor(config: ZeroMQTransportConfig) {
    this.nodeId = config.nodeId;
    this.rpcAddress = `tcp://${config.bindAddress ?? "0.0.0.0"}:${config.rpcPort}`;
    this.log = createLogger("ZeroMQTransport", this.nodeId);
  }

  getNodeId(): string {
    return this.nodeId;
  }

  async connect(): Promise<void> {
    this.rpcSocket = new zmq.Router();
    await this.rpcSocket.bind(this.rpcAddress);
    this.log.info("RPC socket bound", { address: this.rpcAddress });

    this.runRpcLoop(this.rpcSocket).catch((err) => {
      this.log.error("RPC loop stopped", toError(err));
    });
  }

  async disconnect(): Promise<void> {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timer);
      pending.reject(new TransportError("Transport disconnected", this.nodeId));
    }
    this.pendingRequests.clear();

    this.rpcSocket?.close();
    this.rpcSocket = undefined;

    for (const dealer of this.dealerSockets.values()) {
      dealer.close();
    }
    this.dealerSockets.clear();
  }

  updatePeers(peers: Array<[nodeId: string, address: string]>): void {
    const next = new Map(peers.filter(([id]) => id !== this.nodeId));

    for (const [peerId, address] of this.peerAddresses) {
      if (next.get(peerId) !== address) {
        this.dealerSockets.get(peerId)?.close();
        this.dealerSockets.delete(peerId);
        this.peerAddresses.delete(peerId);
      }
    }

    for (const [peerId, address] of next) {
      if (!/^tcp:\/\/[^:]+:\d+$/.test(address)) {
        this.log.warn("Ignoring peer with malformed address", { peerId, address });
        continue;
      }
      this.peerAddresses.set(peerId, address);
    }
  }

  async request(nodeId: string, message: unknown, timeout: number): Promise<unknown> {
    const dealer = this.dealerFor(nodeId);
    const correlationId = uuidv4();
    const envelope: RpcEnvelope = { correlationId, payload: message };

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRequests.delete(correlationId);
        this.log.warn("Request timed out", { peerId: nodeId, timeout });
        reject(new TimeoutError(`request to ${nodeId}`, timeout));
      }, timeout);

      this.pendingRequests.set(correlationId, { resolve, reject, timer });

      dealer.send(JSON.stringify(envelope)).catch((err) => {
        clearTimeout(timer);
        this.pendingRequests.delete(correlationId);
        const error = toError(err);
        this.log.error("Failed to send request", error, { peerId: nodeId });
        reject(new TransportError(`Failed to send request to ${nodeId}`, nodeId, error));
      });
    });
  }

  onRequest(handler: RequestHandler): void {
    this.requestHandler = handler;
  }

  private dealerFor(nodeId: string): zmq.Dealer {
    const existing = this.dealerSockets.get(nodeId);
    if (existing) {
      return existing;
    }

    const address = this.peerAddresses.get(nodeId);
    if (!address) {
      throw new PeerNotFoundError(nodeId);
    }

    const dealer = new zmq.Dealer();
    try {
      dealer.connect(address);
    } catch (err) {
      const error = toError(err);
      this.log.error("Failed to connect dealer socket", error, { peerId: nodeId });
      throw new TransportError(`Failed to connect to node ${nodeId}`, nodeId, error);
    }
    this.dealerSockets.set(nodeId, dealer);

    this.handleDealerResponses(nodeId, dealer).catch((err) => {
      this.log.error("Dealer loop stopped", toError(err), { peerId: nodeId });
    });
    return dealer;
  }

  private async runRpcLoop(socket: zmq.Router): Promise<void> {
    for await (const [identity, messageBuffer] of socket) {
      let envelope: RpcEnvelope | null;
      try {
        envelope = parseEnvelope(messageBuffer.toString());
      } catch (err) {
        this.log.warn("Dropping unparseable RPC frame", {
          error: toError(err).message,
        });
        continue;
      }
      if (!envelope) {
        this.log.warn("Dropping RPC frame without correlation id");
        continue;
      }

      const reply: RpcEnvelope = { correlationId: envelope.correlationId };
      if (!this.requestHandler) {
        reply.error = `No request handler on node ${this.nodeId}`;
      } else {
        try {
          reply.payload = await this.requestHandler(envelope.payload);
        } catch (err) {
          reply.error = toError(err).message;
        }
      }

      try {
        await socket.send([identity, JSON.stringify(reply)]);
      } catch (err) {
        this.log.error("Failed to send RPC reply", toError(err));
      }
    }
  }

  private async handleDealerResponses(nodeId: string, dealer: zmq.Dealer): Promise<void> {
    for await (const [messageBuffer] of dealer) {
      let envelope: RpcEnvelope | null;
      try {
        envelope = parseEnvelope(messageBuffer.toString());
      } catch (err) {
        this.log.warn("Dropping unparseable reply", {
          peerId: nodeId,
          error: toError(err).message,
        });
        continue;
      }

      const pending = envelope ? this.pendingRequests.get(envelope.correlationId) : undefined;
      if (!envelope || !pending) {
        continue;
      }

      clearTimeout(pending.timer);
      this.pendingRequests.delete(envelope.correlationId);
      if (envelope.error !== undefined) {
        pending.reject(new TransportError(envelope.error, nodeId));
      } else {
        pending.resolve(envelope.payload);
      }
    }
  }
}
