// src/in_memory_transport.ts

import { PeerNotFoundError, TimeoutError, TransportError } from "./errors";
import { RequestHandler, Transport } from "./transport";

/**
 * An in-memory Transport for tests and single-process deployments.
 * Peers are wired by hand with setPeer(); requests are delivered by
 * calling the peer's handler directly. Payloads are round-tripped through
 * JSON so both sides see the same shapes they would over a socket.
 */
export class InMemoryTransport implements Transport {
  private readonly nodeId: string;
  private requestHandler?: RequestHandler;
  private readonly peers = new Map<string, InMemoryTransport>();
  private connected = false;

  constructor(nodeId: string) {
    this.nodeId = nodeId;
  }

  getNodeId(): string {
    return this.nodeId;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.peers.clear();
  }

  updatePeers(_peers: Array<[nodeId: string, address: string]>): void {
    // Addresses mean nothing in memory; peers are wired via setPeer().
  }

  /**
   * Wires another InMemoryTransport as a peer, in both directions.
   */
  setPeer(nodeId: string, transport: InMemoryTransport): void {
    this.peers.set(nodeId, transport);
    transport.peers.set(this.nodeId, this);
  }

  async request(nodeId: string, message: unknown, timeout: number): Promise<unknown> {
    if (!this.connected) {
      throw new TransportError("Transport not connected", this.nodeId);
    }

    const target = nodeId === this.nodeId ? this : this.peers.get(nodeId);
    if (!target) {
      throw new PeerNotFoundError(nodeId);
    }

    const handler = target.requestHandler;
    if (!target.connected || !handler) {
      throw new TransportError(`No request handler on node ${nodeId}`, nodeId);
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(`request to ${nodeId}`, timeout)), timeout);
    });

    try {
      const reply = await Promise.race([handler(roundTrip(message)), timedOut]);
      return roundTrip(reply);
    } finally {
      clearTimeout(timer);
    }
  }

  onRequest(handler: RequestHandler): void {
    this.requestHandler = handler;
  }
}

function roundTrip(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}
