// src/transport.ts

/**
 * The handler for an incoming request that expects a reply. Payloads are
 * plain JSON values; receivers validate them before use.
 */
export type RequestHandler = (message: unknown) => Promise<unknown>;

/**
 * Request/reply messaging between nodes, addressed by node ID. The
 * transport internally maps node IDs to physical addresses.
 *
 * The registry protocol is carried over this: the registry node installs a
 * request handler, backend instances and gateways send requests to it.
 */
export interface Transport {
  getNodeId(): string;

  /**
   * Sends a request to a node and waits for its reply.
   * @param timeout milliseconds to wait before rejecting with TimeoutError
   */
  request(nodeId: string, message: unknown, timeout: number): Promise<unknown>;

  /**
   * Installs the handler for all incoming requests. A handler that throws
   * makes the sender's request reject.
   */
  onRequest(handler: RequestHandler): void;

  /**
   * Replaces the known peer list.
   * @param peers Array of [nodeId, physicalAddress] tuples.
   */
  updatePeers(peers: Array<[nodeId: string, address: string]>): void;

  connect(): Promise<void>;

  disconnect(): Promise<void>;
}
