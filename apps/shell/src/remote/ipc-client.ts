/**
 * IPC Client - socket client for the collection peer.
 *
 * Protocol: Line-delimited JSON (newline-separated messages).
 */

import { connect } from "node:net";
import type { Socket } from "node:net";
import { ErrorCode, RpcError, TransportError } from "@cairn/sdk";
import { createLogger } from "@cairn/shared";
import { RPCEventSchema, RPCResponseSchema } from "./types.js";
import type { CallOptions, IPCClient, IPCClientOptions, RPCEvent, RPCRequest, RPCResponse } from "./types.js";

const logger = createLogger("IPCClient");

const TRANSPORT = "ipc";

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class IPCClientImpl implements IPCClient {
  private socket: Socket | null = null;
  private readonly socketPath: string;
  private readonly timeoutMs: number;
  private buffer = "";
  private pendingRequests = new Map<string | number, PendingRequest>();
  private eventHandlers = new Map<string, Array<(data: unknown) => void>>();
  private nextRequestId = 1;

  constructor(options: IPCClientOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  get connected(): boolean {
    return this.socket !== null;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = connect(this.socketPath);
      // Decode across chunk boundaries so split multibyte characters survive
      socket.setEncoding("utf8");
      let established = false;

      socket.on("connect", () => {
        established = true;
        this.socket = socket;
        logger.debug("Connected", { socketPath: this.socketPath });
        resolve();
      });

      socket.on("error", (error) => {
        if (!established) {
          reject(new TransportError(TRANSPORT, `cannot connect to ${this.socketPath}: ${error.message}`, { cause: error }));
          return;
        }
        logger.warn("Socket error", { error: error.message });
      });

      socket.on("data", (chunk: string) => {
        this.handleData(chunk);
      });

      socket.on("close", () => {
        if (this.socket !== socket) return;
        this.socket = null;
        this.cleanup("connection closed by peer");
        // Synthetic event for connection-lost detection
        this.handleEvent({ event: "_close", data: null });
      });
    });
  }

  call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new TransportError(TRANSPORT, "client not connected", { code: ErrorCode.TRANSPORT_CLOSED }));
    }

    const id = this.nextRequestId++;
    const request: RPCRequest = { id, method, params };
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              this.pendingRequests.delete(id);
              reject(new TransportError(TRANSPORT, `RPC timeout after ${timeoutMs}ms`, { code: ErrorCode.TRANSPORT_TIMEOUT }));
            }, timeoutMs)
          : null;

      this.pendingRequests.set(id, { resolve, reject, timer });

      socket.write(JSON.stringify(request) + "\n", (error) => {
        if (!error) return;
        const pending = this.pendingRequests.get(id);
        if (!pending) return;
        this.settle(id, pending);
        pending.reject(new TransportError(TRANSPORT, `write failed: ${error.message}`, { cause: error }));
      });
    });
  }

  close(): void {
    const socket = this.socket;
    this.socket = null;
    this.cleanup("client closed");
    if (socket) {
      socket.destroy();
    }
  }

  on(event: string, handler: (data: unknown) => void): void {
    const handlers = this.eventHandlers.get(event);
    if (handlers) {
      handlers.push(handler);
    } else {
      this.eventHandlers.set(event, [handler]);
    }
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;

    // Process complete messages (newline-delimited)
    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
      const line = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);

      if (line.trim() !== "") {
        this.handleMessage(line);
      }
    }
  }

  private handleMessage(line: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      logger.warn("Failed to parse message", { error: toError(error).message });
      return;
    }

    const event = RPCEventSchema.safeParse(parsed);
    if (event.success) {
      this.handleEvent(event.data);
      return;
    }

    const response = RPCResponseSchema.safeParse(parsed);
    if (!response.success) {
      logger.warn("Ignoring message that is neither a response nor an event");
      return;
    }
    this.handleResponse(response.data);
  }

  private handleResponse(response: RPCResponse): void {
    const pending = this.pendingRequests.get(response.id);
    if (!pending) {
      logger.warn(`Received response for unknown request ID: ${response.id}`);
      return;
    }

    this.settle(response.id, pending);

    if (response.error) {
      pending.reject(new RpcError(response.error.code, response.error.message));
    } else {
      pending.resolve(response.result);
    }
  }

  private handleEvent(event: RPCEvent): void {
    const handlers = this.eventHandlers.get(event.event);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(event.data);
      } catch (error) {
        logger.error("Event handler error", { event: event.event, error: toError(error).message });
      }
    }
  }

  private settle(id: string | number, pending: PendingRequest): void {
    if (pending.timer) clearTimeout(pending.timer);
    this.pendingRequests.delete(id);
  }

  private cleanup(reason: string): void {
    // Reject all pending requests
    for (const pending of this.pendingRequests.values()) {
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(new TransportError(TRANSPORT, reason, { code: ErrorCode.TRANSPORT_CLOSED }));
    }
    this.pendingRequests.clear();
    this.buffer = "";
  }
}
