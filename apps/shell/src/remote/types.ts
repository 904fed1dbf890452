/**
 * Wire types for the collection peer.
 *
 * Protocol: line-delimited JSON-RPC over a Unix domain socket
 * (a named pipe on Windows). One request or response per line.
 */

import { z } from "zod";

export interface RPCRequest {
  /** Request ID (for matching response) */
  id: string | number;

  method: string;
  params?: unknown;
}

export const RPCErrorSchema = z.object({
  /** Negative integers, JSON-RPC 2.0 convention */
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const RPCResponseSchema = z.object({
  id: z.union([z.string(), z.number()]),
  result: z.unknown().optional(),
  error: RPCErrorSchema.optional(),
});

/** Unsolicited notification pushed by the peer. */
export const RPCEventSchema = z.object({
  event: z.string(),
  data: z.unknown(),
});

export type RPCResponse = z.infer<typeof RPCResponseSchema>;
export type RPCEvent = z.infer<typeof RPCEventSchema>;

export const RPCErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/** Methods the shell calls on the peer. */
export const RPCMethod = {
  EXECUTE: "command.execute",
  CLOSE_SESSION: "session.close",
} as const;

/** Result of `command.execute`. */
export const ExecuteResultSchema = z.object({
  text: z.string(),
});

export interface CallOptions {
  /** Overrides the client timeout for this call; 0 waits forever */
  timeoutMs?: number;
}

export interface IPCClientOptions {
  socketPath: string;

  /** Per-call timeout in ms; 0 (default) waits forever */
  timeoutMs?: number;
}

export interface IPCClient {
  connect(): Promise<void>;
  call(method: string, params?: unknown, options?: CallOptions): Promise<unknown>;
  /** Destroy the socket and reject every pending call. */
  close(): void;
  /** Peer events, plus the synthetic "_close" when the socket goes away. */
  on(event: string, handler: (data: unknown) => void): void;
  readonly connected: boolean;
}
