/**
 * Remote Call Boundary - the single path to the remote peer.
 */

import type { ConnectionFailure, Result } from "./result.js";

/** Serialized form of a remote-forwarded command. */
export interface RemoteRequest {
  /** Normalized command name */
  command: string;

  /** Validated arguments, JSON-serializable */
  args: Record<string, unknown>;
}

export interface RemoteCallBoundary {
  /** Establish the connection. */
  start(): Promise<Result<void, ConnectionFailure>>;

  /**
   * Forward a command and return the peer's textual result.
   * `scripted` only changes how chatty the peer's own messages are.
   */
  send(request: RemoteRequest, scripted: boolean): Promise<Result<string, ConnectionFailure>>;

  /** Flush pending peer-side cleanup and disconnect. */
  close(): Promise<void>;
}
