/**
 * IpcRemoteBoundary - RemoteCallBoundary over the IPC client.
 *
 * A peer that answers with an RPC error is still connected: the error text
 * becomes the command's output. Anything that breaks the socket (refused
 * connect, close, timeout) is a ConnectionFailure.
 */

import type { ConnectionFailure, RemoteCallBoundary, RemoteRequest, Result } from "@cairn/sdk";
import { RpcError, commandError, err, ok } from "@cairn/sdk";
import { createLogger } from "@cairn/shared";
import { IPCClientImpl } from "./ipc-client.js";
import { ExecuteResultSchema, RPCMethod } from "./types.js";
import type { IPCClient, IPCClientOptions } from "./types.js";

const logger = createLogger("IpcRemote");

/** Upper bound on the session.close call. */
export const CLOSE_TIMEOUT_MS = 1000;

export const MALFORMED_RESPONSE = "Error: malformed response";

export interface IpcRemoteOptions extends IPCClientOptions {
  /** Client factory. Default: IPCClientImpl */
  createClient?: (options: IPCClientOptions) => IPCClient;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class IpcRemoteBoundary implements RemoteCallBoundary {
  private client: IPCClient | null = null;

  constructor(private readonly options: IpcRemoteOptions) {}

  async start(): Promise<Result<void, ConnectionFailure>> {
    const factory = this.options.createClient ?? ((opts: IPCClientOptions) => new IPCClientImpl(opts));
    const client = factory({ socketPath: this.options.socketPath, timeoutMs: this.options.timeoutMs });
    try {
      await client.connect();
    } catch (error) {
      logger.debug("Connect failed", { socketPath: this.options.socketPath, error: describe(error) });
      return err(commandError("ConnectionFailure", describe(error)));
    }

    client.on("_close", () => {
      if (this.client === client) {
        logger.debug("Peer closed the connection");
        this.client = null;
      }
    });
    this.client = client;
    return ok(undefined);
  }

  async send(request: RemoteRequest, scripted: boolean): Promise<Result<string, ConnectionFailure>> {
    const client = this.client;
    if (!client || !client.connected) {
      this.client = null;
      return err(commandError("ConnectionFailure", "not connected"));
    }

    let result: unknown;
    try {
      result = await client.call(RPCMethod.EXECUTE, { request, scripted });
    } catch (error) {
      if (error instanceof RpcError) {
        return ok(`Error: ${error.message}`);
      }
      this.client = null;
      client.close();
      return err(commandError("ConnectionFailure", describe(error)));
    }

    const parsed = ExecuteResultSchema.safeParse(result);
    if (!parsed.success) {
      logger.warn("Malformed response", { command: request.command });
      return ok(MALFORMED_RESPONSE);
    }
    return ok(parsed.data.text);
  }

  async close(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    try {
      await client.call(RPCMethod.CLOSE_SESSION, undefined, { timeoutMs: CLOSE_TIMEOUT_MS });
    } catch (error) {
      logger.debug("session.close not acknowledged", { error: describe(error) });
    } finally {
      client.close();
    }
  }
}
