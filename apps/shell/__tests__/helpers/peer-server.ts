/**
 * In-process collection peer for IPC tests.
 *
 * Speaks the same line-delimited JSON-RPC as the real server. Handlers may
 * throw PeerError to answer with an RPC error, or return SILENT to never
 * answer at all.
 */

import { createServer } from "node:net";
import type { Server, Socket } from "node:net";
import { createHash } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import { isWindows } from "../../src/remote/platform.js";
import type { RPCRequest } from "../../src/remote/types.js";
import { RPCErrorCode } from "../../src/remote/types.js";

const RequestSchema = z.object({
  id: z.union([z.string(), z.number()]),
  method: z.string(),
  params: z.unknown().optional(),
});

export const SILENT = Symbol("silent");

export class PeerError extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
  }
}

export type PeerHandler = (request: RPCRequest) => Promise<unknown>;

export function tempSocketPath(dir: string): string {
  if (isWindows) {
    const hash = createHash("md5").update(dir).digest("hex").slice(0, 8);
    return `\\\\.\\pipe\\cairn-test-${hash}`;
  }
  return join(dir, "peer.sock");
}

export class PeerServer {
  readonly requests: RPCRequest[] = [];
  private server: Server | null = null;
  private readonly clients = new Set<Socket>();

  constructor(
    private readonly socketPath: string,
    private readonly handler: PeerHandler,
  ) {}

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.handleConnection(socket));
      server.on("error", reject);
      server.listen(this.socketPath, () => resolve());
      this.server = server;
    });
  }

  /** Write a raw line to every connected client. */
  push(line: string): void {
    for (const client of this.clients) {
      client.write(`${line}\n`);
    }
  }

  /** Write raw bytes to every connected client, unframed. */
  pushBytes(bytes: Buffer): void {
    for (const client of this.clients) {
      client.write(bytes);
    }
  }

  /** Drop every client connection but keep listening. */
  disconnectAll(): void {
    for (const client of this.clients) {
      client.destroy();
    }
    this.clients.clear();
  }

  methods(): string[] {
    return this.requests.map((r) => r.method);
  }

  async stop(): Promise<void> {
    this.disconnectAll();
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private handleConnection(socket: Socket): void {
    this.clients.add(socket);
    let buffer = "";
    socket.setEncoding("utf8");

    socket.on("data", (chunk: string) => {
      buffer += chunk;
      let newlineIndex: number;
      while ((newlineIndex = buffer.indexOf("\n")) !== -1) {
        const line = buffer.slice(0, newlineIndex);
        buffer = buffer.slice(newlineIndex + 1);
        void this.handleLine(socket, line);
      }
    });
    socket.on("error", () => {
      this.clients.delete(socket);
    });
    socket.on("close", () => {
      this.clients.delete(socket);
    });
  }

  private async handleLine(socket: Socket, line: string): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return;
    }
    const parsed = RequestSchema.safeParse(raw);
    if (!parsed.success) return;
    const request: RPCRequest = parsed.data;
    this.requests.push(request);

    let reply: string;
    try {
      const result = await this.handler(request);
      if (result === SILENT) return;
      reply = JSON.stringify({ id: request.id, result });
    } catch (error) {
      const code = error instanceof PeerError ? error.code : RPCErrorCode.INTERNAL_ERROR;
      const message = error instanceof Error ? error.message : String(error);
      reply = JSON.stringify({ id: request.id, error: { code, message } });
    }
    if (!socket.destroyed) {
      socket.write(`${reply}\n`);
    }
  }
}
