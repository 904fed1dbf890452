/**
 * IPC Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { mkdtempSync, rmSync } from "node:fs";
import { ErrorCode, RpcError, TransportError } from "@cairn/sdk";
import { IPCClientImpl } from "../../src/remote/ipc-client.js";
import { PeerError, PeerServer, SILENT, tempSocketPath } from "../helpers/peer-server.js";
import type { PeerHandler } from "../helpers/peer-server.js";

describe("IPCClient", () => {
  let testDir: string;
  let socketPath: string;
  let server: PeerServer | undefined;
  let client: IPCClientImpl | undefined;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "ipc-client-test-"));
    socketPath = tempSocketPath(testDir);
  });

  afterEach(async () => {
    client?.close();
    client = undefined;
    await server?.stop();
    server = undefined;
    rmSync(testDir, { recursive: true, force: true });
  });

  async function connect(handler: PeerHandler, timeoutMs?: number): Promise<IPCClientImpl> {
    server = new PeerServer(socketPath, handler);
    await server.start();
    client = new IPCClientImpl({ socketPath, timeoutMs });
    await client.connect();
    return client;
  }

  it("sends request and receives response", async () => {
    const c = await connect(async (req) => (req.method === "test.ping" ? { pong: true } : {}));

    expect(c.connected).toBe(true);
    expect(await c.call("test.ping")).toEqual({ pong: true });
    expect(server?.requests).toEqual([{ id: 1, method: "test.ping" }]);
  });

  it("matches concurrent responses by id", async () => {
    const c = await connect(async (req) => {
      const delay = req.method === "slow" ? 30 : 0;
      await new Promise((resolve) => setTimeout(resolve, delay));
      return req.method;
    });

    const [slow, fast] = await Promise.all([c.call("slow"), c.call("fast")]);

    expect(slow).toBe("slow");
    expect(fast).toBe("fast");
  });

  it("rejects with RpcError when the peer answers with an error", async () => {
    const c = await connect(async () => {
      throw new PeerError(-32000, "No element with id 9");
    });

    const call = c.call("command.execute");
    await expect(call).rejects.toBeInstanceOf(RpcError);
    await expect(call).rejects.toMatchObject({ rpcCode: -32000, message: "No element with id 9" });
  });

  it("rejects on timeout", async () => {
    const c = await connect(async () => SILENT, 50);

    await expect(c.call("never")).rejects.toMatchObject({
      code: ErrorCode.TRANSPORT_TIMEOUT,
      message: 'Transport "ipc" error: RPC timeout after 50ms',
    });
  });

  it("a per-call timeout overrides the client's", async () => {
    const c = await connect(async () => SILENT);

    await expect(c.call("never", undefined, { timeoutMs: 20 })).rejects.toMatchObject({
      code: ErrorCode.TRANSPORT_TIMEOUT,
    });
  });

  it("rejects connect when nothing is listening", async () => {
    client = new IPCClientImpl({ socketPath });

    const connecting = client.connect();
    await expect(connecting).rejects.toBeInstanceOf(TransportError);
    await expect(connecting).rejects.toThrow(`cannot connect to ${socketPath}`);
    expect(client.connected).toBe(false);
  });

  it("rejects pending calls when the peer disconnects", async () => {
    const c = await connect(async () => SILENT);

    const pending = c.call("command.execute");
    await vi.waitFor(() => expect(server?.requests).toHaveLength(1));
    server?.disconnectAll();

    await expect(pending).rejects.toMatchObject({ code: ErrorCode.TRANSPORT_CLOSED });
  });

  it("emits _close when the peer disconnects", async () => {
    const c = await connect(async () => "pong");
    const onClose = vi.fn();
    c.on("_close", onClose);
    await c.call("ping");

    server?.disconnectAll();

    await vi.waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
    expect(c.connected).toBe(false);
    await expect(c.call("ping")).rejects.toMatchObject({ code: ErrorCode.TRANSPORT_CLOSED });
  });

  it("forwards events pushed by the peer", async () => {
    const c = await connect(async () => "pong");
    const onNotice = vi.fn();
    c.on("notice", onNotice);
    await c.call("ping");

    server?.push(JSON.stringify({ event: "notice", data: { text: "collection saved" } }));

    await vi.waitFor(() => expect(onNotice).toHaveBeenCalledWith({ text: "collection saved" }));
  });

  it("skips malformed lines and keeps the connection", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const c = await connect(async () => "pong");
    await c.call("ping");

    server?.push("not json");
    server?.push(JSON.stringify({ unrelated: true }));

    expect(await c.call("ping")).toBe("pong");
    errorSpy.mockRestore();
  });

  it("keeps a multibyte character split across two chunks intact", async () => {
    const c = await connect(async () => SILENT);
    const pending = c.call("command.execute");
    await vi.waitFor(() => expect(server?.requests).toHaveLength(1));

    const prefix = '{"id":1,"result":{"text":"';
    const reply = Buffer.from(`${prefix}Иван"}}\n`, "utf8");
    const cut = Buffer.byteLength(prefix, "utf8") + 1;
    server?.pushBytes(reply.subarray(0, cut));
    await new Promise((resolve) => setTimeout(resolve, 20));
    server?.pushBytes(reply.subarray(cut));

    expect(await pending).toEqual({ text: "Иван" });
  });

  it("close() rejects pending calls and disconnects", async () => {
    const c = await connect(async () => SILENT);
    const pending = c.call("command.execute");

    c.close();

    await expect(pending).rejects.toMatchObject({ code: ErrorCode.TRANSPORT_CLOSED });
    expect(c.connected).toBe(false);
  });
});
