import { describe, it, expect } from "vitest";
import { ShellConfigSchema } from "./config-schema.js";
import { validateInput } from "./validation.js";

describe("ShellConfigSchema", () => {
  it("applies defaults to an empty object", () => {
    expect(ShellConfigSchema.parse({})).toEqual({ timeoutMs: 0, logLevel: "warn", greeting: true });
  });

  it("keeps a configured socket path", () => {
    const config = ShellConfigSchema.parse({ socketPath: "/tmp/peer.sock", timeoutMs: 500 });
    expect(config.socketPath).toBe("/tmp/peer.sock");
    expect(config.timeoutMs).toBe(500);
  });

  it("rejects unknown keys", () => {
    const result = validateInput(ShellConfigSchema, { socket: "/tmp/peer.sock" });
    expect(result).toEqual({ success: false, error: "Unrecognized key(s) in object: 'socket'" });
  });

  it("rejects a negative timeout with the field path", () => {
    const result = validateInput(ShellConfigSchema, { timeoutMs: -1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatch(/^timeoutMs: /);
    }
  });

  it("rejects an unknown log level", () => {
    expect(ShellConfigSchema.safeParse({ logLevel: "trace" }).success).toBe(false);
  });

  it("rejects an empty socket path", () => {
    const result = validateInput(ShellConfigSchema, { socketPath: "" });
    expect(result).toEqual({ success: false, error: "socketPath: socketPath must not be empty" });
  });
});
