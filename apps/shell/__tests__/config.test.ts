import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { ConfigError, ErrorCode } from "@cairn/sdk";
import { getDefaultConfigPath, loadShellConfig } from "../src/config.js";
import { getDefaultSocketPath } from "../src/remote/platform.js";

describe("loadShellConfig", () => {
  let home: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "cairn-config-test-"));
    env = { CAIRN_HOME: home };
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  function writeConfig(content: unknown, name = "config.json"): string {
    const path = join(home, name);
    writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content));
    return path;
  }

  it("uses defaults when the default file is absent", async () => {
    const config = await loadShellConfig({ env });

    expect(config).toEqual({
      socketPath: getDefaultSocketPath(home),
      timeoutMs: 0,
      logLevel: "warn",
      greeting: true,
    });
  });

  it("reads the default file under CAIRN_HOME", async () => {
    writeConfig({ timeoutMs: 2000, greeting: false });

    const config = await loadShellConfig({ env });

    expect(getDefaultConfigPath(env)).toBe(join(home, "config.json"));
    expect(config.timeoutMs).toBe(2000);
    expect(config.greeting).toBe(false);
  });

  it("requires an explicit config file to exist", async () => {
    const loading = loadShellConfig({ env, configPath: join(home, "missing.json") });

    await expect(loading).rejects.toBeInstanceOf(ConfigError);
    await expect(loading).rejects.toMatchObject({ code: ErrorCode.CONFIG_NOT_FOUND });
  });

  it("rejects invalid JSON", async () => {
    const path = writeConfig("{ socketPath: ", "broken.json");

    await expect(loadShellConfig({ env, configPath: path })).rejects.toThrow(`Config file ${path} is not valid JSON`);
  });

  it("rejects a file that is not an object", async () => {
    const path = writeConfig([1, 2], "list.json");

    await expect(loadShellConfig({ env, configPath: path })).rejects.toThrow(
      `Config file ${path} must contain a JSON object`,
    );
  });

  it("rejects unknown keys", async () => {
    writeConfig({ socket: "/tmp/x.sock" });

    await expect(loadShellConfig({ env })).rejects.toThrow(
      "Invalid configuration: Unrecognized key(s) in object: 'socket'",
    );
  });

  it("lets the environment override the file", async () => {
    writeConfig({ socketPath: "/tmp/file.sock", timeoutMs: 100 });
    env.CAIRN_SOCKET = "/tmp/env.sock";
    env.CAIRN_TIMEOUT_MS = "250";

    const config = await loadShellConfig({ env });

    expect(config.socketPath).toBe("/tmp/env.sock");
    expect(config.timeoutMs).toBe(250);
  });

  it("lets flags override the environment", async () => {
    env.CAIRN_SOCKET = "/tmp/env.sock";
    env.CAIRN_TIMEOUT_MS = "250";

    const config = await loadShellConfig({
      env,
      overrides: { socketPath: "/tmp/flag.sock", timeoutMs: "75" },
    });

    expect(config.socketPath).toBe("/tmp/flag.sock");
    expect(config.timeoutMs).toBe(75);
  });

  it("rejects a non-numeric timeout", async () => {
    await expect(loadShellConfig({ env, overrides: { timeoutMs: "soon" } })).rejects.toThrow(
      "Invalid configuration: timeoutMs: Expected number, received string",
    );
  });
});
