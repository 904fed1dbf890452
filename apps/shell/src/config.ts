/**
 * Shell configuration loading.
 *
 * Precedence (lowest first): schema defaults → config file → environment
 * (CAIRN_SOCKET, CAIRN_TIMEOUT_MS) → command-line flags.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError, ErrorCode } from "@cairn/sdk";
import type { ShellConfig } from "@cairn/shared";
import { ShellConfigSchema, createLogger, validateInput } from "@cairn/shared";
import { getDefaultSocketPath } from "./remote/platform.js";

const logger = createLogger("Config");

export function getCairnHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.CAIRN_HOME ?? join(homedir(), ".cairn");
}

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getCairnHome(env), "config.json");
}

export interface ConfigOverrides {
  socketPath?: string;
  /** Raw flag value; validated with the rest of the config */
  timeoutMs?: string;
}

export interface LoadConfigOptions {
  /** Explicit file (--config); must exist. Default file is optional */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

export interface ResolvedShellConfig extends ShellConfig {
  socketPath: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Numeric strings become numbers; anything else is left for the schema to reject. */
function numeric(raw: string): number | string {
  return /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : raw;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readConfigFile(path: string, required: boolean): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (!required && isNotFound(error)) {
      logger.debug("No config file", { path });
      return {};
    }
    const cause = error instanceof Error ? error : undefined;
    const code = isNotFound(error) ? ErrorCode.CONFIG_NOT_FOUND : ErrorCode.CONFIG_ERROR;
    throw new ConfigError(`Cannot read config file ${path}`, { cause, code });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

export async function loadShellConfig(options: LoadConfigOptions = {}): Promise<ResolvedShellConfig> {
  const env = options.env ?? process.env;
  const path = options.configPath ?? getDefaultConfigPath(env);
  const merged = await readConfigFile(path, options.configPath !== undefined);

  if (env.CAIRN_SOCKET) merged.socketPath = env.CAIRN_SOCKET;
  if (env.CAIRN_TIMEOUT_MS) merged.timeoutMs = numeric(env.CAIRN_TIMEOUT_MS);

  const overrides = options.overrides ?? {};
  if (overrides.socketPath !== undefined) merged.socketPath = overrides.socketPath;
  if (overrides.timeoutMs !== undefined) merged.timeoutMs = numeric(overrides.timeoutMs);

  const result = validateInput(ShellConfigSchema, merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }

  const config = result.data;
  return { ...config, socketPath: config.socketPath ?? getDefaultSocketPath(getCairnHome(env)) };
}
